import { body, param } from 'express-validator';

const nameRule = (optional: boolean) => {
  const chain = body('name');
  return (optional ? chain.optional() : chain)
    .isString()
    .withMessage('Name must be a string')
    .trim()
    .notEmpty()
    .withMessage('Name is required')
    .isLength({ max: 100 })
    .withMessage('Name cannot exceed 100 characters');
};

const priceRule = (optional: boolean) => {
  const chain = body('price');
  return (optional ? chain.optional() : chain.exists().withMessage('Price is required'))
    .isInt({ min: 0 })
    .withMessage('Price must be a non-negative whole number')
    .toInt();
};

const imageRefRule = body('imageRef')
  .optional({ values: 'null' })
  .isString()
  .withMessage('Image reference must be a string');

const inventoryManagedRule = body('inventoryManaged')
  .optional()
  .isBoolean()
  .withMessage('inventoryManaged must be a boolean')
  .toBoolean(true);

const stockRule = body('stock')
  .optional()
  .isInt({ min: 0 })
  .withMessage('Stock must be a non-negative whole number')
  .toInt();

const componentIdsRule = (optional: boolean) => {
  const chain = body('componentIds');
  return (optional ? chain.optional() : chain)
    .isArray({ min: 1 })
    .withMessage('A bundle needs at least one component');
};

const componentIdRule = body('componentIds.*')
  .isString()
  .withMessage('Each component ID must be a string')
  .notEmpty()
  .withMessage('Component IDs cannot be empty');

export const productIdValidation = [
  param('id').isString().notEmpty().withMessage('Product ID is required'),
];

export const createProductValidation = [
  nameRule(false),
  priceRule(false),
  imageRefRule,
  inventoryManagedRule,
  stockRule,
];

export const createBundleValidation = [
  nameRule(false),
  priceRule(false),
  imageRefRule,
  inventoryManagedRule,
  componentIdsRule(false),
  componentIdRule,
];

export const updateProductValidation = [
  ...productIdValidation,
  nameRule(true),
  priceRule(true),
  imageRefRule,
  inventoryManagedRule,
  stockRule,
  componentIdsRule(true),
  componentIdRule,
];
