import { body, param } from 'express-validator';

import { AGE_GROUPS, GENDERS, MARKETING_CHANNELS } from '../../types/sales';

const flag = (field: string) =>
  body(field).optional().isBoolean().withMessage(`${field} must be a boolean`).toBoolean(true);

/**
 * Customer profile fields shared by the session and transaction edits.
 * Every field is optional; absent fields keep their current value.
 */
export const profileFieldsValidation = [
  body('ageGroup')
    .optional()
    .isIn(AGE_GROUPS)
    .withMessage(`ageGroup must be one of: ${AGE_GROUPS.join(', ')}`),
  body('gender')
    .optional()
    .isIn(GENDERS)
    .withMessage(`gender must be one of: ${GENDERS.join(', ')}`),
  body('channel')
    .optional()
    .isIn(MARKETING_CHANNELS)
    .withMessage(`channel must be one of: ${MARKETING_CHANNELS.join(', ')}`),
  flag('isExhibitor'),
  flag('isAcquaintance'),
  flag('isCashless'),
  flag('isReserved'),
  body('notes')
    .optional()
    .isString()
    .withMessage('Notes must be a string')
    .isLength({ max: 500 })
    .withMessage('Notes cannot exceed 500 characters'),
];

export const basketProductValidation = [
  param('productId').isString().notEmpty().withMessage('Product ID is required'),
];

export const setQuantityValidation = [
  ...basketProductValidation,
  body('quantity')
    .exists()
    .withMessage('Quantity is required')
    .isInt()
    .withMessage('Quantity must be a whole number')
    .toInt(),
];
