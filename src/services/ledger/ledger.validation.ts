/**
 * Transaction API Validation Rules
 */

import { body, param, query } from 'express-validator';

import { profileFieldsValidation } from '../sale/sale.validation';
import { MAX_LINE_QUANTITY } from '../sale/sale.session';

export const transactionIdValidation = [
  param('id').isString().notEmpty().withMessage('Transaction ID is required'),
];

export const listTransactionsValidation = [
  query('eventId').optional().isString().notEmpty().withMessage('eventId cannot be empty'),
];

export const updateTransactionValidation = [
  ...transactionIdValidation,
  ...profileFieldsValidation,
  body('items').optional().isArray().withMessage('items must be an array'),
  body('items.*.id').isString().notEmpty().withMessage('Each item needs its ID'),
  body('items.*.quantity')
    .isInt({ min: 1, max: MAX_LINE_QUANTITY })
    .withMessage(`Item quantity must be between 1 and ${MAX_LINE_QUANTITY}`)
    .toInt(),
];
