import { body, param } from 'express-validator';

export const createEventValidation = [
  body('name')
    .isString()
    .withMessage('Event name must be a string')
    .trim()
    .notEmpty()
    .withMessage('Event name is required')
    .isLength({ max: 100 })
    .withMessage('Event name cannot exceed 100 characters'),
];

export const selectEventValidation = [
  body('eventId').isString().notEmpty().withMessage('Event ID is required'),
];

export const eventIdValidation = [
  param('id').isString().notEmpty().withMessage('Event ID is required'),
];
