/**
 * Middleware Exports
 *
 * Central export point for all middleware modules.
 */

// Error handling
export { errorHandler, notFoundHandler, ApiError, AppError } from './errorHandler';

// Request validation
export { validateRequest } from './validateRequest';
