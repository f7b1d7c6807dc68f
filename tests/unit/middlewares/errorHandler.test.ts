/**
 * Error Handler Unit Tests
 *
 * Tests the ApiError factories and the JSON error envelope.
 */

import { Request, Response, NextFunction } from 'express';
import { ApiError, errorHandler, notFoundHandler } from '../../../src/middlewares/errorHandler';
import { ErrorCode } from '../../../src/types/errors';

describe('Error Handler', () => {
  let mockReq: Request;
  let mockRes: Partial<Response>;
  let mockNext: NextFunction;

  beforeEach(() => {
    mockReq = { path: '/sales', method: 'POST' } as Request;
    mockRes = {
      status: jest.fn().mockReturnThis(),
      json: jest.fn().mockReturnThis(),
    };
    mockNext = jest.fn();
  });

  describe('ApiError', () => {
    it('should map resources to their not-found codes', () => {
      expect(ApiError.notFound('Product').errorCode).toBe(ErrorCode.PRODUCT_NOT_FOUND);
      expect(ApiError.notFound('Transaction').errorCode).toBe(ErrorCode.TRANSACTION_NOT_FOUND);
      expect(ApiError.notFound('Export').statusCode).toBe(404);
      expect(ApiError.notFound('Widget').errorCode).toBe(ErrorCode.RESOURCE_NOT_FOUND);
    });

    it('should use conflict status for sale rejections', () => {
      expect(new ApiError(ErrorCode.INSUFFICIENT_STOCK, 'x').statusCode).toBe(409);
      expect(new ApiError(ErrorCode.NO_EVENT_SELECTED, 'x').statusCode).toBe(409);
      expect(new ApiError(ErrorCode.EMPTY_BASKET, 'x').statusCode).toBe(400);
    });

    it('should mark internal errors as non-operational', () => {
      const error = ApiError.internal();

      expect(error.statusCode).toBe(500);
      expect(error.isOperational).toBe(false);
    });
  });

  describe('errorHandler', () => {
    it('should send the error envelope with validation details', () => {
      const error = ApiError.validationError('Validation failed', { price: ['Price is required'] });

      errorHandler(error, mockReq, mockRes as Response, mockNext);

      expect(mockRes.status).toHaveBeenCalledWith(400);
      expect(mockRes.json).toHaveBeenCalledWith({
        success: false,
        error: {
          code: ErrorCode.VALIDATION_ERROR,
          message: 'Validation failed',
          details: { price: ['Price is required'] },
          timestamp: expect.any(String),
          correlationId: 'unknown',
        },
      });
    });

    it('should treat plain errors as internal errors', () => {
      errorHandler(new Error('boom'), mockReq, mockRes as Response, mockNext);

      expect(mockRes.status).toHaveBeenCalledWith(500);
      expect(mockRes.json).toHaveBeenCalledWith(
        expect.objectContaining({
          error: expect.objectContaining({ code: ErrorCode.INTERNAL_ERROR, message: 'boom' }),
        })
      );
    });
  });

  describe('malformed request bodies', () => {
    it('should report body-parser failures as validation errors', () => {
      const error = Object.assign(new SyntaxError('Unexpected token } in JSON'), {
        statusCode: 400,
        type: 'entity.parse.failed',
      });

      errorHandler(error, mockReq, mockRes as Response, mockNext);

      expect(mockRes.status).toHaveBeenCalledWith(400);
      expect(mockRes.json).toHaveBeenCalledWith({
        success: false,
        error: {
          code: ErrorCode.VALIDATION_ERROR,
          message: 'Request body is not valid JSON',
          timestamp: expect.any(String),
          correlationId: 'unknown',
        },
      });
    });
  });

  describe('notFoundHandler', () => {
    it('should describe the unmatched route', () => {
      notFoundHandler(mockReq, mockRes as Response, mockNext);

      expect(mockRes.status).toHaveBeenCalledWith(404);
      expect(mockRes.json).toHaveBeenCalledWith(
        expect.objectContaining({
          error: expect.objectContaining({ message: 'Route POST /sales not found' }),
        })
      );
    });
  });
});
