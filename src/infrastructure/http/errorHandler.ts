import type { ErrorRequestHandler, RequestHandler } from 'express';
import multer from 'multer';
import { ZodError } from 'zod';
import { AppError } from '../../domain/errors/AppError.js';
import { ValidationError } from '../../domain/errors/ExtractionErrors.js';

export interface ErrorBody {
  success: false;
  error: string;
  error_code: string;
  details: Record<string, unknown>;
  path: string;
}

/**
 * Maps a thrown value onto the HTTP status and body the API answers with.
 */
export const describeError = (error: unknown, path: string, maxFileSizeMb: number): { status: number; body: ErrorBody } => {
  if (error instanceof multer.MulterError) {
    const mapped =
      error.code === 'LIMIT_FILE_SIZE'
        ? new ValidationError(`File too large. Maximum size is ${maxFileSizeMb}MB.`, { statusCode: 413 })
        : new ValidationError(error.message, { details: { field: error.field } });
    return describeError(mapped, path, maxFileSizeMb);
  }

  if (error instanceof AppError) {
    return {
      status: error.statusCode,
      body: { success: false, error: error.message, error_code: error.code, details: error.details, path },
    };
  }

  if (error instanceof ZodError) {
    return {
      status: 400,
      body: {
        success: false,
        error: 'Request validation failed',
        error_code: 'VALIDATION_ERROR',
        details: { fields: error.issues.map((issue) => ({ field: issue.path.join('.'), message: issue.message })) },
        path,
      },
    };
  }

  if (error instanceof SyntaxError && 'body' in error) {
    return {
      status: 400,
      body: { success: false, error: 'Malformed JSON body', error_code: 'BAD_REQUEST', details: {}, path },
    };
  }

  return {
    status: 500,
    body: { success: false, error: 'Internal server error', error_code: 'INTERNAL_ERROR', details: {}, path },
  };
};

export const createErrorHandler =
  (maxFileSizeMb: number): ErrorRequestHandler =>
  (error, req, res, _next) => {
    const { status, body } = describeError(error, req.path, maxFileSizeMb);

    if (status >= 500) {
      console.error('💥 Unhandled error', {
        path: req.path,
        method: req.method,
        error: error instanceof Error ? error.message : String(error),
      });
    } else {
      console.warn(`⚠️ ${body.error_code}`, { path: req.path, method: req.method, error: body.error });
    }

    res.status(status).json(body);
  };

export const notFoundHandler: RequestHandler = (req, res) => {
  res.status(404).json({
    success: false,
    error: 'API endpoint not found',
    error_code: 'NOT_FOUND',
    details: {},
    path: req.path,
  });
};
