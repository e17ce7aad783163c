import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { formatSchemaIssues } from '@stackwright/shared';
import { EngineError, type RetryHint } from '../../lib/errors.js';
import { apiLogger as logger } from '../../lib/logger.js';

const apiLogger = logger.child({ module: 'api-error' });

export interface ApiError extends Error {
  statusCode?: number;
  code?: string;
}

export interface ErrorBody {
  error: {
    code: string;
    message: string;
    details?: string[];
    retryHint?: RetryHint;
    activeOperation?: string;
  };
}

function toErrorBody(err: ApiError): { statusCode: number; body: ErrorBody } {
  if (err instanceof EngineError) {
    const body: ErrorBody = {
      error: {
        code: err.code,
        message: err.message,
        details: err.details,
        retryHint: err.retryHint,
      },
    };
    if ('activeOperation' in err && typeof err.activeOperation === 'string') {
      body.error.activeOperation = err.activeOperation;
    }
    return { statusCode: err.statusCode, body };
  }

  if (err instanceof ZodError) {
    return {
      statusCode: 400,
      body: {
        error: {
          code: 'INVALID_REQUEST',
          message: 'Request body failed validation',
          details: formatSchemaIssues(err),
          retryHint: 'fix-input',
        },
      },
    };
  }

  // express.json() marks malformed bodies with a 400 status
  const statusCode = err.statusCode || ('status' in err && typeof err.status === 'number' ? err.status : 500);
  return {
    statusCode,
    body: {
      error: {
        code: err.code || (statusCode === 400 ? 'INVALID_REQUEST' : 'INTERNAL_ERROR'),
        message: statusCode >= 500 ? 'Internal server error' : err.message,
      },
    },
  };
}

export function errorHandler(
  err: ApiError,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  const { statusCode, body } = toErrorBody(err);

  if (statusCode >= 500) {
    apiLogger.error({ err, statusCode }, 'API error');
  } else {
    apiLogger.warn({ code: body.error.code, msg: err.message, statusCode }, 'API client error');
  }

  res.status(statusCode).json(body);
}

export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({
    error: {
      code: 'NOT_FOUND',
      message: 'Resource not found',
    },
  });
}

export function createError(message: string, statusCode: number, code?: string): ApiError {
  const error: ApiError = new Error(message);
  error.statusCode = statusCode;
  error.code = code;
  return error;
}
