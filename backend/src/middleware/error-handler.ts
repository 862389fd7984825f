import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { AppError } from '../utils/errors';
import { log } from '../utils/logger';

export interface ErrorResponse {
  statusCode: number;
  body: {
    status: 'error';
    code: string;
    message: string;
  };
}

function isBodyParseError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed';
}

export function toErrorResponse(err: unknown): ErrorResponse {
  if (err instanceof AppError) {
    return {
      statusCode: err.statusCode,
      body: { status: 'error', code: err.code, message: err.message }
    };
  }

  if (isBodyParseError(err)) {
    return {
      statusCode: 400,
      body: { status: 'error', code: 'VALIDATION_ERROR', message: 'Request body is not valid JSON' }
    };
  }

  return {
    statusCode: 500,
    body: {
      status: 'error',
      code: 'INTERNAL_ERROR',
      message: "I'm sorry, I encountered an error. Please try again."
    }
  };
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const { statusCode, body } = toErrorResponse(err);
  if (statusCode >= 500) {
    log.error({ err, path: req.path }, 'Request failed');
  }
  res.status(statusCode).json(body);
}

export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}
