import type { NextFunction, Request, Response } from 'express';
import jwt from 'jsonwebtoken';
import mongoose from 'mongoose';
import { ZodError } from 'zod';
import { AppError, ValidationError } from '../utils/AppError.js';
import { isDuplicateKeyError } from '../utils/mongoErrors.js';

// Shape of the errors raised by express.json() / express.urlencoded()
interface BodyParserError {
  type: string;
  status: number;
}

const isBodyParserError = (err: unknown): err is BodyParserError =>
  err instanceof Error &&
  'type' in err &&
  typeof err.type === 'string' &&
  'status' in err &&
  typeof err.status === 'number' &&
  err.status >= 400 &&
  err.status < 500;

const fromBodyParserError = (err: BodyParserError): AppError => {
  if (err.type === 'entity.parse.failed') {
    return ValidationError.forField('body', 'Malformed JSON in request body');
  }
  if (err.type === 'entity.too.large') {
    return new AppError('Request body is too large', 413, 'VALIDATION_ERROR');
  }
  return ValidationError.forField('body', 'Request body could not be read');
};

/** Maps library errors onto the AppError taxonomy. */
export const normalizeError = (err: unknown): AppError => {
  if (err instanceof AppError) return err;

  if (isBodyParserError(err)) return fromBodyParserError(err);

  if (err instanceof ZodError) {
    const details = err.issues.map((issue) => ({
      field: issue.path.join('.') || 'body',
      message: issue.message,
    }));
    return new ValidationError(details.map((d) => d.message).join(', '), details);
  }

  if (err instanceof mongoose.Error.CastError) {
    return ValidationError.forField(err.path, `Invalid ${err.path}: ${String(err.value)}`);
  }

  if (err instanceof mongoose.Error.ValidationError) {
    const details = Object.values(err.errors).map((e) => ({ field: e.path, message: e.message }));
    return new ValidationError('Invalid input data', details);
  }

  if (isDuplicateKeyError(err)) {
    return AppError.conflict('Duplicate value violates a unique constraint');
  }

  if (err instanceof jwt.TokenExpiredError) {
    return AppError.unauthorized('Your token has expired. Please log in again.');
  }
  if (err instanceof jwt.JsonWebTokenError) {
    return AppError.unauthorized('Invalid token. Please log in again.');
  }

  return AppError.internal();
};

// eslint-disable-next-line @typescript-eslint/no-unused-vars
export const globalError = (err: unknown, req: Request, res: Response, _next: NextFunction) => {
  const appError = normalizeError(err);
  const isProduction = process.env['NODE_ENV'] === 'production';

  if (appError.statusCode >= 500) {
    console.error(`💥 ${req.method} ${req.originalUrl}`, err);
  }

  res.status(appError.statusCode).json({
    status: appError.status,
    code: appError.code,
    message: appError.message,
    ...(appError.details ? { details: appError.details } : {}),
    ...(!isProduction && appError.statusCode >= 500 && err instanceof Error ? { stack: err.stack } : {}),
  });
};
