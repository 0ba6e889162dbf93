/**
 * Zod validation middleware for Express routes
 */

import type { NextFunction, Request, Response } from 'express';
import type { ZodError, ZodSchema } from 'zod';
import { ValidationError, type ValidationIssue } from '../errors.js';

export function toValidationIssues(error: ZodError): ValidationIssue[] {
  return error.errors.map(err => ({
    path: err.path.join('.'),
    message: err.message,
    code: err.code,
  }));
}

/**
 * Validate the request body against `schema`. On success the parsed value
 * replaces `req.body`.
 */
export function validateBody<T>(schema: ZodSchema<T>) {
  return (req: Request, _res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      return next(new ValidationError('Request validation failed', toValidationIssues(result.error)));
    }
    req.body = result.data;
    next();
  };
}
