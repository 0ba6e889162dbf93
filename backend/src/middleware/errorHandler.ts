import type { NextFunction, Request, Response } from 'express';
import { RecipeAssistantError, ValidationError, errorMessage } from '../errors.js';

export interface ErrorBody {
  ok: false;
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

export function toErrorBody(error: unknown): { status: number; body: ErrorBody } {
  if (error instanceof ValidationError) {
    return {
      status: error.statusCode,
      body: { ok: false, error: { code: error.code, message: error.message, details: error.issues } },
    };
  }
  if (error instanceof RecipeAssistantError) {
    return {
      status: error.statusCode,
      body: { ok: false, error: { code: error.code, message: error.message } },
    };
  }
  // body-parser rejects bad bodies with a 4xx `status` (400 malformed JSON, 413 too large, 415 charset)
  if (error instanceof Error && 'status' in error && typeof error.status === 'number' && error.status >= 400 && error.status < 500) {
    const message = error instanceof SyntaxError ? 'Malformed JSON body' : error.message;
    return {
      status: error.status,
      body: {
        ok: false,
        error: { code: error.status === 413 ? 'PAYLOAD_TOO_LARGE' : 'VALIDATION_ERROR', message },
      },
    };
  }
  return {
    status: 500,
    body: { ok: false, error: { code: 'INTERNAL_ERROR', message: errorMessage(error) } },
  };
}

// Express recognizes error middleware by its four parameters
export function errorHandler(error: unknown, req: Request, res: Response, _next: NextFunction) {
  const { status, body } = toErrorBody(error);
  if (status >= 500) {
    console.error(`[Server] ${req.method} ${req.path} failed: ${body.error.message}`);
  }
  res.status(status).json(body);
}
