import type { NextFunction, Request, Response } from 'express';
import {
  isClientError,
  RequestCancelledError,
  RequestValidationError
} from '../errors/route-risk.errors';

/** Non-standard status for requests the client abandoned. */
export const CLIENT_CLOSED_REQUEST = 499;

export interface ErrorResponse {
  status: number;
  body: { success: false; error: string; details?: string[] };
}

export function toErrorResponse(err: unknown): ErrorResponse {
  if (err instanceof RequestCancelledError) {
    console.warn(`[API] ${err.message}`);
    return { status: CLIENT_CLOSED_REQUEST, body: { success: false, error: err.message } };
  }

  if (err instanceof RequestValidationError) {
    console.warn(`[API] ${err.message}`);
    return { status: 400, body: { success: false, error: 'Invalid request', details: err.issues } };
  }

  // Raised by express.json() for an unparsable body
  if (err instanceof SyntaxError && 'body' in err) {
    console.warn(`[API] Malformed JSON body: ${err.message}`);
    return { status: 400, body: { success: false, error: 'Malformed JSON body' } };
  }

  if (isClientError(err)) {
    console.warn(`[API] ${err.name}: ${err.message}`);
    return { status: 400, body: { success: false, error: err.message } };
  }

  console.error('[API] Unhandled error:', err);
  return {
    status: 500,
    body: { success: false, error: err instanceof Error ? err.message : 'Unknown error occurred' }
  };
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  next: NextFunction
): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  const { status, body } = toErrorResponse(err);
  res.status(status).json(body);
}
