import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { SuggestionError } from '../services/suggestionErrors';
import {
  sendError,
  sendServerError,
  sendValidationError,
} from '../middleware/responseHelper';

function statusForMessage(message: string): number {
  if (message.startsWith('FOOD_NOT_FOUND') || message.endsWith('NOT_FOUND')) return 404;
  if (message.startsWith('INVALID') || message === 'EMPTY_MEAL') return 400;
  if (message.startsWith('CORS blocked')) return 403;
  return 500;
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof ZodError) {
    sendValidationError(
      res,
      err.errors.map((e) => (e.path.length ? `${e.path.join('.')}: ${e.message}` : e.message))
    );
    return;
  }

  // express.json() parse failure
  if (err instanceof SyntaxError && 'body' in err) {
    sendError(res, 'INVALID_JSON', 400);
    return;
  }

  if (err instanceof SuggestionError) {
    sendError(res, err.message, 400, { type: err.kind });
    return;
  }

  const message =
    err instanceof Error ? err.message : typeof err === 'string' ? err : 'Server error';
  const status = statusForMessage(message);

  if (status < 500) {
    sendError(res, message, status);
    return;
  }

  console.error('❌ SERVER ERROR:', err);
  sendServerError(res, message);
}
