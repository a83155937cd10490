import { Request, Response, NextFunction } from 'express';
import { PasteVaultError } from '../errors';
import type { PasteVaultErrorCode } from '../errors';

const STATUS_BY_CODE: Record<PasteVaultErrorCode, number> = {
  INVALID_ID: 400,
  TOO_LARGE: 400,
  NOT_FOUND: 404,
  // never reaches here, the store turns it into NOT_FOUND
  INTEGRITY: 404,
  ALLOCATION_EXHAUSTED: 503,
  BACKEND_UNAVAILABLE: 503,
  CONFIGURATION: 500
};

export function statusForError(error: unknown): number {
  if (error instanceof PasteVaultError) {
    return STATUS_BY_CODE[error.code];
  }
  return 500;
}

/**
 * Global error handler
 */
export const errorHandler = (err: unknown, req: Request, res: Response, next: NextFunction) => {
  if (res.headersSent) {
    return next(err);
  }

  const status = statusForError(err);

  if (err instanceof PasteVaultError && status < 500) {
    return res.status(status).json({ error: err.message, code: err.code });
  }

  if (err instanceof PasteVaultError) {
    console.error(`Service unavailable (${err.code}):`, err.message);
    return res.status(status).json({ error: 'Service temporarily unavailable', code: err.code });
  }

  // body-parser errors carry their own status (400 malformed JSON, 413 too large)
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number' && err.status < 500) {
    return res.status(err.status).json({ error: err.status === 413 ? 'Request body too large' : 'Malformed request body' });
  }

  console.error('Unhandled error:', err);
  res.status(500).json({ error: 'Internal server error' });
};
