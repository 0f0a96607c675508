import type { Response } from 'express';
import { errorMessage, isEngineError, type EngineErrorCode } from '../../errors.js';

const STATUS_BY_CODE: Record<EngineErrorCode, number> = {
  UNKNOWN_PROFILE: 404,
  SLOT_NOT_FOUND: 404,
  INVALID_PAD: 400,
  INVALID_SLIDER: 400,
  MISSING_BASE: 409,
  NO_FINGERPRINT: 409,
  ANALYSIS_CANCELLED: 409,
  UNSUPPORTED_FORMAT: 415,
  EMPTY_SIGNAL: 422,
  DISPATCH_FAILURE: 502,
  INVALID_PROFILE_TABLE: 500,
};

export function httpStatusFor(err: unknown): number {
  return isEngineError(err) ? STATUS_BY_CODE[err.code] : 500;
}

export function sendError(res: Response, err: unknown): void {
  const status = httpStatusFor(err);
  if (status >= 500) console.error('[http]', err);
  res.status(status).json({
    ok: false,
    code: isEngineError(err) ? err.code : 'INTERNAL',
    message: errorMessage(err),
    ...(isEngineError(err) && err.details ? { details: err.details } : {}),
  });
}
