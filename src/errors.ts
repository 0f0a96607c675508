/**
 * Engine error taxonomy.
 *
 * Every hard failure surfaces as an EngineError with a stable `code` so that
 * routes and the control socket can map it without string matching.
 */

export type EngineErrorCode =
  | 'UNKNOWN_PROFILE'
  | 'INVALID_PROFILE_TABLE'
  | 'INVALID_PAD'
  | 'INVALID_SLIDER'
  | 'MISSING_BASE'
  | 'UNSUPPORTED_FORMAT'
  | 'EMPTY_SIGNAL'
  | 'ANALYSIS_CANCELLED'
  | 'DISPATCH_FAILURE'
  | 'SLOT_NOT_FOUND'
  | 'NO_FINGERPRINT';

export class EngineError extends Error {
  readonly code: EngineErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: EngineErrorCode, message: string, options: { details?: Record<string, unknown>; cause?: unknown } = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'EngineError';
    this.code = code;
    this.details = options.details;
  }
}

export function isEngineError(err: unknown, code?: EngineErrorCode): err is EngineError {
  return err instanceof EngineError && (code === undefined || err.code === code);
}

/** Best-effort message for logging and wire errors. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
