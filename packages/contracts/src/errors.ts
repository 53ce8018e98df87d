export type TransferErrorCode =
  | 'not_authenticated'
  | 'token_expired'
  | 'refresh_failed'
  | 'playlist_not_found'
  | 'track_not_found'
  | 'service_unavailable'
  | 'invalid_argument'
  | 'missing_argument'
  | 'timeout'
  | 'api_request_failed'
  | 'csrf_state_mismatch'
  | 'authorization_denied'
  | 'token_exchange_failed'
  | 'empty_result_set'
  | 'no_token_received'
  | 'listener_startup_failed'
  | 'cancelled';

export class TransferError extends Error {
  readonly code: TransferErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: TransferErrorCode,
    message: string,
    options: { cause?: unknown; details?: Record<string, unknown> } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'TransferError';
    this.code = code;
    if (options.details) {
      this.details = options.details;
    }
  }
}

export function isTransferError(error: unknown, code?: TransferErrorCode): error is TransferError {
  if (!(error instanceof TransferError)) return false;
  return code === undefined || error.code === code;
}

/** True for the rejection produced by an aborted fetch or AbortSignal. */
export function isAbortError(error: unknown): boolean {
  if (isTransferError(error, 'cancelled')) return true;
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Classify an arbitrary rejection. Abort errors always become `cancelled`,
 * an existing TransferError with the requested code is passed through, and
 * anything else is wrapped with `code` keeping the original as `cause`.
 */
export function toTransferError(error: unknown, code: TransferErrorCode, message: string): TransferError {
  if (isAbortError(error)) {
    return isTransferError(error) ? error : new TransferError('cancelled', 'operation cancelled', { cause: error });
  }
  if (isTransferError(error, code)) {
    return error;
  }
  return new TransferError(code, `${message}: ${describeError(error)}`, { cause: error });
}
