import { TransferError } from '@app/contracts';

/** Throws `cancelled` once the signal has fired; checked between engine steps. */
export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new TransferError('cancelled', 'operation cancelled', { cause: signal.reason });
  }
}
