import { TransferError } from '@app/contracts';

export const DEFAULT_REQUESTS_PER_SECOND = 5;

/**
 * Spaces calls evenly at `requestsPerSecond`, allowing a burst of one: the
 * first caller goes immediately, each later caller waits for its own slot.
 */
export class RateLimiter {
  readonly intervalMs: number;
  private nextSlot = 0;

  constructor(requestsPerSecond: number = DEFAULT_REQUESTS_PER_SECOND) {
    const rate =
      Number.isFinite(requestsPerSecond) && requestsPerSecond > 0 ? requestsPerSecond : DEFAULT_REQUESTS_PER_SECOND;
    this.intervalMs = 1000 / rate;
  }

  /** Resolves when the caller may start; rejects with `cancelled` if the signal fires first. */
  wait(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(new TransferError('cancelled', 'operation cancelled', { cause: signal.reason }));
    }

    const now = Date.now();
    const slot = Math.max(now, this.nextSlot);
    this.nextSlot = slot + this.intervalMs;
    const delay = slot - now;
    if (delay <= 0) return Promise.resolve();

    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        clearTimeout(timer);
        reject(new TransferError('cancelled', 'operation cancelled', { cause: signal?.reason }));
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, delay);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
