import type { ProgressUpdate } from '@app/contracts';
import type { ProgressSink } from '@app/interop';
import type { Logger } from '@app/utils';

/** Per-invocation collaborators shared by the engine operations. */
export type EngineContext = {
  /** Closed by the operation when it ends, whatever the outcome. */
  progress?: ProgressSink<ProgressUpdate> | null;
  signal?: AbortSignal;
  logger?: Logger;
};

export function formatPercentage(rate: number): string {
  return `${rate.toFixed(1)}%`;
}
