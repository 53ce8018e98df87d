import type { ProgressPhase, ProgressUpdate } from '@app/contracts';
import { ChannelClosedError, type ProgressSink } from '@app/interop';
import type { Logger } from '@app/utils';

export type ProgressReporter = {
  report(phase: ProgressPhase, message: string, step?: number, total?: number): Promise<void>;
  /** Closes the sink; later reports are dropped. Safe to call twice. */
  close(): void;
};

export type ProgressReporterOptions = {
  logger?: Logger;
};

/**
 * Engine-side progress writer. Without a sink updates are only logged.
 * Each report waits for the sink, so a full buffer slows the engine down
 * instead of losing updates. Once the consumer closes the sink, later
 * updates are only logged.
 */
export function createProgressReporter(
  sink: ProgressSink<ProgressUpdate> | null | undefined,
  options: ProgressReporterOptions = {},
): ProgressReporter {
  let closed = false;
  let detached = false;

  return {
    async report(phase, message, step = 1, total = 1) {
      if (closed) return;
      options.logger?.debug({ phase, step, total }, message);
      if (!sink || detached) return;
      try {
        await sink.send({ phase, step, total, message });
      } catch (error) {
        if (!(error instanceof ChannelClosedError)) throw error;
        detached = true;
        options.logger?.debug({ phase }, 'progress consumer closed the channel, updates are no longer forwarded');
      }
    },

    close() {
      if (closed) return;
      closed = true;
      sink?.close();
    },
  };
}

export const progressMessages = {
  fetchingSourceFrom: (service: string) => `Fetching source playlist from ${service}...`,
  foundPlaylist: (name: string, trackCount: number) => `Found playlist: ${name} (${trackCount} tracks)`,
  searchingOn: (service: string) => `Searching for tracks on ${service}...`,
  searchingTrack: (step: number, total: number, artist: string, title: string) =>
    `[${step}/${total}] ${artist} - ${title}`,
  creatingOn: (service: string) => `Creating playlist on ${service}...`,
  playlistCreated: (name: string, id: string) => `Playlist created: ${name} (ID: ${id})`,
  fetchingSource: (service: string) => `Fetching source playlist (${service})...`,
  fetchingDest: (service: string) => `Fetching destination playlist (${service})...`,
  buildingMaps: () => 'Building track comparison maps...',
  comparing: () => 'Comparing tracks...',
  exportingPlaylist: (step: number, total: number, name: string) => `[${step}/${total}] Exporting: ${name}...`,
  exportCompleted: (step: number, total: number, name: string, files: number) =>
    `[${step}/${total}] ✓ ${name} (${files} files)`,
  exportFailed: (step: number, total: number, name: string, reason: string) =>
    `[${step}/${total}] ✗ ${name}: ${reason}`,
} as const;
