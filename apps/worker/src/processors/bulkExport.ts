import { mkdir, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';

import { describeError, type MusicService, type PlaylistExport } from '@app/contracts';
import { RENDERERS, slugify, type ExportFormat } from '@app/providers-file-exporters';
import { createLogger } from '@app/utils';

import { throwIfCancelled } from '../lib/cancellation';
import type { EngineContext } from '../lib/engine';
import { createProgressReporter, progressMessages as msg } from '../lib/progress';
import { RateLimiter } from '../lib/rateLimiter';

export const DEFAULT_CONCURRENCY = 5;
export const MAX_CONCURRENCY = 10;
export const MANIFEST_FILE = 'export_manifest.json';

const EXTENSIONS: Record<ExportFormat, string> = {
  json: 'json',
  csv: 'csv',
  m3u: 'm3u',
};

export type BulkExportOptions = EngineContext & {
  /** Defaults to `export_<epoch seconds>` under the working directory. */
  outputDir?: string;
  formats?: readonly ExportFormat[];
  concurrency?: number;
  /** Export requests started per second across all workers. Defaults to 5. */
  rateLimit?: number;
  now?: () => Date;
};

export type PlaylistExportOutcome =
  | { playlistId: string; playlistName: string; status: 'success'; files: string[] }
  | { playlistId: string; playlistName: string; status: 'failed'; error: string };

export type BulkExportResult = {
  outputDir: string;
  manifestPath: string;
  totalPlaylists: number;
  successfulExports: number;
  failedExports: number;
  /** Input order. */
  results: PlaylistExportOutcome[];
};

export function clampConcurrency(requested: number | undefined): number {
  if (requested === undefined || !Number.isFinite(requested) || requested < 1) return DEFAULT_CONCURRENCY;
  return Math.min(Math.floor(requested), MAX_CONCURRENCY);
}

/**
 * Export many playlists to files with a small pool of concurrent workers.
 * A failing playlist is recorded in the manifest and does not stop the batch.
 */
export async function bulkExport(
  service: MusicService,
  playlistIds: readonly string[],
  options: BulkExportOptions = {},
): Promise<BulkExportResult> {
  const logger = options.logger ?? createLogger('bulk-export');
  const reporter = createProgressReporter(options.progress, { logger });
  const { signal } = options;
  const now = options.now ?? (() => new Date());

  try {
    const requested: readonly ExportFormat[] =
      options.formats && options.formats.length > 0 ? options.formats : ['json'];
    const formats = [...new Set(requested)];
    const concurrency = clampConcurrency(options.concurrency);
    const limiter = new RateLimiter(options.rateLimit);
    const outputDir = resolve(options.outputDir ?? `export_${Math.floor(now().getTime() / 1000)}`);
    const total = playlistIds.length;

    throwIfCancelled(signal);
    await mkdir(outputDir, { recursive: true });

    const results = new Array<PlaylistExportOutcome | undefined>(total).fill(undefined);
    let next = 0;
    let completed = 0;

    const exportOne = async (playlistId: string): Promise<PlaylistExportOutcome> => {
      await limiter.wait(signal);

      let exported: PlaylistExport;
      try {
        exported = await service.exportPlaylist(playlistId, { signal });
      } catch (error) {
        throwIfCancelled(signal);
        return {
          playlistId,
          playlistName: `Unknown (${playlistId})`,
          status: 'failed',
          error: `failed to fetch playlist: ${describeError(error)}`,
        };
      }

      const playlistName = exported.playlist.name;
      try {
        const files = await writePlaylistFiles(outputDir, exported, formats);
        return { playlistId, playlistName, status: 'success', files };
      } catch (error) {
        return { playlistId, playlistName, status: 'failed', error: `write failed: ${describeError(error)}` };
      }
    };

    const worker = async (): Promise<void> => {
      while (next < total) {
        throwIfCancelled(signal);
        const index = next;
        next += 1;
        const playlistId = playlistIds[index] ?? '';

        const outcome = await exportOne(playlistId);
        results[index] = outcome;
        completed += 1;

        if (outcome.status === 'success') {
          await reporter.report(
            'export_playlist',
            msg.exportCompleted(completed, total, outcome.playlistName, outcome.files.length),
            completed,
            total,
          );
        } else {
          logger.warn({ playlistId, error: outcome.error }, 'playlist export failed');
          await reporter.report(
            'export_playlist',
            msg.exportFailed(completed, total, outcome.playlistName, outcome.error),
            completed,
            total,
          );
        }
      }
    };

    await Promise.all(Array.from({ length: Math.min(concurrency, Math.max(total, 1)) }, () => worker()));

    const finished = results.filter((outcome): outcome is PlaylistExportOutcome => outcome !== undefined);
    const successfulExports = finished.filter((outcome) => outcome.status === 'success').length;
    const manifestPath = join(outputDir, MANIFEST_FILE);
    const result: BulkExportResult = {
      outputDir,
      manifestPath,
      totalPlaylists: total,
      successfulExports,
      failedExports: finished.length - successfulExports,
      results: finished,
    };

    try {
      await writeFile(manifestPath, renderManifest(result, formats, now()), 'utf8');
    } catch (error) {
      logger.error({ err: error, manifestPath }, 'export completed but failed to write manifest');
      throw error;
    }

    logger.info(
      { outputDir, total, succeeded: result.successfulExports, failed: result.failedExports },
      'bulk export finished',
    );
    await reporter.report('done', `Exported ${result.successfulExports}/${total} playlists to ${outputDir}`);
    return result;
  } finally {
    reporter.close();
  }
}

async function writePlaylistFiles(
  outputDir: string,
  exported: PlaylistExport,
  formats: readonly ExportFormat[],
): Promise<string[]> {
  const base = `${slugify(exported.playlist.name)}-${slugify(exported.playlist.id)}`;
  const files: string[] = [];

  for (const format of formats) {
    const path = join(outputDir, `${base}.${EXTENSIONS[format]}`);
    await writeFile(path, RENDERERS[format](exported), 'utf8');
    files.push(path);
  }

  return files;
}

function renderManifest(result: BulkExportResult, formats: readonly ExportFormat[], at: Date): string {
  const manifest = {
    timestamp: at.toISOString(),
    formats,
    total_playlists: result.totalPlaylists,
    successful_exports: result.successfulExports,
    failed_exports: result.failedExports,
    exports: result.results.map((outcome) =>
      outcome.status === 'success'
        ? {
            playlist_id: outcome.playlistId,
            playlist_name: outcome.playlistName,
            status: outcome.status,
            files: outcome.files,
          }
        : {
            playlist_id: outcome.playlistId,
            playlist_name: outcome.playlistName,
            status: outcome.status,
            error: outcome.error,
          },
    ),
  };
  return `${JSON.stringify(manifest, null, 2)}\n`;
}
