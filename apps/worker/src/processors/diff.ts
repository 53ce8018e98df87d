import { TransferError, describeError, type MusicService, type PlaylistExport, type Track } from '@app/contracts';
import { TrackIndex } from '@app/providers-core';
import { createLogger } from '@app/utils';

import { throwIfCancelled } from '../lib/cancellation';
import type { EngineContext } from '../lib/engine';
import { createProgressReporter, progressMessages as msg } from '../lib/progress';
import type { ServiceRegistry } from '../providers';

export type PlaylistRef = {
  /** Service label known to the registry. */
  service: string;
  playlistId: string;
};

export type DiffRequest = {
  source: PlaylistRef;
  dest: PlaylistRef;
};

export type DiffContext = EngineContext & {
  registry: ServiceRegistry;
};

export type DiffResult = {
  source: PlaylistExport;
  destination: PlaylistExport;
  /** Source tracks present on the destination. */
  matchedCount: number;
  /** Source order. */
  missingInDest: Track[];
  /** Destination order. */
  extraInDest: Track[];
};

/**
 * Compare two playlists by track identity (ISRC, else normalized title and
 * artist). Duplicates are compared by membership: a repeated source track
 * counts as matched as long as the destination holds one copy.
 */
export async function diffPlaylists(request: DiffRequest, context: DiffContext): Promise<DiffResult> {
  const logger = context.logger ?? createLogger('diff');
  const reporter = createProgressReporter(context.progress, { logger });
  const { signal } = context;

  try {
    const sourceService = context.registry.resolve(request.source.service);
    const destService = context.registry.resolve(request.dest.service);
    const sourceId = requireId(request.source, 'source');
    const destId = requireId(request.dest, 'destination');

    throwIfCancelled(signal);
    await reporter.report('fetch_source', msg.fetchingSource(sourceService.displayName), 1, 2);
    const source = await exportSide(sourceService, sourceId, 'source', signal);

    throwIfCancelled(signal);
    await reporter.report('fetch_dest', msg.fetchingDest(destService.displayName), 2, 2);
    const destination = await exportSide(destService, destId, 'destination', signal);

    throwIfCancelled(signal);
    await reporter.report('compare', msg.buildingMaps(), 1, 2);
    const destIndex = new TrackIndex(destination.tracks);
    const sourceIndex = new TrackIndex(source.tracks);

    await reporter.report('compare', msg.comparing(), 2, 2);
    const missingInDest = source.tracks.filter((track) => !destIndex.has(track));
    const extraInDest = destination.tracks.filter((track) => !sourceIndex.has(track));
    const matchedCount = source.tracks.length - missingInDest.length;

    logger.info(
      { matched: matchedCount, missing: missingInDest.length, extra: extraInDest.length },
      'playlists compared',
    );
    await reporter.report(
      'done',
      `${matchedCount} matched, ${missingInDest.length} missing, ${extraInDest.length} extra`,
    );

    return { source, destination, matchedCount, missingInDest, extraInDest };
  } finally {
    reporter.close();
  }
}

function requireId(ref: PlaylistRef, side: string): string {
  const id = ref.playlistId.trim();
  if (id.length === 0) {
    throw new TransferError('missing_argument', `${side} playlist id is required`);
  }
  return id;
}

async function exportSide(
  service: MusicService,
  playlistId: string,
  side: 'source' | 'destination',
  signal: AbortSignal | undefined,
): Promise<PlaylistExport> {
  try {
    return await service.exportPlaylist(playlistId, { signal });
  } catch (error) {
    throwIfCancelled(signal);
    throw new TransferError('playlist_not_found', `failed to export ${side} playlist ${playlistId}: ${describeError(error)}`, {
      cause: error,
    });
  }
}
