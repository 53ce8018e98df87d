import {
  TransferError,
  describeError,
  isTransferError,
  toTransferError,
  type MusicService,
  type Playlist,
  type PlaylistExport,
  type Track,
} from '@app/contracts';
import { createLogger, type Logger } from '@app/utils';

import { throwIfCancelled } from '../lib/cancellation';
import { formatPercentage, type EngineContext } from '../lib/engine';
import { createProgressReporter, progressMessages as msg, type ProgressReporter } from '../lib/progress';

export type TransferRequest = {
  /** Playlist id, or its exact name when no playlist has that id. */
  source: string;
  destName?: string | null;
};

export type TransferContext = EngineContext & {
  source: MusicService;
  dest: MusicService;
};

export type TrackMatch =
  | { original: Track; matched: Track; error: null }
  | { original: Track; matched: null; error: TransferError };

export type TransferResult = {
  source: PlaylistExport;
  destination: Playlist;
  matches: TrackMatch[];
  total: number;
  successCount: number;
  failedCount: number;
  /** Percentage of source tracks found on the destination, 0..100. */
  successRate: number;
  /** Source tracks without a match, in source order. */
  unmatched: Track[];
};

/**
 * Copy a playlist from one service to another: resolve and export the
 * source, search each track on the destination, then create a private
 * playlist holding the matches.
 */
export async function runTransfer(request: TransferRequest, context: TransferContext): Promise<TransferResult> {
  const logger = context.logger ?? createLogger('transfer');
  const reporter = createProgressReporter(context.progress, { logger });
  const { signal } = context;

  try {
    // Names may carry meaningful surrounding spaces; only blank input is rejected.
    const input = request.source;
    if (input.trim().length === 0) {
      throw new TransferError('missing_argument', 'source playlist id or name is required');
    }

    throwIfCancelled(signal);
    await reporter.report('resolve_source', msg.fetchingSourceFrom(context.source.displayName));
    const source = await resolveSource(context.source, input, signal, logger);
    const total = source.tracks.length;
    await reporter.report('fetch_source', msg.foundPlaylist(source.playlist.name, total));

    const matches = await searchTracks(context.dest, source.tracks, reporter, signal);
    const matched = matches.flatMap((match) => (match.matched ? [match.matched] : []));
    const unmatched = matches.flatMap((match) => (match.matched ? [] : [match.original]));
    const successCount = matched.length;
    const failedCount = total - successCount;
    const successRate = total === 0 ? 0 : (successCount / total) * 100;

    if (successCount === 0) {
      throw new TransferError(
        'empty_result_set',
        total === 0
          ? `source playlist "${source.playlist.name}" has no tracks`
          : 'no tracks were matched - cannot create empty playlist',
        { details: { total, failed: failedCount } },
      );
    }

    throwIfCancelled(signal);
    await reporter.report('create_playlist', msg.creatingOn(context.dest.displayName));
    const destination = await createDestination(context, source, matched, request.destName);
    await reporter.report('create_playlist', msg.playlistCreated(destination.name, destination.id));

    logger.info(
      {
        source: source.playlist.id,
        destination: destination.id,
        total,
        matched: successCount,
        rate: formatPercentage(successRate),
      },
      'playlist transferred',
    );
    await reporter.report(
      'done',
      `Transferred ${successCount}/${total} tracks (${formatPercentage(successRate)})`,
    );

    return {
      source,
      destination,
      matches,
      total,
      successCount,
      failedCount,
      successRate,
      unmatched,
    };
  } finally {
    reporter.close();
  }
}

async function resolveSource(
  service: MusicService,
  input: string,
  signal: AbortSignal | undefined,
  logger: Logger,
): Promise<PlaylistExport> {
  try {
    return await service.exportPlaylist(input, { signal });
  } catch (error) {
    throwIfCancelled(signal);
    logger.debug({ input, reason: describeError(error) }, 'export by id failed, looking up by name');
  }

  let playlists: Playlist[];
  try {
    playlists = await service.getPlaylists({ signal });
  } catch (error) {
    throwIfCancelled(signal);
    throw toTransferError(error, 'api_request_failed', 'failed to get playlists');
  }

  const byName = playlists.find((playlist) => playlist.name === input);
  if (!byName) {
    throw new TransferError('playlist_not_found', `no playlist found with name '${input}'`);
  }

  try {
    return await service.exportPlaylist(byName.id, { signal });
  } catch (error) {
    throwIfCancelled(signal);
    throw toTransferError(error, 'api_request_failed', 'failed to export playlist');
  }
}

async function searchTracks(
  dest: MusicService,
  tracks: readonly Track[],
  reporter: ProgressReporter,
  signal: AbortSignal | undefined,
): Promise<TrackMatch[]> {
  const total = tracks.length;
  const matches: TrackMatch[] = [];

  await reporter.report('search_tracks', msg.searchingOn(dest.displayName), 0, total);

  for (const [index, original] of tracks.entries()) {
    throwIfCancelled(signal);
    await reporter.report(
      'search_tracks',
      msg.searchingTrack(index + 1, total, original.artist, original.title),
      index + 1,
      total,
    );

    try {
      const matched = await dest.searchTrack(original.title, original.artist, { signal });
      matches.push({ original, matched, error: null });
    } catch (error) {
      throwIfCancelled(signal);
      matches.push({
        original,
        matched: null,
        error: isTransferError(error, 'track_not_found')
          ? error
          : new TransferError(
              'track_not_found',
              `no match for ${original.artist} - ${original.title}: ${describeError(error)}`,
              { cause: error },
            ),
      });
    }
  }

  return matches;
}

async function createDestination(
  context: TransferContext,
  source: PlaylistExport,
  tracks: Track[],
  destName: string | null | undefined,
): Promise<Playlist> {
  const trimmedName = destName?.trim();
  const name = trimmedName && trimmedName.length > 0 ? trimmedName : source.playlist.name;

  const payload: PlaylistExport = {
    playlist: {
      id: '',
      name,
      description: `Migrated from ${context.source.displayName}: ${source.playlist.name}`,
      isPublic: false,
      trackCount: tracks.length,
    },
    tracks,
  };

  try {
    return await context.dest.importPlaylist(payload, { signal: context.signal });
  } catch (error) {
    throwIfCancelled(context.signal);
    throw toTransferError(error, 'api_request_failed', 'failed to create playlist');
  }
}
