import type { Playlist, PlaylistExport, Track } from './models';

/** Observed provider cap for items added to a playlist in one request. */
export const IMPORT_BATCH_SIZE = 100;

export type Credentials = Record<string, string>;

export interface CallOptions {
  /** Aborts in-flight requests of the call. */
  signal?: AbortSignal;
}

/**
 * Capability set every streaming backend implements. Providers are independent
 * classes that satisfy this interface structurally; they share no base class.
 */
export interface MusicService {
  /** Display label, used in diagnostics and progress messages only. */
  readonly displayName: string;

  /** Rejects with `not_authenticated` when the credentials are incomplete. */
  authenticate(credentials: Credentials, options?: CallOptions): Promise<void>;

  /** Metadata only; no guaranteed track content. */
  getPlaylists(options?: CallOptions): Promise<Playlist[]>;
  getPlaylist(playlistId: string, options?: CallOptions): Promise<Playlist>;

  /** Rejects with `playlist_not_found` when the id is unknown. */
  exportPlaylist(playlistId: string, options?: CallOptions): Promise<PlaylistExport>;

  /**
   * Creates a new playlist and adds `playlist.tracks` to it, in batches of at
   * most IMPORT_BATCH_SIZE where the provider limits batch size.
   */
  importPlaylist(playlist: PlaylistExport, options?: CallOptions): Promise<Playlist>;

  /** Best match for the title and artist, or rejects with `track_not_found`. */
  searchTrack(title: string, artist: string, options?: CallOptions): Promise<Track>;
}
