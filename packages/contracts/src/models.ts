/**
 * Transfer data model shared by the engine, the providers and the exporters.
 * Everything here is a per-invocation value: built from a provider response and
 * never mutated afterwards.
 */

export interface Track {
  /** Provider scoped identifier (Spotify track id, YouTube video id, ...). */
  readonly id: string;
  readonly title: string;
  readonly artist: string;
  readonly album?: string | null;
  readonly durationSec: number;
  /** International Standard Recording Code, when the catalog exposes one. */
  readonly isrc?: string | null;
}

export interface Playlist {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly isPublic: boolean;
  readonly trackCount: number;
}

/** Playlist metadata plus its complete ordered track list, fetched in one call. */
export interface PlaylistExport {
  readonly playlist: Playlist;
  readonly tracks: readonly Track[];
}
