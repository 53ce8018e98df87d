import type { Track } from '@app/contracts';

export type MatchRule = 'isrc' | 'metadata';

type IdentityFields = Pick<Track, 'title' | 'artist' | 'isrc'>;

/** Lowercase, trim and collapse whitespace runs to a single space. */
export function normalize(value: string): string {
  return value.trim().toLowerCase().replace(/\s+/g, ' ');
}

export function hasIsrc(track: Pick<Track, 'isrc'>): boolean {
  return isrcOf(track) !== null;
}

function isrcOf(track: Pick<Track, 'isrc'>): string | null {
  const { isrc } = track;
  return typeof isrc === 'string' && isrc.trim() !== '' ? isrc : null;
}

export function trackKey(track: Pick<Track, 'title' | 'artist'>): string {
  return `${normalize(track.title)}|${normalize(track.artist)}`;
}

/**
 * ISRC equality wins when both sides carry one; otherwise (or when the codes
 * differ) the normalized title/artist key decides.
 */
export function matchRule(a: IdentityFields, b: IdentityFields): MatchRule | null {
  const isrc = isrcOf(a);
  if (isrc !== null && isrc === isrcOf(b)) {
    return 'isrc';
  }
  if (trackKey(a) === trackKey(b)) {
    return 'metadata';
  }
  return null;
}

export function tracksMatch(a: IdentityFields, b: IdentityFields): boolean {
  return matchRule(a, b) !== null;
}

/** Membership index over one playlist's tracks. First occurrence wins. */
export class TrackIndex<T extends IdentityFields = Track> {
  private readonly byIsrc = new Map<string, T>();
  private readonly byKey = new Map<string, T>();

  constructor(tracks: Iterable<T> = []) {
    for (const track of tracks) {
      this.add(track);
    }
  }

  add(track: T): void {
    const isrc = isrcOf(track);
    if (isrc !== null && !this.byIsrc.has(isrc)) {
      this.byIsrc.set(isrc, track);
    }
    const key = trackKey(track);
    if (!this.byKey.has(key)) {
      this.byKey.set(key, track);
    }
  }

  find(track: IdentityFields): { track: T; rule: MatchRule } | null {
    const isrc = isrcOf(track);
    if (isrc !== null) {
      const byIsrc = this.byIsrc.get(isrc);
      if (byIsrc) return { track: byIsrc, rule: 'isrc' };
    }
    const hit = this.byKey.get(trackKey(track));
    return hit ? { track: hit, rule: 'metadata' } : null;
  }

  has(track: IdentityFields): boolean {
    return this.find(track) !== null;
  }
}
