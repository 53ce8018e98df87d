import type { PlaylistExport, Track } from '@app/contracts';

const formatDurationSeconds = (duration: number): number => {
  if (!Number.isFinite(duration)) {
    return -1;
  }

  const seconds = Math.round(duration);
  return seconds >= 0 ? seconds : -1;
};

// Line breaks would split an entry in two.
const singleLine = (value: string): string => value.replace(/[\r\n]+/g, ' ');

const formatExtInf = (track: Track): string => {
  const duration = formatDurationSeconds(track.durationSec);
  return `#EXTINF:${duration},${singleLine(track.artist)} - ${singleLine(track.title)}`;
};

export const renderM3U = (playlist: PlaylistExport): string => {
  const lines: string[] = ['#EXTM3U', `#PLAYLIST:${singleLine(playlist.playlist.name)}`];

  for (const track of playlist.tracks) {
    lines.push(formatExtInf(track));
    lines.push(singleLine(track.title));
  }

  return `${lines.join('\n')}\n`;
};
