import type { PlaylistExport, Track } from '@app/contracts';

export const CSV_COLUMNS = ['id', 'title', 'artist', 'album', 'duration_sec', 'isrc'] as const;

type CsvColumn = (typeof CSV_COLUMNS)[number];
type CsvRow = Record<CsvColumn, string>;

const NEWLINE = '\r\n';
const SPECIAL_CHARS_REGEX = /[",\r\n]/;

const quoteValue = (value: string): string => {
  if (value === '') {
    return '';
  }

  return SPECIAL_CHARS_REGEX.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
};

const stringOrEmpty = (value: string | null | undefined): string => value ?? '';

const buildRow = (track: Track): CsvRow => ({
  id: track.id,
  title: track.title,
  artist: track.artist,
  album: stringOrEmpty(track.album),
  duration_sec: String(track.durationSec),
  isrc: stringOrEmpty(track.isrc),
});

const renderRow = (row: CsvRow): string =>
  CSV_COLUMNS.map((column) => quoteValue(row[column])).join(',');

export const renderCsv = (playlist: PlaylistExport): string => {
  const lines: string[] = [CSV_COLUMNS.join(',')];

  for (const track of playlist.tracks) {
    lines.push(renderRow(buildRow(track)));
  }

  return `${lines.join(NEWLINE)}${NEWLINE}`;
};
