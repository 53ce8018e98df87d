import type { PlaylistExport } from '@app/contracts';

export type ExportFormat = 'json' | 'csv' | 'm3u';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['json', 'csv', 'm3u'];

export const isExportFormat = (value: string): value is ExportFormat =>
  EXPORT_FORMATS.some((format) => format === value);

export type PlaylistRenderer = (playlist: PlaylistExport) => string;

const SLUG_FALLBACK = 'playlist';

/**
 * File-system safe base name: lowercase ASCII words joined by dashes.
 * Names with nothing usable collapse to `playlist`.
 */
export const slugify = (name: string): string => {
  const slug = name
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, 80)
    .replace(/-+$/g, '');

  return slug === '' ? SLUG_FALLBACK : slug;
};
