import { renderCsv } from './csv';
import { renderJson } from './json';
import { renderM3U } from './m3u';
import type { ExportFormat, PlaylistRenderer } from './shared';

export * from './csv';
export * from './json';
export * from './m3u';
export * from './shared';

export const RENDERERS: Readonly<Record<ExportFormat, PlaylistRenderer>> = {
  json: renderJson,
  csv: renderCsv,
  m3u: renderM3U,
};
