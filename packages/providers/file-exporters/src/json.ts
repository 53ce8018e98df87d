import type { PlaylistExport } from '@app/contracts';

export const renderJson = (playlist: PlaylistExport): string =>
  `${JSON.stringify(playlist, null, 2)}\n`;
