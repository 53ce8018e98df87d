export type ProgressPhase =
  | 'resolve_source'
  | 'fetch_source'
  | 'fetch_dest'
  | 'search_tracks'
  | 'compare'
  | 'create_playlist'
  | 'export_playlist'
  | 'done';

/** Advisory notification for presentation layers; carries no control flow. */
export interface ProgressUpdate {
  phase: ProgressPhase;
  step: number;
  total: number;
  message: string;
}
