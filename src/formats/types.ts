import type { FormatCode, MatchFormat } from '../engine/types.js';

export interface RegisteredFormat {
  code: FormatCode;
  // Menu number shown to the operator when picking a format.
  choice: number;
  format: MatchFormat;
}

export interface FormatResolution {
  format: MatchFormat;
  fallback: boolean;
}
