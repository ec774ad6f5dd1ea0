import type { FormatResolution } from './types.js';
import { FALLBACK_FORMAT_CODE, tennisFormats } from './tennis.js';

export type { FormatResolution, RegisteredFormat } from './types.js';

const registry = [...tennisFormats];

export const listSupportedFormats = () =>
  registry.map((entry) => ({
    code: entry.code,
    choice: entry.choice,
    label: entry.format.label,
    games_to_win_set: entry.format.gamesToWinSet,
    tiebreak_at_games: entry.format.tiebreakAtGames,
    set_tiebreak_target: entry.format.setTiebreakTarget,
    deciding_policy: entry.format.decidingPolicy,
    deciding_tiebreak_target: entry.format.decidingTiebreakTarget,
  }));

const findFallback = () => {
  const entry = registry.find((candidate) => candidate.code === FALLBACK_FORMAT_CODE);
  if (!entry) throw new Error(`fallback format ${FALLBACK_FORMAT_CODE} is not registered`);
  return entry;
};

/**
 * Looks a format up by code (case-insensitive) or by its menu number.
 * Unknown selections fall back to short sets rather than failing.
 */
export const resolveFormat = (selection?: string | number | null): FormatResolution => {
  const raw = selection === undefined || selection === null ? '' : String(selection).trim();

  const handler = registry.find(
    (entry) => entry.code === raw.toUpperCase() || String(entry.choice) === raw
  );

  if (handler) {
    return { format: handler.format, fallback: false };
  }

  return { format: findFallback().format, fallback: true };
};
