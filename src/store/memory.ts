import { randomUUID } from 'crypto';

import { MatchController } from '../engine/controller.js';
import { resolveFormat } from '../formats/index.js';
import type { MatchSession, MatchStore, StartMatchParams } from './types.js';
import { MatchLookupError } from './types.js';

const DEFAULT_LOCATION = 'Unknown venue';

/**
 * Holds the one match being scored. Starting another match replaces it; there
 * is no history of earlier matches.
 */
export class MemoryMatchStore implements MatchStore {
  private active: MatchSession | null = null;

  constructor(private readonly defaultFormat: string = 'BO3') {}

  startMatch(params: StartMatchParams): MatchSession {
    const { format, fallback } = resolveFormat(params.format ?? this.defaultFormat);
    const matchId = randomUUID();

    const controller = MatchController.start({
      format,
      players: { A: params.players.A.trim(), B: params.players.B.trim() },
      location: params.location?.trim() || DEFAULT_LOCATION,
      startingServer: params.startingServer,
      hooks: {
        onChangeOfEnds: (points) => console.info('change_of_ends', { matchId, points }),
      },
    });

    if (fallback) {
      console.warn('format_fallback', { matchId, requested: params.format ?? null, used: format.code });
    }

    this.active = { matchId, startedAt: new Date(), formatFallback: fallback, controller };
    return this.active;
  }

  getActiveMatch(): MatchSession {
    if (!this.active) {
      throw new MatchLookupError('No match in progress');
    }
    return this.active;
  }

  hasActiveMatch() {
    return this.active !== null;
  }

  clear() {
    this.active = null;
  }
}
