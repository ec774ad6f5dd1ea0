import type { MatchController } from '../engine/controller.js';
import type { PlayerSide } from '../engine/types.js';

export { MatchLookupError } from './errors.js';

export interface StartMatchParams {
  format?: string | number | null;
  players: Record<PlayerSide, string>;
  location?: string | null;
  startingServer: PlayerSide;
}

export interface MatchSession {
  matchId: string;
  startedAt: Date;
  formatFallback: boolean;
  controller: MatchController;
}

export interface MatchStore {
  startMatch(params: StartMatchParams): MatchSession;
  getActiveMatch(): MatchSession;
  hasActiveMatch(): boolean;
  clear(): void;
}
