import type { PlayerSide } from './types.js';
import { opponentOf } from './types.js';

const POINTS_PER_END = 6;

// 1-2-2 pattern from the starting server S: S, O, O, S, S, O, O, S, ...
export const tiebreakServer = (start: PlayerSide, pointsPlayed: number): PlayerSide => {
  const mod4 = pointsPlayed % 4;
  return mod4 === 0 || mod4 === 3 ? start : opponentOf(start);
};

export const isChangeOfEnds = (pointsPlayed: number) =>
  pointsPlayed > 0 && pointsPlayed % POINTS_PER_END === 0;
