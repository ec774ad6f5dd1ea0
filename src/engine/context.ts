import type { MatchState, PlayerSide, PointContext } from './types.js';
import { opponentOf } from './types.js';

export const isInTiebreak = (state: MatchState) =>
  state.phase === 'SET_TIEBREAK' || state.phase === 'MATCH_TIEBREAK';

// At 40 against anything short of 40, or holding the advantage.
export const isGamePointFor = (points: number, opponentPoints: number) =>
  points >= 3 && (opponentPoints <= 2 || points === opponentPoints + 1);

export const isBreakPoint = (state: MatchState) => {
  if (isInTiebreak(state)) return false;
  const receiver = opponentOf(state.server);
  return isGamePointFor(state.gamePoints[receiver], state.gamePoints[state.server]);
};

export const isGamePoint = (state: MatchState) => {
  if (isInTiebreak(state)) return false;
  const { A, B } = state.gamePoints;
  return isGamePointFor(A, B) || isGamePointFor(B, A);
};

export const isSetPointFor = (state: MatchState, side: PlayerSide) => {
  if (isInTiebreak(state)) return false;
  const set = state.sets[state.currentSetIndex];
  if (!set) return false;

  const opponent = opponentOf(side);
  if (!isGamePointFor(state.gamePoints[side], state.gamePoints[opponent])) return false;

  const gamesAfter = set.games[side] + 1;
  return gamesAfter >= state.format.gamesToWinSet && gamesAfter - set.games[opponent] >= 2;
};

export const isMatchPointFor = (state: MatchState, side: PlayerSide) =>
  isSetPointFor(state, side) && state.setsWon[side] === state.format.setsToWin - 1;

/** Pre-point flags, evaluated before the point is resolved. */
export const classifyPoint = (state: MatchState): PointContext => ({
  breakPoint: isBreakPoint(state),
  gamePoint: isGamePoint(state),
  setPoint: isSetPointFor(state, 'A') || isSetPointFor(state, 'B'),
  matchPoint: isMatchPointFor(state, 'A') || isMatchPointFor(state, 'B'),
});
