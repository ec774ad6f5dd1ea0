import type { MatchState, SetRecord } from './types.js';
import { PLAYER_SIDES } from './types.js';
import { invariant } from './errors.js';
import { hasWonRace, setWinner } from './scoring.js';
import { tiebreakServer } from './rotation.js';
import { STATISTIC_KEYS, sumStatistics } from './statistics.js';

const isDeciderRow = (state: MatchState, index: number) =>
  state.format.decidingPolicy === 'MATCH_TIEBREAK_10' && index === 2;

const checkFinishedSet = (state: MatchState, set: SetRecord, index: number) => {
  const { format } = state;
  if (!set.tiebreakPlayed) {
    invariant(
      hasWonRace(set.games, format.gamesToWinSet),
      `set ${index + 1} finished at ${set.games.A}-${set.games.B} without a two-game lead`
    );
    return;
  }

  if (isDeciderRow(state, index)) {
    invariant(
      hasWonRace(set.tiebreakScore, format.decidingTiebreakTarget),
      `match tiebreak finished at ${set.tiebreakScore.A}-${set.tiebreakScore.B}`
    );
    return;
  }

  invariant(
    set.games.A === format.tiebreakAtGames && set.games.B === format.tiebreakAtGames,
    `set ${index + 1} tiebreak played at ${set.games.A}-${set.games.B}`
  );
  invariant(
    hasWonRace(set.tiebreakScore, format.setTiebreakTarget),
    `set ${index + 1} tiebreak finished at ${set.tiebreakScore.A}-${set.tiebreakScore.B}`
  );
};

/**
 * Contract checks run after every resolved point. A failure means the engine
 * itself is wrong, so it throws instead of trying to repair anything.
 */
export const assertMatchInvariants = (state: MatchState, historyDepth: number) => {
  invariant(
    state.log.length === historyDepth,
    `point log has ${state.log.length} entries but undo history has ${historyDepth}`
  );

  const setsWon = { A: 0, B: 0 };
  state.sets.forEach((set, index) => {
    if (set.finished) {
      checkFinishedSet(state, set, index);
      const winner = setWinner(set);
      if (winner) setsWon[winner] += 1;
    } else {
      invariant(index === state.sets.length - 1, `set ${index + 1} is unfinished but not the last set`);
    }
  });
  invariant(
    setsWon.A === state.setsWon.A && setsWon.B === state.setsWon.B,
    `sets won ${state.setsWon.A}-${state.setsWon.B} disagree with set rows ${setsWon.A}-${setsWon.B}`
  );

  if (state.phase === 'MATCH_TIEBREAK') {
    invariant(state.format.decidingPolicy === 'MATCH_TIEBREAK_10', 'match tiebreak under a regular-set format');
    invariant(state.sets.length === 2 && state.setsWon.A === 1 && state.setsWon.B === 1, 'match tiebreak before a 1-1 split');
    invariant(state.setStatistics.length === state.sets.length + 1, 'match tiebreak has no statistics bucket');
  } else {
    invariant(state.setStatistics.length === state.sets.length, 'per-set statistics out of step with set rows');
  }

  if (state.phase === 'SET_TIEBREAK' || state.phase === 'MATCH_TIEBREAK') {
    const start = state.tiebreakStartServer;
    if (start) {
      const played = state.tiebreakPoints.A + state.tiebreakPoints.B;
      invariant(state.server === tiebreakServer(start, played), `tiebreak server out of rotation at point ${played}`);
    } else {
      invariant(state.phase === 'MATCH_TIEBREAK', 'set tiebreak has no starting server');
    }
  }

  for (const side of PLAYER_SIDES) {
    const stats = state.statistics[side];
    invariant(
      stats.pointsPlayed === state.statistics.A.pointsWon + state.statistics.B.pointsWon,
      `player ${side} points played does not equal total points won`
    );

    const summed = sumStatistics(state.setStatistics.map((bucket) => bucket[side]));
    for (const key of STATISTIC_KEYS) {
      invariant(summed[key] === stats[key], `player ${side} ${key}: match ${stats[key]} vs sets ${summed[key]}`);
    }
  }
};
