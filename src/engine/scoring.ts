import type {
  MatchFormat,
  MatchState,
  PlayerSide,
  SetRecord,
  SideCounts,
  Transition,
} from './types.js';
import { opponentOf } from './types.js';
import { createSideStatistics } from './statistics.js';
import { tiebreakServer } from './rotation.js';
import { InvariantViolationError } from './errors.js';

export interface NewMatchInput {
  format: MatchFormat;
  players: Record<PlayerSide, string>;
  location: string;
  startingServer: PlayerSide;
}

const zeroCounts = (): SideCounts => ({ A: 0, B: 0 });

const emptySet = (): SetRecord => ({
  games: zeroCounts(),
  finished: false,
  tiebreakPlayed: false,
  tiebreakScore: zeroCounts(),
});

// Reached `target` and leads by two.
export const hasWonRace = (counts: SideCounts, target: number) =>
  Math.max(counts.A, counts.B) >= target && Math.abs(counts.A - counts.B) >= 2;

export const leader = (counts: SideCounts): PlayerSide => (counts.A > counts.B ? 'A' : 'B');

export const setWinner = (set: SetRecord): PlayerSide | null => {
  if (!set.finished) return null;
  return set.tiebreakPlayed ? leader(set.tiebreakScore) : leader(set.games);
};

export const createMatchState = (input: NewMatchInput): MatchState => {
  const state: MatchState = {
    format: input.format,
    players: { ...input.players },
    location: input.location,
    sets: [],
    setStatistics: [],
    currentSetIndex: 0,
    gamePoints: zeroCounts(),
    phase: 'REGULAR_GAME',
    tiebreakPoints: zeroCounts(),
    tiebreakStartServer: null,
    server: input.startingServer,
    setsWon: zeroCounts(),
    statistics: createSideStatistics(),
    log: [],
    endedEarly: false,
  };
  startNewSet(state);
  return state;
};

export const currentSet = (state: MatchState): SetRecord => {
  const set = state.sets[state.currentSetIndex];
  if (!set) throw new InvariantViolationError(`set ${state.currentSetIndex} does not exist`);
  return set;
};

const startNewSet = (state: MatchState) => {
  state.sets.push(emptySet());
  state.setStatistics.push(createSideStatistics());
  state.currentSetIndex = state.sets.length - 1;
  state.gamePoints = zeroCounts();
  state.tiebreakPoints = zeroCounts();
  state.tiebreakStartServer = null;
  state.phase = 'REGULAR_GAME';
};

const startMatchTiebreak = (state: MatchState) => {
  // The decider gets its statistics bucket now; its set row only once it is won.
  state.setStatistics.push(createSideStatistics());
  state.currentSetIndex = state.sets.length;
  state.gamePoints = zeroCounts();
  state.tiebreakPoints = zeroCounts();
  state.tiebreakStartServer = null;
  state.phase = 'MATCH_TIEBREAK';
};

const closeSet = (state: MatchState, winner: PlayerSide, transitions: Transition[]) => {
  currentSet(state).finished = true;
  state.setsWon[winner] += 1;
  transitions.push('SET_WON');

  if (state.setsWon[winner] >= state.format.setsToWin) {
    state.phase = 'MATCH_COMPLETE';
    transitions.push('MATCH_WON');
    return;
  }

  if (
    state.sets.length === 2 &&
    state.format.decidingPolicy === 'MATCH_TIEBREAK_10' &&
    state.setsWon.A === 1 &&
    state.setsWon.B === 1
  ) {
    startMatchTiebreak(state);
    transitions.push('MATCH_TIEBREAK_STARTED');
    return;
  }

  startNewSet(state);
  transitions.push('NEW_SET_STARTED');
};

const awardRegularPoint = (state: MatchState, winner: PlayerSide, transitions: Transition[]) => {
  state.gamePoints[winner] += 1;
  if (!hasWonRace(state.gamePoints, 4)) return;

  const set = currentSet(state);
  const gameWinner = leader(state.gamePoints);
  set.games[gameWinner] += 1;
  state.gamePoints = zeroCounts();
  state.server = opponentOf(state.server);
  transitions.push('GAME_WON');

  const trigger = state.format.tiebreakAtGames;
  if (set.games.A === trigger && set.games.B === trigger) {
    set.tiebreakPlayed = true;
    state.tiebreakPoints = zeroCounts();
    // whoever is next to serve opens the tiebreak
    state.tiebreakStartServer = state.server;
    state.phase = 'SET_TIEBREAK';
    transitions.push('SET_TIEBREAK_STARTED');
    return;
  }

  if (hasWonRace(set.games, state.format.gamesToWinSet)) {
    closeSet(state, leader(set.games), transitions);
  }
};

const awardSetTiebreakPoint = (state: MatchState, winner: PlayerSide, transitions: Transition[]) => {
  const start = state.tiebreakStartServer;
  if (!start) throw new InvariantViolationError('set tiebreak has no starting server');

  state.tiebreakPoints[winner] += 1;
  const played = state.tiebreakPoints.A + state.tiebreakPoints.B;

  if (!hasWonRace(state.tiebreakPoints, state.format.setTiebreakTarget)) {
    state.server = tiebreakServer(start, played);
    return;
  }

  const set = currentSet(state);
  set.tiebreakScore = { ...state.tiebreakPoints };
  // The player who received first in the tiebreak serves the next game.
  state.server = opponentOf(start);
  closeSet(state, leader(state.tiebreakPoints), transitions);
};

const awardMatchTiebreakPoint = (state: MatchState, winner: PlayerSide, transitions: Transition[]) => {
  const start = state.tiebreakStartServer;
  if (!start) throw new InvariantViolationError('match tiebreak has no starting server');

  state.tiebreakPoints[winner] += 1;
  const played = state.tiebreakPoints.A + state.tiebreakPoints.B;

  if (!hasWonRace(state.tiebreakPoints, state.format.decidingTiebreakTarget)) {
    state.server = tiebreakServer(start, played);
    return;
  }

  const tiebreakWinner = leader(state.tiebreakPoints);
  const lastSet = state.sets[state.sets.length - 1];
  if (!lastSet) throw new InvariantViolationError('match tiebreak without a completed set');

  // Synthetic row so reports can show the decider as a set.
  state.sets.push({
    games: { ...lastSet.games },
    finished: true,
    tiebreakPlayed: true,
    tiebreakScore: { ...state.tiebreakPoints },
  });
  state.setsWon[tiebreakWinner] += 1;
  state.phase = 'MATCH_COMPLETE';
  transitions.push('SET_WON', 'MATCH_WON');
};

/**
 * Advances the score after `winner` takes a point and reports the
 * transitions it caused, in order.
 */
export const awardPoint = (state: MatchState, winner: PlayerSide): Transition[] => {
  const transitions: Transition[] = [];
  switch (state.phase) {
    case 'REGULAR_GAME':
      awardRegularPoint(state, winner, transitions);
      break;
    case 'SET_TIEBREAK':
      awardSetTiebreakPoint(state, winner, transitions);
      break;
    case 'MATCH_TIEBREAK':
      awardMatchTiebreakPoint(state, winner, transitions);
      break;
    case 'MATCH_COMPLETE':
      throw new InvariantViolationError('cannot award a point after the match is complete');
  }
  return transitions;
};

export const matchWinner = (state: MatchState): PlayerSide | null => {
  if (state.phase !== 'MATCH_COMPLETE') return null;
  return state.setsWon.A > state.setsWon.B ? 'A' : 'B';
};
