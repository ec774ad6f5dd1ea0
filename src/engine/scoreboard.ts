import type { MatchPhase, MatchState, PlayerSide, SideCounts, SetRecord } from './types.js';
import { isInTiebreak } from './context.js';
import { isChangeOfEnds } from './rotation.js';
import { matchWinner } from './scoring.js';

const POINT_CALLS = ['0', '15', '30', '40'];

const pointCall = (points: number) => POINT_CALLS[Math.min(points, 3)] ?? '0';

export const formatGamePoints = (points: SideCounts): Record<PlayerSide, string> => {
  const { A, B } = points;
  if (A >= 3 && B >= 3) {
    if (A === B) return { A: '40', B: '40' };
    if (A === B + 1) return { A: 'Ad', B: '' };
    if (B === A + 1) return { A: '', B: 'Ad' };
  }
  return { A: pointCall(A), B: pointCall(B) };
};

export interface Scoreboard {
  players: Record<PlayerSide, string>;
  location: string;
  formatCode: string;
  phase: MatchPhase;
  server: PlayerSide;
  setsWon: SideCounts;
  games: SideCounts;
  points: Record<PlayerSide, string>;
  rawPoints: SideCounts;
  inTiebreak: boolean;
  changeOfEnds: boolean;
  awaitingMatchTiebreakServer: boolean;
  sets: SetRecord[];
  winner: PlayerSide | null;
  endedEarly: boolean;
}

export const buildScoreboard = (state: MatchState): Scoreboard => {
  const tiebreak = isInTiebreak(state);
  // During a match tiebreak there is no live set row; show the last set's games.
  const set = state.sets[state.currentSetIndex] ?? state.sets[state.sets.length - 1];
  const raw = tiebreak ? state.tiebreakPoints : state.gamePoints;
  const tiebreakPlayed = state.tiebreakPoints.A + state.tiebreakPoints.B;

  return {
    players: { ...state.players },
    location: state.location,
    formatCode: state.format.code,
    phase: state.phase,
    server: state.server,
    setsWon: { ...state.setsWon },
    games: set ? { ...set.games } : { A: 0, B: 0 },
    points: tiebreak ? { A: String(raw.A), B: String(raw.B) } : formatGamePoints(raw),
    rawPoints: { ...raw },
    inTiebreak: tiebreak,
    changeOfEnds: tiebreak && isChangeOfEnds(tiebreakPlayed),
    awaitingMatchTiebreakServer: state.phase === 'MATCH_TIEBREAK' && state.tiebreakStartServer === null,
    sets: state.sets.map((row) => structuredClone(row)),
    winner: matchWinner(state),
    endedEarly: state.endedEarly,
  };
};
