export type PlayerSide = 'A' | 'B';

export interface SideCounts { A: number; B: number; }

export type DecidingPolicy = 'REGULAR_THIRD_SET' | 'MATCH_TIEBREAK_10';

export type FormatCode = 'BO3' | 'BO3_MTB10' | 'SHORT4';

export interface MatchFormat {
  code: FormatCode;
  label: string;
  gamesToWinSet: number;
  tiebreakAtGames: number;
  setTiebreakTarget: number;
  decidingPolicy: DecidingPolicy;
  decidingTiebreakTarget: number;
  setsToWin: number;
}

export type MatchPhase = 'REGULAR_GAME' | 'SET_TIEBREAK' | 'MATCH_TIEBREAK' | 'MATCH_COMPLETE';

export type ServeType = 'FIRST' | 'SECOND';

export const SERVE_OUTCOMES = [
  'FIRST_IN',
  'FIRST_FAULT',
  'SECOND_IN',
  'DOUBLE_FAULT',
  'ACE_FIRST',
  'ACE_SECOND',
  'SERVICE_WINNER_FIRST',
  'SERVICE_WINNER_SECOND',
] as const;
export type ServeOutcome = (typeof SERVE_OUTCOMES)[number];

export const RETURN_OUTCOMES = [
  'RETURN_WINNER',
  'RETURN_UNFORCED_ERROR',
  'RETURN_FORCED_ERROR',
  'RETURN_IN',
] as const;
export type ReturnOutcome = (typeof RETURN_OUTCOMES)[number];

export const RALLY_OUTCOMES = [
  'SERVER_WINNER',
  'RETURNER_WINNER',
  'SERVER_UNFORCED_ERROR',
  'RETURNER_UNFORCED_ERROR',
  'SERVER_FORCED_ERROR_DRAWN',
  'RETURNER_FORCED_ERROR_DRAWN',
] as const;
export type RallyOutcome = (typeof RALLY_OUTCOMES)[number];

/**
 * The single event that decided a point. Every resolved point maps to exactly
 * one of these; the statistics aggregator keys off it.
 */
export type TerminalOutcome =
  | { kind: 'DOUBLE_FAULT' }
  | { kind: 'ACE'; serveType: ServeType }
  | { kind: 'SERVICE_WINNER'; serveType: ServeType }
  | { kind: 'RETURN'; outcome: Exclude<ReturnOutcome, 'RETURN_IN'> }
  | { kind: 'RALLY'; outcome: RallyOutcome };

export interface PointEvent {
  serve: ServeOutcome[];
  return?: ReturnOutcome;
  rally?: RallyOutcome;
  netMark?: PlayerSide;
}

export interface PointContext {
  breakPoint: boolean;
  gamePoint: boolean;
  setPoint: boolean;
  matchPoint: boolean;
}

export interface PointRecord {
  index: number;
  setIndex: number;
  gameIndex: number;
  inTiebreak: boolean;
  pointNumber: number;
  server: PlayerSide;
  serveType: ServeType;
  event: PointEvent;
  outcome: TerminalOutcome;
  winner: PlayerSide;
  wasBreakPoint: boolean;
  wasGamePoint: boolean;
  wasSetPoint: boolean;
  wasMatchPoint: boolean;
}

export interface SetRecord {
  games: SideCounts;
  finished: boolean;
  tiebreakPlayed: boolean;
  tiebreakScore: SideCounts;
}

export interface PlayerStatistics {
  firstServesAttempted: number;
  firstServesIn: number;
  secondServesAttempted: number;
  secondServesIn: number;
  acesFirst: number;
  acesSecond: number;
  serviceWinnersFirst: number;
  serviceWinnersSecond: number;
  doubleFaults: number;
  pointsWonOnFirstServe: number;
  pointsWonOnSecondServe: number;
  returnPointsWonVsFirst: number;
  returnPointsWonVsSecond: number;
  returnWinners: number;
  returnUnforcedErrors: number;
  returnForcedErrors: number;
  rallyWinners: number;
  unforcedErrors: number;
  forcedErrorsDrawn: number;
  netPointsWon: number;
  netPointsTotal: number;
  breakPointsWon: number;
  breakPointsTotal: number;
  pointsWon: number;
  pointsPlayed: number;
}

export type StatisticKey = keyof PlayerStatistics;

export type SideStatistics = Record<PlayerSide, PlayerStatistics>;

export interface MatchState {
  format: MatchFormat;
  players: Record<PlayerSide, string>;
  location: string;
  sets: SetRecord[];
  // One entry per set; during a match tiebreak it runs one ahead of `sets`.
  setStatistics: SideStatistics[];
  currentSetIndex: number;
  gamePoints: SideCounts;
  phase: MatchPhase;
  tiebreakPoints: SideCounts;
  tiebreakStartServer: PlayerSide | null;
  server: PlayerSide;
  setsWon: SideCounts;
  statistics: SideStatistics;
  log: PointRecord[];
  endedEarly: boolean;
}

export type Transition =
  | 'GAME_WON'
  | 'SET_TIEBREAK_STARTED'
  | 'SET_WON'
  | 'NEW_SET_STARTED'
  | 'MATCH_TIEBREAK_STARTED'
  | 'MATCH_WON';

export type StatisticsScope = { kind: 'match' } | { kind: 'set'; index: number };

export const opponentOf = (side: PlayerSide): PlayerSide => (side === 'A' ? 'B' : 'A');

export const PLAYER_SIDES: readonly PlayerSide[] = ['A', 'B'];
