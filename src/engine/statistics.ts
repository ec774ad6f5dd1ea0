import type {
  MatchState,
  PlayerSide,
  PlayerStatistics,
  RallyOutcome,
  ReturnOutcome,
  ServeOutcome,
  ServeType,
  SideStatistics,
  StatisticKey,
  TerminalOutcome,
} from './types.js';
import { opponentOf } from './types.js';
import { InvariantViolationError } from './errors.js';

export const STATISTIC_KEYS: readonly StatisticKey[] = [
  'firstServesAttempted',
  'firstServesIn',
  'secondServesAttempted',
  'secondServesIn',
  'acesFirst',
  'acesSecond',
  'serviceWinnersFirst',
  'serviceWinnersSecond',
  'doubleFaults',
  'pointsWonOnFirstServe',
  'pointsWonOnSecondServe',
  'returnPointsWonVsFirst',
  'returnPointsWonVsSecond',
  'returnWinners',
  'returnUnforcedErrors',
  'returnForcedErrors',
  'rallyWinners',
  'unforcedErrors',
  'forcedErrorsDrawn',
  'netPointsWon',
  'netPointsTotal',
  'breakPointsWon',
  'breakPointsTotal',
  'pointsWon',
  'pointsPlayed',
];

export const createPlayerStatistics = (): PlayerStatistics => ({
  firstServesAttempted: 0,
  firstServesIn: 0,
  secondServesAttempted: 0,
  secondServesIn: 0,
  acesFirst: 0,
  acesSecond: 0,
  serviceWinnersFirst: 0,
  serviceWinnersSecond: 0,
  doubleFaults: 0,
  pointsWonOnFirstServe: 0,
  pointsWonOnSecondServe: 0,
  returnPointsWonVsFirst: 0,
  returnPointsWonVsSecond: 0,
  returnWinners: 0,
  returnUnforcedErrors: 0,
  returnForcedErrors: 0,
  rallyWinners: 0,
  unforcedErrors: 0,
  forcedErrorsDrawn: 0,
  netPointsWon: 0,
  netPointsTotal: 0,
  breakPointsWon: 0,
  breakPointsTotal: 0,
  pointsWon: 0,
  pointsPlayed: 0,
});

export const createSideStatistics = (): SideStatistics => ({
  A: createPlayerStatistics(),
  B: createPlayerStatistics(),
});

export const sumStatistics = (items: PlayerStatistics[]): PlayerStatistics => {
  const total = createPlayerStatistics();
  for (const item of items) {
    for (const key of STATISTIC_KEYS) {
      total[key] += item[key];
    }
  }
  return total;
};

type Role = 'SERVER' | 'RETURNER';

// Placeholders resolved against the serve type in play.
type Counter = StatisticKey | 'SERVE_POINT_WON' | 'RETURN_POINT_WON';

interface OutcomeEffect {
  winner: Role;
  server: Counter[];
  returner: Counter[];
}

const byServe = (serveType: ServeType, first: StatisticKey, second: StatisticKey) =>
  serveType === 'FIRST' ? first : second;

const returnEffect = (outcome: Exclude<ReturnOutcome, 'RETURN_IN'>): OutcomeEffect => {
  switch (outcome) {
    case 'RETURN_WINNER':
      return { winner: 'RETURNER', server: [], returner: ['returnWinners', 'RETURN_POINT_WON'] };
    case 'RETURN_UNFORCED_ERROR':
      return { winner: 'SERVER', server: ['SERVE_POINT_WON'], returner: ['returnUnforcedErrors'] };
    case 'RETURN_FORCED_ERROR':
      return {
        winner: 'SERVER',
        server: ['SERVE_POINT_WON', 'forcedErrorsDrawn'],
        returner: ['returnForcedErrors'],
      };
  }
};

const rallyEffect = (outcome: RallyOutcome): OutcomeEffect => {
  switch (outcome) {
    case 'SERVER_WINNER':
      return { winner: 'SERVER', server: ['rallyWinners', 'SERVE_POINT_WON'], returner: [] };
    case 'RETURNER_WINNER':
      return { winner: 'RETURNER', server: [], returner: ['rallyWinners', 'RETURN_POINT_WON'] };
    case 'SERVER_UNFORCED_ERROR':
      return { winner: 'RETURNER', server: ['unforcedErrors'], returner: ['RETURN_POINT_WON'] };
    case 'RETURNER_UNFORCED_ERROR':
      return { winner: 'SERVER', server: ['SERVE_POINT_WON'], returner: ['unforcedErrors'] };
    case 'SERVER_FORCED_ERROR_DRAWN':
      return { winner: 'RETURNER', server: [], returner: ['forcedErrorsDrawn', 'RETURN_POINT_WON'] };
    case 'RETURNER_FORCED_ERROR_DRAWN':
      return { winner: 'SERVER', server: ['forcedErrorsDrawn', 'SERVE_POINT_WON'], returner: [] };
  }
};

const outcomeEffect = (outcome: TerminalOutcome): OutcomeEffect => {
  switch (outcome.kind) {
    case 'DOUBLE_FAULT':
      // The fault itself is counted with the serve attempts.
      return { winner: 'RETURNER', server: [], returner: [] };
    case 'ACE':
      return {
        winner: 'SERVER',
        server: [byServe(outcome.serveType, 'acesFirst', 'acesSecond'), 'SERVE_POINT_WON'],
        returner: [],
      };
    case 'SERVICE_WINNER':
      return {
        winner: 'SERVER',
        server: [
          byServe(outcome.serveType, 'serviceWinnersFirst', 'serviceWinnersSecond'),
          'SERVE_POINT_WON',
        ],
        returner: [],
      };
    case 'RETURN':
      return returnEffect(outcome.outcome);
    case 'RALLY':
      return rallyEffect(outcome.outcome);
  }
};

export const pointWinner = (outcome: TerminalOutcome, server: PlayerSide): PlayerSide => {
  const { winner } = outcomeEffect(outcome);
  return winner === 'SERVER' ? server : opponentOf(server);
};

const serveAttemptCounters = (serve: ServeOutcome): StatisticKey[] => {
  switch (serve) {
    case 'FIRST_FAULT':
      return ['firstServesAttempted'];
    case 'FIRST_IN':
    case 'ACE_FIRST':
    case 'SERVICE_WINNER_FIRST':
      return ['firstServesAttempted', 'firstServesIn'];
    case 'SECOND_IN':
    case 'ACE_SECOND':
    case 'SERVICE_WINNER_SECOND':
      return ['secondServesAttempted', 'secondServesIn'];
    case 'DOUBLE_FAULT':
      return ['secondServesAttempted', 'doubleFaults'];
  }
};

export interface ResolvedPoint {
  server: PlayerSide;
  serveSequence: ServeOutcome[];
  serveType: ServeType;
  outcome: TerminalOutcome;
  netMark?: PlayerSide;
  breakPoint: boolean;
}

/**
 * Applies one resolved point to the match-scope and current-set statistics.
 * Returns the point winner.
 */
export const attributePoint = (state: MatchState, point: ResolvedPoint): PlayerSide => {
  const setStats = state.setStatistics[state.currentSetIndex];
  if (!setStats) {
    throw new InvariantViolationError(`no statistics bucket for set index ${state.currentSetIndex}`);
  }

  const bump = (side: PlayerSide, key: StatisticKey) => {
    state.statistics[side][key] += 1;
    setStats[side][key] += 1;
  };

  const server = point.server;
  const returner = opponentOf(server);
  const resolveCounter = (counter: Counter): StatisticKey => {
    if (counter === 'SERVE_POINT_WON') {
      return byServe(point.serveType, 'pointsWonOnFirstServe', 'pointsWonOnSecondServe');
    }
    if (counter === 'RETURN_POINT_WON') {
      return byServe(point.serveType, 'returnPointsWonVsFirst', 'returnPointsWonVsSecond');
    }
    return counter;
  };

  for (const serve of point.serveSequence) {
    for (const key of serveAttemptCounters(serve)) bump(server, key);
  }

  const effect = outcomeEffect(point.outcome);
  for (const counter of effect.server) bump(server, resolveCounter(counter));
  for (const counter of effect.returner) bump(returner, resolveCounter(counter));

  const winner = effect.winner === 'SERVER' ? server : returner;
  const loser = opponentOf(winner);
  bump(winner, 'pointsWon');
  bump(winner, 'pointsPlayed');
  bump(loser, 'pointsPlayed');

  if (point.netMark) {
    bump(point.netMark, 'netPointsTotal');
    if (point.netMark === winner) bump(point.netMark, 'netPointsWon');
  }

  if (point.breakPoint) {
    bump(returner, 'breakPointsTotal');
    if (winner === returner) bump(returner, 'breakPointsWon');
  }

  return winner;
};
