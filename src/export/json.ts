import type {
  MatchFormat,
  MatchState,
  PlayerStatistics,
  PointRecord,
  SetRecord,
  SideStatistics,
} from '../engine/types.js';
import { describeEvent, serveTypeLabel } from './format.js';

export const serializeFormat = (format: MatchFormat) => ({
  code: format.code,
  label: format.label,
  games_to_win_set: format.gamesToWinSet,
  tiebreak_at_games: format.tiebreakAtGames,
  set_tiebreak_target: format.setTiebreakTarget,
  deciding_policy: format.decidingPolicy,
  deciding_tiebreak_target: format.decidingTiebreakTarget,
  sets_to_win: format.setsToWin,
});

export const serializeSet = (set: SetRecord, index: number) => ({
  set: index + 1,
  games: { A: set.games.A, B: set.games.B },
  finished: set.finished,
  tiebreak_played: set.tiebreakPlayed,
  tiebreak_score: set.tiebreakPlayed ? { A: set.tiebreakScore.A, B: set.tiebreakScore.B } : null,
});

export const serializePlayerStatistics = (stats: PlayerStatistics) => ({
  serve: {
    first_serves_in: stats.firstServesIn,
    first_serves_attempted: stats.firstServesAttempted,
    second_serves_in: stats.secondServesIn,
    second_serves_attempted: stats.secondServesAttempted,
    aces_first: stats.acesFirst,
    aces_second: stats.acesSecond,
    service_winners_first: stats.serviceWinnersFirst,
    service_winners_second: stats.serviceWinnersSecond,
    double_faults: stats.doubleFaults,
    points_won_on_first_serve: stats.pointsWonOnFirstServe,
    points_won_on_second_serve: stats.pointsWonOnSecondServe,
  },
  return: {
    points_won_vs_first: stats.returnPointsWonVsFirst,
    points_won_vs_second: stats.returnPointsWonVsSecond,
    winners: stats.returnWinners,
    unforced_errors: stats.returnUnforcedErrors,
    forced_errors: stats.returnForcedErrors,
  },
  rally: {
    winners: stats.rallyWinners,
    unforced_errors: stats.unforcedErrors,
    forced_errors_drawn: stats.forcedErrorsDrawn,
  },
  net: { won: stats.netPointsWon, total: stats.netPointsTotal },
  break_points: { won: stats.breakPointsWon, total: stats.breakPointsTotal },
  points: { won: stats.pointsWon, played: stats.pointsPlayed },
});

export const serializeSideStatistics = (stats: SideStatistics) => ({
  A: serializePlayerStatistics(stats.A),
  B: serializePlayerStatistics(stats.B),
});

export const serializePointRecord = (record: PointRecord) => ({
  idx: record.index + 1,
  set: record.setIndex + 1,
  game: record.gameIndex + 1,
  tiebreak: record.inTiebreak,
  point: record.pointNumber,
  server: record.server,
  serve_type: serveTypeLabel(record.serveType),
  winner: record.winner,
  break_point: record.wasBreakPoint,
  game_point: record.wasGamePoint,
  set_point: record.wasSetPoint,
  match_point: record.wasMatchPoint,
  event: {
    serve: record.event.serve,
    return: record.event.return ?? null,
    rally: record.event.rally ?? null,
    net_mark: record.event.netMark ?? null,
  },
  description: describeEvent(record.event),
});

export const toMatchDocument = (state: MatchState) => ({
  players: { A: state.players.A, B: state.players.B },
  location: state.location,
  format: serializeFormat(state.format),
  phase: state.phase,
  ended_early: state.endedEarly,
  sets_won: { A: state.setsWon.A, B: state.setsWon.B },
  sets: state.sets.map(serializeSet),
  statistics: {
    match: serializeSideStatistics(state.statistics),
    sets: state.setStatistics.map((bucket, index) => ({
      set: index + 1,
      ...serializeSideStatistics(bucket),
    })),
  },
  log: state.log.map(serializePointRecord),
});

export const renderJson = (state: MatchState) => `${JSON.stringify(toMatchDocument(state), null, 2)}\n`;
