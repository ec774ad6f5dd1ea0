import type { PointProgress } from '../../engine/controller.js';
import type { Scoreboard } from '../../engine/scoreboard.js';
import type { MatchSession } from '../../store/index.js';
import { serializePointRecord, serializeSet } from '../../export/json.js';

const serializeScoreboard = (scoreboard: Scoreboard) => ({
  players: scoreboard.players,
  location: scoreboard.location,
  format: scoreboard.formatCode,
  phase: scoreboard.phase,
  server: scoreboard.server,
  sets_won: scoreboard.setsWon,
  games: scoreboard.games,
  points: scoreboard.points,
  raw_points: scoreboard.rawPoints,
  in_tiebreak: scoreboard.inTiebreak,
  change_of_ends: scoreboard.changeOfEnds,
  awaiting_match_tiebreak_server: scoreboard.awaitingMatchTiebreakServer,
  sets: scoreboard.sets.map(serializeSet),
  winner: scoreboard.winner,
  ended_early: scoreboard.endedEarly,
});

export const toMatchResponse = (session: MatchSession) => {
  const { controller } = session;
  return {
    match_id: session.matchId,
    started_at: session.startedAt.toISOString(),
    format_fallback: session.formatFallback,
    pending_stage: controller.pendingStage(),
    undo_depth: controller.undoDepth(),
    scoreboard: serializeScoreboard(controller.scoreboard()),
  };
};

export const toProgressResponse = (session: MatchSession, progress: PointProgress) => {
  const base = toMatchResponse(session);
  if (progress.stage === 'RESOLVED') {
    return {
      ...base,
      stage: progress.stage,
      point: serializePointRecord(progress.record),
      phase: progress.phase,
      transitions: progress.transitions,
    };
  }

  return {
    ...base,
    stage: progress.stage,
    point_server: progress.server,
    context: {
      break_point: progress.context.breakPoint,
      game_point: progress.context.gamePoint,
      set_point: progress.context.setPoint,
      match_point: progress.context.matchPoint,
    },
  };
};
