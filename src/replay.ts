import { z } from 'zod';

import type { MatchController } from './engine/controller.js';
import { RALLY_OUTCOMES, RETURN_OUTCOMES, SERVE_OUTCOMES } from './engine/types.js';
import type { PlayerSide } from './engine/types.js';

const SideSchema = z.enum(['A', 'B']);

const RecordedPointSchema = z.object({
  serve: z.array(z.enum(SERVE_OUTCOMES)).min(1).max(2),
  return: z.enum(RETURN_OUTCOMES).optional(),
  rally: z.enum(RALLY_OUTCOMES).optional(),
  net_mark: SideSchema.optional(),
});

export const PointFileSchema = z.object({
  format: z.union([z.string(), z.number().int()]).optional(),
  players: z.object({
    A: z.string().trim().min(1),
    B: z.string().trim().min(1),
  }),
  location: z.string().optional(),
  starting_server: SideSchema,
  match_tiebreak_server: SideSchema.optional(),
  points: z.array(RecordedPointSchema),
});

export type PointFile = z.infer<typeof PointFileSchema>;
export type RecordedPoint = z.infer<typeof RecordedPointSchema>;

export class ReplayError extends Error {
  constructor(
    message: string,
    public readonly pointIndex: number | null
  ) {
    super(message);
    this.name = 'ReplayError';
  }
}

export const parsePointFile = (input: unknown): PointFile => {
  const parsed = PointFileSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join('.') || 'file' : 'file';
    throw new ReplayError(`invalid point file at ${where}: ${issue?.message ?? 'unknown error'}`, null);
  }
  return parsed.data;
};

type PlayOutcome = 'resolved' | 'undecided' | 'leftover';

const playOne = (controller: MatchController, point: RecordedPoint): PlayOutcome => {
  let progress = controller.beginPoint();
  let servesUsed = 0;
  for (const serve of point.serve) {
    if (progress.stage === 'RESOLVED') break;
    progress = controller.submitServeOutcome(serve);
    servesUsed += 1;
  }

  let returnUsed = false;
  if (progress.stage === 'RETURN' && point.return) {
    progress = controller.submitReturnOutcome(point.return);
    returnUsed = true;
  }

  let rallyUsed = false;
  if (progress.stage === 'RALLY' && point.rally) {
    progress = controller.submitRallyOutcome(point.rally, point.net_mark);
    rallyUsed = true;
  }

  if (progress.stage !== 'RESOLVED') return 'undecided';

  const leftover =
    servesUsed < point.serve.length ||
    (point.return !== undefined && !returnUsed) ||
    (point.rally !== undefined && !rallyUsed) ||
    (point.net_mark !== undefined && !rallyUsed);
  return leftover ? 'leftover' : 'resolved';
};

export interface ReplaySummary {
  pointsPlayed: number;
  matchTiebreakServer: PlayerSide | null;
}

/**
 * Feeds recorded points through the controller in order. A point whose
 * events do not decide it, or that carries events past the deciding one, is
 * backed out and reported with its index.
 */
export const playPoints = (controller: MatchController, file: PointFile): ReplaySummary => {
  let matchTiebreakServer: PlayerSide | null = null;

  for (const [index, point] of file.points.entries()) {
    if (controller.scoreboard().awaitingMatchTiebreakServer) {
      if (!file.match_tiebreak_server) {
        throw new ReplayError(
          `point ${index + 1}: match_tiebreak_server is required to play the match tiebreak`,
          index
        );
      }
      matchTiebreakServer = file.match_tiebreak_server;
      controller.chooseMatchTiebreakServer(matchTiebreakServer);
    }

    let outcome: PlayOutcome;
    try {
      outcome = playOne(controller, point);
    } catch (err) {
      controller.abortPoint();
      const reason = err instanceof Error ? err.message : String(err);
      throw new ReplayError(`point ${index + 1}: ${reason}`, index);
    }

    if (outcome === 'undecided') {
      controller.abortPoint();
      throw new ReplayError(`point ${index + 1}: events do not decide the point`, index);
    }
    if (outcome === 'leftover') {
      controller.undo();
      throw new ReplayError(`point ${index + 1}: events after the point was decided`, index);
    }
  }

  return { pointsPlayed: file.points.length, matchTiebreakServer };
};
