import type {
  MatchPhase,
  MatchState,
  PlayerSide,
  PointContext,
  PointEvent,
  PointRecord,
  RallyOutcome,
  ReturnOutcome,
  ServeOutcome,
  ServeType,
  SideStatistics,
  StatisticsScope,
  TerminalOutcome,
  Transition,
} from './types.js';
import { ProtocolViolationError } from './errors.js';
import { UndoHistory } from './history.js';
import { classifyPoint, isInTiebreak } from './context.js';
import { isChangeOfEnds, tiebreakServer } from './rotation.js';
import { attributePoint } from './statistics.js';
import { awardPoint, createMatchState, matchWinner } from './scoring.js';
import type { NewMatchInput } from './scoring.js';
import { assertMatchInvariants } from './invariants.js';
import { buildScoreboard } from './scoreboard.js';
import type { Scoreboard } from './scoreboard.js';

export type PointStage = 'SERVE' | 'SECOND_SERVE' | 'RETURN' | 'RALLY';

export type PointProgress =
  | { stage: PointStage; server: PlayerSide; context: PointContext }
  | {
      stage: 'RESOLVED';
      record: PointRecord;
      phase: MatchPhase;
      transitions: Transition[];
    };

export interface MatchHooks {
  onChangeOfEnds?: (pointsPlayed: number) => void;
}

export interface StartMatchOptions extends NewMatchInput {
  hooks?: MatchHooks;
}

interface PointDraft {
  stage: PointStage;
  server: PlayerSide;
  context: PointContext;
  serve: ServeOutcome[];
  serveType: ServeType;
  returnOutcome?: ReturnOutcome;
  setIndex: number;
  gameIndex: number;
  inTiebreak: boolean;
  pointNumber: number;
}

const SECOND_SERVE_OUTCOMES: readonly ServeOutcome[] = ['SECOND_IN', 'DOUBLE_FAULT'];

/**
 * Owns the live match state and its undo history. Point events arrive one at
 * a time (serve, then return, then rally) and are only applied to the score
 * and statistics once the point is decided.
 */
export class MatchController {
  private state: MatchState;
  private readonly history = new UndoHistory<MatchState>();
  private readonly hooks: MatchHooks;
  private draft: PointDraft | null = null;
  // Ends already announced, keyed by set index and tiebreak points played.
  private readonly announcedEnds = new Set<string>();

  constructor(options: StartMatchOptions) {
    this.state = createMatchState(options);
    this.hooks = options.hooks ?? {};
  }

  static start(options: StartMatchOptions) {
    return new MatchController(options);
  }

  beginPoint(): PointProgress {
    return this.progress(this.open());
  }

  private open(): PointDraft {
    if (this.draft) {
      throw new ProtocolViolationError('a point is already in progress', 'point_in_progress');
    }
    this.ensurePlayable();

    const state = this.state;
    if (state.phase === 'MATCH_TIEBREAK' && !state.tiebreakStartServer) {
      throw new ProtocolViolationError(
        'choose who serves first in the match tiebreak before the first point',
        'match_tiebreak_server_required'
      );
    }

    this.history.push(state);

    const inTiebreak = isInTiebreak(state);
    if (inTiebreak && state.tiebreakStartServer) {
      const played = state.tiebreakPoints.A + state.tiebreakPoints.B;
      state.server = tiebreakServer(state.tiebreakStartServer, played);
    }

    const set = state.sets[state.currentSetIndex];
    const counts = inTiebreak ? state.tiebreakPoints : state.gamePoints;
    const draft: PointDraft = {
      stage: 'SERVE',
      server: state.server,
      context: classifyPoint(state),
      serve: [],
      serveType: 'FIRST',
      setIndex: state.currentSetIndex,
      gameIndex: set ? set.games.A + set.games.B : 0,
      inTiebreak,
      pointNumber: counts.A + counts.B + 1,
    };
    this.draft = draft;
    return draft;
  }

  submitServeOutcome(kind: ServeOutcome): PointProgress {
    const draft = this.draft ?? this.open();
    if (draft.stage !== 'SERVE' && draft.stage !== 'SECOND_SERVE') {
      throw new ProtocolViolationError(`serve outcome ${kind} not expected at ${draft.stage}`, 'unexpected_serve_outcome');
    }
    if (draft.stage === 'SECOND_SERVE' && !SECOND_SERVE_OUTCOMES.includes(kind)) {
      throw new ProtocolViolationError(
        `after a first-serve fault only SECOND_IN or DOUBLE_FAULT is accepted, got ${kind}`,
        'unexpected_serve_outcome'
      );
    }

    draft.serve.push(kind);
    switch (kind) {
      case 'FIRST_FAULT':
        draft.stage = 'SECOND_SERVE';
        return this.progress(draft);
      case 'FIRST_IN':
        draft.serveType = 'FIRST';
        draft.stage = 'RETURN';
        return this.progress(draft);
      case 'SECOND_IN':
        draft.serveType = 'SECOND';
        draft.stage = 'RETURN';
        return this.progress(draft);
      case 'DOUBLE_FAULT':
        draft.serveType = 'SECOND';
        return this.resolve(draft, { kind: 'DOUBLE_FAULT' });
      case 'ACE_FIRST':
        draft.serveType = 'FIRST';
        return this.resolve(draft, { kind: 'ACE', serveType: 'FIRST' });
      case 'ACE_SECOND':
        draft.serveType = 'SECOND';
        return this.resolve(draft, { kind: 'ACE', serveType: 'SECOND' });
      case 'SERVICE_WINNER_FIRST':
        draft.serveType = 'FIRST';
        return this.resolve(draft, { kind: 'SERVICE_WINNER', serveType: 'FIRST' });
      case 'SERVICE_WINNER_SECOND':
        draft.serveType = 'SECOND';
        return this.resolve(draft, { kind: 'SERVICE_WINNER', serveType: 'SECOND' });
    }
  }

  submitReturnOutcome(kind: ReturnOutcome): PointProgress {
    const draft = this.draft;
    if (!draft || draft.stage !== 'RETURN') {
      throw new ProtocolViolationError(
        `return outcome ${kind} requires a serve in play`,
        'unexpected_return_outcome'
      );
    }

    draft.returnOutcome = kind;
    if (kind === 'RETURN_IN') {
      draft.stage = 'RALLY';
      return this.progress(draft);
    }
    return this.resolve(draft, { kind: 'RETURN', outcome: kind });
  }

  submitRallyOutcome(kind: RallyOutcome, netMark?: PlayerSide): PointProgress {
    const draft = this.draft;
    if (!draft || draft.stage !== 'RALLY') {
      throw new ProtocolViolationError(
        `rally outcome ${kind} requires a return in play`,
        'unexpected_rally_outcome'
      );
    }
    return this.resolve(draft, { kind: 'RALLY', outcome: kind }, netMark);
  }

  /** Backs out of the point in flight; nothing about it is recorded. */
  abortPoint(): boolean {
    if (!this.draft) return false;
    this.history.pop();
    this.draft = null;
    return true;
  }

  /**
   * Restores the state from before the last resolved point. A point still in
   * flight is abandoned first. Returns false when there is nothing to undo.
   */
  undo(): boolean {
    this.abortPoint();
    const previous = this.history.pop();
    if (!previous) return false;
    this.state = previous;
    return true;
  }

  chooseMatchTiebreakServer(server: PlayerSide) {
    const state = this.state;
    const played = state.tiebreakPoints.A + state.tiebreakPoints.B;
    if (state.phase !== 'MATCH_TIEBREAK' || played > 0 || this.draft) {
      throw new ProtocolViolationError(
        'the match tiebreak server can only be chosen before its first point',
        'match_tiebreak_not_pending'
      );
    }
    state.tiebreakStartServer = server;
    state.server = server;
  }

  endMatch() {
    this.abortPoint();
    if (this.state.phase !== 'MATCH_COMPLETE') this.state.endedEarly = true;
  }

  scoreboard(): Scoreboard {
    return buildScoreboard(this.state);
  }

  statistics(scope: StatisticsScope = { kind: 'match' }): SideStatistics {
    if (scope.kind === 'match') return structuredClone(this.state.statistics);

    const bucket = this.state.setStatistics[scope.index];
    if (!bucket) {
      throw new ProtocolViolationError(`set ${scope.index + 1} has not been played`, 'set_not_found');
    }
    return structuredClone(bucket);
  }

  pointLog(): PointRecord[] {
    return structuredClone(this.state.log);
  }

  snapshot(): MatchState {
    return structuredClone(this.state);
  }

  pendingStage(): PointStage | null {
    return this.draft?.stage ?? null;
  }

  undoDepth() {
    return this.history.size;
  }

  phase(): MatchPhase {
    return this.state.phase;
  }

  winner(): PlayerSide | null {
    return matchWinner(this.state);
  }

  isMatchComplete() {
    return this.state.phase === 'MATCH_COMPLETE';
  }

  isSetTiebreakActive() {
    return this.state.phase === 'SET_TIEBREAK';
  }

  isMatchTiebreakActive() {
    return this.state.phase === 'MATCH_TIEBREAK';
  }

  private ensurePlayable() {
    if (this.state.phase === 'MATCH_COMPLETE' || this.state.endedEarly) {
      throw new ProtocolViolationError('the match is over', 'match_over');
    }
  }

  private progress(draft: PointDraft): PointProgress {
    return { stage: draft.stage, server: draft.server, context: { ...draft.context } };
  }

  private announceChangeOfEnds(state: MatchState) {
    const played = state.tiebreakPoints.A + state.tiebreakPoints.B;
    const key = `${state.currentSetIndex}:${played}`;
    if (!isChangeOfEnds(played) || this.announcedEnds.has(key)) return;
    this.announcedEnds.add(key);
    this.hooks.onChangeOfEnds?.(played);
  }

  private resolve(draft: PointDraft, outcome: TerminalOutcome, netMark?: PlayerSide): PointProgress {
    const state = this.state;

    const winner = attributePoint(state, {
      server: draft.server,
      serveSequence: draft.serve,
      serveType: draft.serveType,
      outcome,
      netMark,
      breakPoint: draft.context.breakPoint,
    });

    const event: PointEvent = { serve: [...draft.serve] };
    if (draft.returnOutcome) event.return = draft.returnOutcome;
    if (outcome.kind === 'RALLY') event.rally = outcome.outcome;
    if (netMark) event.netMark = netMark;

    const record: PointRecord = {
      index: state.log.length,
      setIndex: draft.setIndex,
      gameIndex: draft.gameIndex,
      inTiebreak: draft.inTiebreak,
      pointNumber: draft.pointNumber,
      server: draft.server,
      serveType: draft.serveType,
      event,
      outcome,
      winner,
      wasBreakPoint: draft.context.breakPoint,
      wasGamePoint: draft.context.gamePoint,
      wasSetPoint: draft.context.setPoint,
      wasMatchPoint: draft.context.matchPoint,
    };
    state.log.push(record);

    const transitions = awardPoint(state, winner);
    this.draft = null;

    assertMatchInvariants(state, this.history.size);

    if (isInTiebreak(state)) this.announceChangeOfEnds(state);

    return { stage: 'RESOLVED', record: structuredClone(record), phase: state.phase, transitions };
  }
}
