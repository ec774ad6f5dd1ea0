import { test } from 'node:test';
import assert from 'node:assert/strict';

const { ProtocolViolationError } = await import('../../src/engine/errors.js');
const { holdServe, startController, winGameFor, winGamesFor, winPointFor, winPointsFor } = await import(
  '../helpers/engine.js'
);

const violation = (code: string) => (err: unknown) =>
  err instanceof ProtocolViolationError && err.code === code;

test('four first-serve aces win the opening game', () => {
  const controller = startController();

  const first = controller.submitServeOutcome('ACE_FIRST');
  assert.equal(first.stage, 'RESOLVED');
  controller.submitServeOutcome('ACE_FIRST');
  controller.submitServeOutcome('ACE_FIRST');

  const opening = controller.beginPoint();
  assert.ok(opening.stage !== 'RESOLVED');
  assert.equal(opening.stage, 'SERVE');
  assert.equal(opening.server, 'A');
  assert.deepEqual(opening.context, { breakPoint: false, gamePoint: true, setPoint: false, matchPoint: false });

  const last = controller.submitServeOutcome('ACE_FIRST');
  assert.ok(last.stage === 'RESOLVED');
  assert.deepEqual(last.transitions, ['GAME_WON']);
  assert.equal(last.record.pointNumber, 4);
  assert.equal(last.record.gameIndex, 0);
  assert.equal(last.record.wasGamePoint, true);

  const board = controller.scoreboard();
  assert.deepEqual(board.games, { A: 1, B: 0 });
  assert.deepEqual(board.points, { A: '0', B: '0' });
  assert.equal(board.server, 'B');

  const stats = controller.statistics();
  assert.equal(stats.A.acesFirst, 4);
  assert.equal(stats.A.firstServesIn, 4);
  assert.equal(stats.A.firstServesAttempted, 4);
  assert.equal(stats.A.pointsWonOnFirstServe, 4);
  assert.equal(stats.A.pointsWon, 4);
  assert.equal(stats.B.pointsPlayed, 4);
  assert.equal(controller.pointLog().length, 4);
  assert.equal(controller.undoDepth(), 4);
});

test('fault, second serve and rally step through every stage', () => {
  const controller = startController();

  assert.equal(controller.submitServeOutcome('FIRST_FAULT').stage, 'SECOND_SERVE');
  assert.equal(controller.pendingStage(), 'SECOND_SERVE');
  assert.equal(controller.submitServeOutcome('SECOND_IN').stage, 'RETURN');
  assert.equal(controller.submitReturnOutcome('RETURN_IN').stage, 'RALLY');

  const resolved = controller.submitRallyOutcome('SERVER_WINNER');
  assert.ok(resolved.stage === 'RESOLVED');
  assert.equal(resolved.record.serveType, 'SECOND');
  assert.equal(resolved.record.winner, 'A');
  assert.deepEqual(resolved.record.event, {
    serve: ['FIRST_FAULT', 'SECOND_IN'],
    return: 'RETURN_IN',
    rally: 'SERVER_WINNER',
  });
  assert.deepEqual(resolved.record.outcome, { kind: 'RALLY', outcome: 'SERVER_WINNER' });

  const stats = controller.statistics().A;
  assert.equal(stats.firstServesAttempted, 1);
  assert.equal(stats.firstServesIn, 0);
  assert.equal(stats.secondServesAttempted, 1);
  assert.equal(stats.secondServesIn, 1);
  assert.equal(stats.pointsWonOnSecondServe, 1);
  assert.equal(stats.rallyWinners, 1);
  assert.deepEqual(controller.scoreboard().points, { A: '15', B: '0' });
  assert.equal(controller.pendingStage(), null);
});

test('deuce and advantage are called from raw points', () => {
  const controller = startController();
  for (let i = 0; i < 3; i += 1) {
    winPointFor(controller, 'A');
    winPointFor(controller, 'B');
  }
  assert.deepEqual(controller.scoreboard().points, { A: '40', B: '40' });
  assert.deepEqual(controller.scoreboard().rawPoints, { A: 3, B: 3 });

  winPointFor(controller, 'A');
  assert.deepEqual(controller.scoreboard().points, { A: 'Ad', B: '' });

  winPointFor(controller, 'B');
  assert.deepEqual(controller.scoreboard().points, { A: '40', B: '40' });

  winPointFor(controller, 'B');
  assert.deepEqual(controller.scoreboard().points, { A: '', B: 'Ad' });
  const pressure = controller.beginPoint();
  assert.ok(pressure.stage !== 'RESOLVED');
  assert.equal(pressure.context.breakPoint, true);
  controller.abortPoint();

  winPointFor(controller, 'A');
  winPointFor(controller, 'A');
  const last = winPointFor(controller, 'A');
  assert.ok(last.stage === 'RESOLVED');
  assert.deepEqual(last.transitions, ['GAME_WON']);
  assert.deepEqual(controller.scoreboard().games, { A: 1, B: 0 });
});

test('converted break point is credited to the returner', () => {
  const controller = startController();
  winPointsFor(controller, 'B', 3);

  const point = controller.beginPoint();
  assert.ok(point.stage !== 'RESOLVED');
  assert.equal(point.context.breakPoint, true);

  controller.submitServeOutcome('FIRST_IN');
  const resolved = controller.submitReturnOutcome('RETURN_WINNER');
  assert.ok(resolved.stage === 'RESOLVED');
  assert.equal(resolved.record.wasBreakPoint, true);

  const stats = controller.statistics();
  assert.equal(stats.B.breakPointsTotal, 1);
  assert.equal(stats.B.breakPointsWon, 1);
  assert.equal(stats.B.returnWinners, 1);
  assert.deepEqual(controller.scoreboard().games, { A: 0, B: 1 });
});

test('winning six straight games closes the set and starts the next', () => {
  const controller = startController();
  winGamesFor(controller, 'A', 5);
  winPointsFor(controller, 'A', 3);

  const setPoint = controller.beginPoint();
  assert.ok(setPoint.stage !== 'RESOLVED');
  assert.equal(setPoint.server, 'B');
  assert.deepEqual(setPoint.context, { breakPoint: true, gamePoint: true, setPoint: true, matchPoint: false });
  controller.abortPoint();

  const last = winPointFor(controller, 'A');
  assert.ok(last.stage === 'RESOLVED');
  assert.deepEqual(last.transitions, ['GAME_WON', 'SET_WON', 'NEW_SET_STARTED']);

  const state = controller.snapshot();
  assert.equal(state.sets.length, 2);
  assert.deepEqual(state.sets[0], { games: { A: 6, B: 0 }, finished: true, tiebreakPlayed: false, tiebreakScore: { A: 0, B: 0 } });
  assert.deepEqual(state.setsWon, { A: 1, B: 0 });
  assert.equal(state.currentSetIndex, 1);
  assert.equal(state.server, 'A');
  assert.equal(state.setStatistics.length, 2);
  assert.equal(controller.statistics({ kind: 'set', index: 0 }).A.pointsWon, 24);
  assert.equal(controller.statistics({ kind: 'set', index: 1 }).A.pointsWon, 0);
});

test('second set to love wins the match and locks further input', () => {
  const controller = startController();
  winGamesFor(controller, 'A', 11);
  winPointsFor(controller, 'A', 3);

  const matchPoint = controller.beginPoint();
  assert.ok(matchPoint.stage !== 'RESOLVED');
  assert.equal(matchPoint.context.matchPoint, true);
  controller.abortPoint();

  const last = winPointFor(controller, 'A');
  assert.ok(last.stage === 'RESOLVED');
  assert.deepEqual(last.transitions, ['GAME_WON', 'SET_WON', 'MATCH_WON']);
  assert.equal(last.record.wasMatchPoint, true);
  assert.equal(controller.phase(), 'MATCH_COMPLETE');
  assert.equal(controller.isMatchComplete(), true);
  assert.equal(controller.winner(), 'A');

  assert.throws(() => controller.beginPoint(), violation('match_over'));
  assert.throws(() => controller.submitServeOutcome('ACE_FIRST'), violation('match_over'));
  assert.equal(controller.pointLog().length, 48);
});

test('set tiebreak rotates serve 1-2-2 and hands the next set to the receiver', () => {
  const changes: number[] = [];
  const controller = startController('BO3', 'A', { onChangeOfEnds: (points) => changes.push(points) });

  for (let game = 0; game < 11; game += 1) holdServe(controller);
  const trigger = holdServe(controller);
  assert.ok(trigger.stage === 'RESOLVED');
  assert.deepEqual(trigger.transitions, ['GAME_WON', 'SET_TIEBREAK_STARTED']);
  assert.equal(controller.isSetTiebreakActive(), true);
  assert.deepEqual(controller.scoreboard().games, { A: 6, B: 6 });

  const servers: string[] = [];
  let last = winPointFor(controller, 'A');
  assert.ok(last.stage === 'RESOLVED');
  servers.push(last.record.server);
  assert.equal(last.record.inTiebreak, true);
  assert.equal(last.record.wasGamePoint, false);

  for (let point = 1; point < 7; point += 1) {
    if (point === 6) assert.equal(controller.scoreboard().changeOfEnds, true);
    last = winPointFor(controller, 'A');
    assert.ok(last.stage === 'RESOLVED');
    servers.push(last.record.server);
  }

  assert.deepEqual(servers, ['A', 'B', 'B', 'A', 'A', 'B', 'B']);
  assert.ok(last.stage === 'RESOLVED');
  assert.deepEqual(last.transitions, ['SET_WON', 'NEW_SET_STARTED']);
  assert.deepEqual(changes, [6]);

  const state = controller.snapshot();
  assert.deepEqual(state.sets[0], { games: { A: 6, B: 6 }, finished: true, tiebreakPlayed: true, tiebreakScore: { A: 7, B: 0 } });
  assert.deepEqual(state.setsWon, { A: 1, B: 0 });
  assert.equal(state.phase, 'REGULAR_GAME');
  assert.equal(state.server, 'B');
});

test('match tiebreak waits for a server and appends a decider row', () => {
  const controller = startController('BO3_MTB10');
  winGamesFor(controller, 'A', 6);
  const split = winGamesFor(controller, 'B', 6);
  assert.ok(split.stage === 'RESOLVED');
  assert.deepEqual(split.transitions, ['GAME_WON', 'SET_WON', 'MATCH_TIEBREAK_STARTED']);
  assert.equal(controller.isMatchTiebreakActive(), true);
  assert.equal(controller.scoreboard().awaitingMatchTiebreakServer, true);
  assert.deepEqual(controller.scoreboard().games, { A: 0, B: 6 });

  assert.throws(() => controller.beginPoint(), violation('match_tiebreak_server_required'));
  controller.chooseMatchTiebreakServer('B');
  assert.equal(controller.scoreboard().awaitingMatchTiebreakServer, false);

  const servers: string[] = [];
  let last = winPointFor(controller, 'B');
  assert.ok(last.stage === 'RESOLVED');
  assert.equal(last.record.setIndex, 2);
  assert.equal(last.record.gameIndex, 0);
  servers.push(last.record.server);
  assert.throws(() => controller.chooseMatchTiebreakServer('A'), violation('match_tiebreak_not_pending'));

  for (let point = 1; point < 10; point += 1) {
    last = winPointFor(controller, 'B');
    assert.ok(last.stage === 'RESOLVED');
    servers.push(last.record.server);
  }

  assert.deepEqual(servers, ['B', 'A', 'A', 'B', 'B', 'A', 'A', 'B', 'B', 'A']);
  assert.ok(last.stage === 'RESOLVED');
  assert.deepEqual(last.transitions, ['SET_WON', 'MATCH_WON']);
  assert.equal(controller.winner(), 'B');

  const state = controller.snapshot();
  assert.equal(state.sets.length, 3);
  assert.deepEqual(state.sets[2], { games: { A: 0, B: 6 }, finished: true, tiebreakPlayed: true, tiebreakScore: { A: 0, B: 10 } });
  assert.deepEqual(state.setsWon, { A: 1, B: 2 });
  assert.equal(controller.statistics({ kind: 'set', index: 2 }).B.pointsWon, 10);
});

test('match tiebreak server can only be chosen while it is pending', () => {
  const controller = startController('BO3_MTB10');
  assert.throws(() => controller.chooseMatchTiebreakServer('A'), violation('match_tiebreak_not_pending'));
});

test('undo restores the exact state before the last point', () => {
  const controller = startController();
  winGameFor(controller, 'A');
  winPointFor(controller, 'B');
  const before = controller.snapshot();

  controller.submitServeOutcome('FIRST_IN');
  controller.submitReturnOutcome('RETURN_IN');
  controller.submitRallyOutcome('RETURNER_UNFORCED_ERROR', 'B');
  assert.notDeepEqual(controller.snapshot(), before);

  assert.equal(controller.undo(), true);
  assert.deepEqual(controller.snapshot(), before);
  assert.equal(controller.undoDepth(), 5);
});

test('undo steps back across a finished set', () => {
  const controller = startController();
  winGamesFor(controller, 'A', 6);
  assert.equal(controller.undo(), true);

  const state = controller.snapshot();
  assert.equal(state.sets.length, 1);
  assert.deepEqual(state.sets[0]?.games, { A: 5, B: 0 });
  assert.equal(state.sets[0]?.finished, false);
  assert.deepEqual(state.gamePoints, { A: 3, B: 0 });
  assert.deepEqual(state.setsWon, { A: 0, B: 0 });
  assert.equal(state.setStatistics.length, 1);
});

test('undo with a point in flight abandons it and the point before', () => {
  const controller = startController();
  winPointFor(controller, 'A');
  controller.submitServeOutcome('FIRST_FAULT');

  assert.equal(controller.undo(), true);
  assert.equal(controller.pendingStage(), null);
  assert.equal(controller.pointLog().length, 0);
  assert.equal(controller.statistics().A.firstServesAttempted, 0);
  assert.equal(controller.undo(), false);
});

test('aborting after a fault leaves no trace', () => {
  const controller = startController();
  controller.submitServeOutcome('FIRST_FAULT');
  assert.equal(controller.undoDepth(), 1);

  assert.equal(controller.abortPoint(), true);
  assert.equal(controller.undoDepth(), 0);
  assert.equal(controller.pendingStage(), null);
  assert.equal(controller.statistics().A.firstServesAttempted, 0);
  assert.equal(controller.abortPoint(), false);
});

test('out-of-order events are rejected without changing the point', () => {
  const controller = startController();

  assert.throws(() => controller.submitReturnOutcome('RETURN_IN'), violation('unexpected_return_outcome'));
  assert.throws(() => controller.submitRallyOutcome('SERVER_WINNER'), violation('unexpected_rally_outcome'));

  controller.beginPoint();
  assert.throws(() => controller.beginPoint(), violation('point_in_progress'));

  controller.submitServeOutcome('FIRST_FAULT');
  assert.throws(() => controller.submitServeOutcome('FIRST_IN'), violation('unexpected_serve_outcome'));
  assert.throws(() => controller.submitServeOutcome('ACE_FIRST'), violation('unexpected_serve_outcome'));
  assert.equal(controller.pendingStage(), 'SECOND_SERVE');

  controller.submitServeOutcome('SECOND_IN');
  assert.throws(() => controller.submitServeOutcome('SECOND_IN'), violation('unexpected_serve_outcome'));
  assert.throws(() => controller.submitRallyOutcome('SERVER_WINNER'), violation('unexpected_rally_outcome'));
  assert.equal(controller.pendingStage(), 'RETURN');
  assert.equal(controller.pointLog().length, 0);
});

test('second-serve outcome without a fault counts only the second serve', () => {
  const controller = startController();
  const resolved = controller.submitServeOutcome('ACE_SECOND');
  assert.ok(resolved.stage === 'RESOLVED');
  assert.equal(resolved.record.serveType, 'SECOND');

  const stats = controller.statistics().A;
  assert.equal(stats.firstServesAttempted, 0);
  assert.equal(stats.secondServesAttempted, 1);
  assert.equal(stats.acesSecond, 1);
  assert.equal(stats.pointsWonOnSecondServe, 1);
});

test('statistics for a set not yet reached are reported as missing', () => {
  const controller = startController();
  assert.throws(() => controller.statistics({ kind: 'set', index: 1 }), violation('set_not_found'));
});

test('ending early keeps the score and blocks new points', () => {
  const controller = startController();
  winPointFor(controller, 'A');
  controller.submitServeOutcome('FIRST_IN');
  controller.endMatch();

  const board = controller.scoreboard();
  assert.equal(board.endedEarly, true);
  assert.equal(board.winner, null);
  assert.deepEqual(board.rawPoints, { A: 1, B: 0 });
  assert.equal(controller.pendingStage(), null);
  assert.throws(() => controller.beginPoint(), violation('match_over'));
});

test('a set is not decided on a one-game lead', () => {
  const controller = startController();
  for (let game = 0; game < 10; game += 1) holdServe(controller);

  const ahead = winGameFor(controller, 'A');
  assert.ok(ahead.stage === 'RESOLVED');
  assert.deepEqual(ahead.transitions, ['GAME_WON']);
  assert.deepEqual(controller.scoreboard().games, { A: 6, B: 5 });
  assert.equal(controller.phase(), 'REGULAR_GAME');

  const closed = winGameFor(controller, 'A');
  assert.ok(closed.stage === 'RESOLVED');
  assert.deepEqual(closed.transitions, ['GAME_WON', 'SET_WON', 'NEW_SET_STARTED']);
  assert.deepEqual(controller.snapshot().sets[0]?.games, { A: 7, B: 5 });
});

test('double fault on break point hands the break to the returner', () => {
  const controller = startController();
  for (let point = 0; point < 3; point += 1) {
    controller.submitServeOutcome('FIRST_IN');
    controller.submitReturnOutcome('RETURN_WINNER');
  }

  controller.submitServeOutcome('FIRST_FAULT');
  const resolved = controller.submitServeOutcome('DOUBLE_FAULT');
  assert.ok(resolved.stage === 'RESOLVED');
  assert.equal(resolved.record.winner, 'B');
  assert.equal(resolved.record.wasBreakPoint, true);

  const stats = controller.statistics();
  assert.equal(stats.A.doubleFaults, 1);
  assert.equal(stats.B.breakPointsWon, 1);
  assert.equal(stats.B.breakPointsTotal, 1);
  assert.deepEqual(controller.scoreboard().games, { A: 0, B: 1 });
});

test('match tiebreak rotation holds with alternating winners', () => {
  const controller = startController('BO3_MTB10');
  winGamesFor(controller, 'B', 6);
  winGamesFor(controller, 'A', 6);
  controller.chooseMatchTiebreakServer('A');

  const servers: string[] = [];
  for (let point = 0; point < 8; point += 1) {
    const progress = winPointFor(controller, point % 2 === 0 ? 'A' : 'B');
    assert.ok(progress.stage === 'RESOLVED');
    servers.push(progress.record.server);
  }

  assert.deepEqual(servers, ['A', 'B', 'B', 'A', 'A', 'B', 'B', 'A']);
  assert.deepEqual(controller.scoreboard().rawPoints, { A: 4, B: 4 });
  assert.equal(controller.isMatchTiebreakActive(), true);
});

test('change of ends is announced once when the end is completed', () => {
  const changes: number[] = [];
  const controller = startController('BO3', 'A', { onChangeOfEnds: (points) => changes.push(points) });
  for (let game = 0; game < 12; game += 1) holdServe(controller);

  winPointsFor(controller, 'A', 5);
  assert.deepEqual(changes, []);
  winPointFor(controller, 'B');
  assert.deepEqual(changes, [6]);

  controller.beginPoint();
  controller.abortPoint();
  controller.beginPoint();
  controller.abortPoint();
  assert.deepEqual(changes, [6]);

  assert.equal(controller.undo(), true);
  winPointFor(controller, 'B');
  assert.deepEqual(changes, [6]);
  assert.deepEqual(controller.snapshot().tiebreakPoints, { A: 5, B: 1 });
});

test('undo of the point that wins a set tiebreak reopens the tiebreak', () => {
  const controller = startController();
  for (let game = 0; game < 12; game += 1) holdServe(controller);
  winPointsFor(controller, 'A', 6);
  const before = controller.snapshot();

  const won = winPointFor(controller, 'A');
  assert.ok(won.stage === 'RESOLVED');
  assert.deepEqual(won.transitions, ['SET_WON', 'NEW_SET_STARTED']);

  assert.equal(controller.undo(), true);
  assert.deepEqual(controller.snapshot(), before);

  const state = controller.snapshot();
  assert.equal(state.phase, 'SET_TIEBREAK');
  assert.equal(state.sets.length, 1);
  assert.equal(state.sets[0]?.finished, false);
  assert.deepEqual(state.tiebreakPoints, { A: 6, B: 0 });
  assert.deepEqual(state.setsWon, { A: 0, B: 0 });
  assert.equal(state.setStatistics.length, 1);
  assert.equal(controller.isSetTiebreakActive(), true);
});

test('undo of the point that wins the match tiebreak drops the decider row', () => {
  const controller = startController('BO3_MTB10');
  winGamesFor(controller, 'A', 6);
  winGamesFor(controller, 'B', 6);
  controller.chooseMatchTiebreakServer('B');
  winPointsFor(controller, 'B', 9);
  const before = controller.snapshot();

  const won = winPointFor(controller, 'B');
  assert.ok(won.stage === 'RESOLVED');
  assert.deepEqual(won.transitions, ['SET_WON', 'MATCH_WON']);
  assert.equal(controller.snapshot().sets.length, 3);

  assert.equal(controller.undo(), true);
  assert.deepEqual(controller.snapshot(), before);

  const state = controller.snapshot();
  assert.equal(state.phase, 'MATCH_TIEBREAK');
  assert.equal(state.sets.length, 2);
  assert.equal(state.setStatistics.length, 3);
  assert.deepEqual(state.tiebreakPoints, { A: 0, B: 9 });
  assert.deepEqual(state.setsWon, { A: 1, B: 1 });
  assert.equal(controller.winner(), null);
  assert.equal(controller.statistics({ kind: 'set', index: 2 }).B.pointsWon, 9);

  const replayed = winPointFor(controller, 'B');
  assert.ok(replayed.stage === 'RESOLVED');
  assert.deepEqual(replayed.transitions, ['SET_WON', 'MATCH_WON']);
});
