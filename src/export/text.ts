import type { MatchFormat, MatchState, PlayerStatistics, PointRecord, SetRecord } from '../engine/types.js';
import { describeEvent, safePercent, serveTypeLabel } from './format.js';

const RULE = '----------------------------------------';

export const describeFormat = (format: MatchFormat) => {
  let text =
    `Best-of-3; sets to ${format.gamesToWinSet} ` +
    `(TB${format.setTiebreakTarget} at ${format.tiebreakAtGames}-${format.tiebreakAtGames})`;
  if (format.decidingPolicy === 'MATCH_TIEBREAK_10') text += `; deciding TB${format.decidingTiebreakTarget}`;
  return text;
};

export const describeSetScore = (set: SetRecord, index: number) => {
  let line = `Set ${index + 1}: ${set.games.A}-${set.games.B}`;
  if (set.tiebreakPlayed) line += ` (TB ${set.tiebreakScore.A}-${set.tiebreakScore.B})`;
  return line;
};

export const statisticsLines = (s: PlayerStatistics, title: string): string[] => [
  title,
  RULE,
  `First serve: ${s.firstServesIn}/${s.firstServesAttempted} (${safePercent(s.firstServesIn, s.firstServesAttempted)})`,
  `1st pts won: ${s.pointsWonOnFirstServe}/${s.firstServesIn} (${safePercent(s.pointsWonOnFirstServe, s.firstServesIn)})`,
  `Second srv:  ${s.secondServesIn}/${s.secondServesAttempted} (${safePercent(s.secondServesIn, s.secondServesAttempted)})`,
  `2nd pts won: ${s.pointsWonOnSecondServe}/${s.secondServesIn} (${safePercent(s.pointsWonOnSecondServe, s.secondServesIn)})`,
  `Aces (1/2):  ${s.acesFirst} / ${s.acesSecond}`,
  `Srv winners: ${s.serviceWinnersFirst} / ${s.serviceWinnersSecond}`,
  `Double faults: ${s.doubleFaults}`,
  `Return vs1st: ${s.returnPointsWonVsFirst}`,
  `Return vs2nd: ${s.returnPointsWonVsSecond}`,
  `Return W/UE/FE: ${s.returnWinners}/${s.returnUnforcedErrors}/${s.returnForcedErrors}`,
  `Rally winners: ${s.rallyWinners}`,
  `Unforced err: ${s.unforcedErrors}`,
  `Forced drawn: ${s.forcedErrorsDrawn}`,
  `Net: ${s.netPointsWon}/${s.netPointsTotal} (${safePercent(s.netPointsWon, s.netPointsTotal)})`,
  `Break points: ${s.breakPointsWon}/${s.breakPointsTotal}`,
  `Total points: ${s.pointsWon}/${s.pointsPlayed} (${safePercent(s.pointsWon, s.pointsPlayed)})`,
];

const pressureFlags = (entry: PointRecord) =>
  [
    entry.wasBreakPoint ? 'BP' : null,
    entry.wasGamePoint ? 'GP' : null,
    entry.wasSetPoint ? 'SP' : null,
    entry.wasMatchPoint ? 'MP' : null,
  ]
    .filter((value): value is string => value !== null)
    .join(' ');

export const pointLogLine = (state: MatchState, entry: PointRecord) =>
  [
    entry.index + 1,
    entry.setIndex + 1,
    entry.gameIndex + 1,
    entry.inTiebreak ? 'Y' : 'N',
    state.players[entry.server],
    serveTypeLabel(entry.serveType),
    state.players[entry.winner],
    pressureFlags(entry),
    describeEvent(entry.event),
  ].join(' | ');

export const renderText = (state: MatchState) => {
  const { players } = state;
  const lines: string[] = [
    'Match Summary',
    '=============',
    `Players: ${players.A} vs ${players.B}`,
    `Location: ${state.location}`,
    `Format: ${describeFormat(state.format)}`,
    '',
    'Final Set Scores:',
    ...state.sets.map((set, index) => `  ${describeSetScore(set, index)}`),
  ];

  if (state.endedEarly) lines.push('  (match ended early)');

  lines.push('', ...statisticsLines(state.statistics.A, `Player: ${players.A} (Match Totals)`));
  lines.push('', ...statisticsLines(state.statistics.B, `Player: ${players.B} (Match Totals)`));

  lines.push('', 'Per-set stats', '-------------');
  state.setStatistics.forEach((bucket, index) => {
    lines.push(`Set ${index + 1}:`);
    lines.push('', ...statisticsLines(bucket.A, `  ${players.A}`));
    lines.push('', ...statisticsLines(bucket.B, `  ${players.B}`));
  });

  lines.push('', 'Point-by-point log', '-------------------');
  lines.push('# | Set | Game | TB | Server | Serve | Winner | BP/GP/SP/MP | Event');
  for (const entry of state.log) lines.push(pointLogLine(state, entry));

  return `${lines.join('\n')}\n`;
};
