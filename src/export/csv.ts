import type { MatchState, PlayerStatistics } from '../engine/types.js';
import { describeEvent, serveTypeLabel, sideLabel } from './format.js';

const STAT_COLUMNS =
  'FirstServIn,FirstServAtt,FirstPtsWon,SecondServIn,SecondServAtt,SecondPtsWon,Aces1,Aces2,SrvW1,SrvW2,DF,' +
  'RetWonV1,RetWonV2,RetW,RetUE,RetFE,RallyW,UE,FEdrawn,NetWon,NetTot,BPWon,BPTot,PtsWon,PtsPlayed';

const statCells = (s: PlayerStatistics) => [
  s.firstServesIn,
  s.firstServesAttempted,
  s.pointsWonOnFirstServe,
  s.secondServesIn,
  s.secondServesAttempted,
  s.pointsWonOnSecondServe,
  s.acesFirst,
  s.acesSecond,
  s.serviceWinnersFirst,
  s.serviceWinnersSecond,
  s.doubleFaults,
  s.returnPointsWonVsFirst,
  s.returnPointsWonVsSecond,
  s.returnWinners,
  s.returnUnforcedErrors,
  s.returnForcedErrors,
  s.rallyWinners,
  s.unforcedErrors,
  s.forcedErrorsDrawn,
  s.netPointsWon,
  s.netPointsTotal,
  s.breakPointsWon,
  s.breakPointsTotal,
  s.pointsWon,
  s.pointsPlayed,
];

const csvCell = (value: string) => (/[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value);

const flag = (value: boolean) => (value ? 'Y' : 'N');

const toLines = (rows: Array<Array<string | number>>) =>
  rows.map((row) => `${row.join(',')}\n`).join('');

export const renderTotalsCsv = (state: MatchState) =>
  `Player,${STAT_COLUMNS}\n` +
  toLines([
    [csvCell(state.players.A), ...statCells(state.statistics.A)],
    [csvCell(state.players.B), ...statCells(state.statistics.B)],
  ]);

export const renderSetsCsv = (state: MatchState) =>
  `Set,Player,${STAT_COLUMNS}\n` +
  toLines(
    state.setStatistics.flatMap((bucket, index) => [
      [index + 1, csvCell(state.players.A), ...statCells(bucket.A)],
      [index + 1, csvCell(state.players.B), ...statCells(bucket.B)],
    ])
  );

export const renderPointsCsv = (state: MatchState) =>
  'Idx,Set,Game,TB,Server,ServeType,Winner,BP,GP,SP,MP,Event\n' +
  toLines(
    state.log.map((entry) => [
      entry.index + 1,
      entry.setIndex + 1,
      entry.gameIndex + 1,
      flag(entry.inTiebreak),
      sideLabel(entry.server),
      serveTypeLabel(entry.serveType),
      sideLabel(entry.winner),
      flag(entry.wasBreakPoint),
      flag(entry.wasGamePoint),
      flag(entry.wasSetPoint),
      flag(entry.wasMatchPoint),
      `"${describeEvent(entry.event).replace(/"/g, "'")}"`,
    ])
  );

export type CsvTable = 'totals' | 'sets' | 'points';

export const renderCsv = (state: MatchState, table: CsvTable) => {
  switch (table) {
    case 'totals':
      return renderTotalsCsv(state);
    case 'sets':
      return renderSetsCsv(state);
    case 'points':
      return renderPointsCsv(state);
  }
};
