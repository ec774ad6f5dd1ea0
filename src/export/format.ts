import type { PlayerSide, PointEvent, RallyOutcome, ReturnOutcome, ServeOutcome, ServeType } from '../engine/types.js';

export const safePercent = (num: number, den: number) => {
  if (den <= 0) return '--';
  return `${((100 * num) / den).toFixed(1)}%`;
};

export const sideLabel = (side: PlayerSide) => (side === 'A' ? 'P1' : 'P2');

export const serveTypeLabel = (serveType: ServeType) => (serveType === 'FIRST' ? '1st' : '2nd');

const SERVE_TEXT: Record<ServeOutcome, string> = {
  FIRST_IN: '1st in; ',
  FIRST_FAULT: '1st fault -> ',
  SECOND_IN: '2nd in; ',
  DOUBLE_FAULT: 'double fault.',
  ACE_FIRST: 'Ace (1st).',
  ACE_SECOND: 'Ace (2nd).',
  SERVICE_WINNER_FIRST: 'Service winner (1st).',
  SERVICE_WINNER_SECOND: 'Service winner (2nd).',
};

const RETURN_TEXT: Record<ReturnOutcome, string> = {
  RETURN_WINNER: 'Return winner.',
  RETURN_UNFORCED_ERROR: 'Return UE.',
  RETURN_FORCED_ERROR: 'Return FE (drawn by server).',
  RETURN_IN: 'Return in; ',
};

const RALLY_TEXT: Record<RallyOutcome, string> = {
  SERVER_WINNER: 'Rally: server winner.',
  RETURNER_WINNER: 'Rally: returner winner.',
  SERVER_UNFORCED_ERROR: 'Rally: server UE.',
  RETURNER_UNFORCED_ERROR: 'Rally: returner UE.',
  SERVER_FORCED_ERROR_DRAWN: 'Rally: server FE (drawn by returner).',
  RETURNER_FORCED_ERROR_DRAWN: 'Rally: returner FE (drawn by server).',
};

/** Human-readable trail of a point, e.g. `1st fault -> 2nd in; Return in; Rally: server winner.` */
export const describeEvent = (event: PointEvent) => {
  let text = event.serve.map((serve) => SERVE_TEXT[serve]).join('');
  if (event.return) text += RETURN_TEXT[event.return];
  if (event.rally) text += RALLY_TEXT[event.rally];
  if (event.netMark) text += ` Net: ${sideLabel(event.netMark)}.`;
  return text;
};

const pad2 = (value: number) => String(value).padStart(2, '0');

const timestamp = (date: Date) =>
  `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}_` +
  `${pad2(date.getHours())}-${pad2(date.getMinutes())}-${pad2(date.getSeconds())}`;

export const exportBaseName = (players: Record<PlayerSide, string>, at: Date = new Date()) =>
  `${players.A}_vs_${players.B}_${timestamp(at)}`.replace(/ /g, '_');
