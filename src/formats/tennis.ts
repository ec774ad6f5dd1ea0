import type { MatchFormat } from '../engine/types.js';
import type { RegisteredFormat } from './types.js';

const SETS_TO_WIN = 2;
const SET_TIEBREAK_TARGET = 7;
const DECIDING_TIEBREAK_TARGET = 10;

const bestOfThree = (
  overrides: Pick<MatchFormat, 'code' | 'label' | 'gamesToWinSet' | 'tiebreakAtGames' | 'decidingPolicy'>
): MatchFormat =>
  Object.freeze({
    ...overrides,
    setTiebreakTarget: SET_TIEBREAK_TARGET,
    decidingTiebreakTarget: DECIDING_TIEBREAK_TARGET,
    setsToWin: SETS_TO_WIN,
  });

export const tennisFormats: RegisteredFormat[] = [
  {
    code: 'BO3',
    choice: 1,
    format: bestOfThree({
      code: 'BO3',
      label: 'Best-of-3 full sets (to 6, TB7 at 6-6)',
      gamesToWinSet: 6,
      tiebreakAtGames: 6,
      decidingPolicy: 'REGULAR_THIRD_SET',
    }),
  },
  {
    code: 'BO3_MTB10',
    choice: 2,
    format: bestOfThree({
      code: 'BO3_MTB10',
      label: 'Best-of-3 with match TB10 instead of 3rd set',
      gamesToWinSet: 6,
      tiebreakAtGames: 6,
      decidingPolicy: 'MATCH_TIEBREAK_10',
    }),
  },
  {
    code: 'SHORT4',
    choice: 3,
    format: bestOfThree({
      code: 'SHORT4',
      label: 'Best-of-3 short sets to 4 (TB7 at 4-4)',
      gamesToWinSet: 4,
      tiebreakAtGames: 4,
      decidingPolicy: 'REGULAR_THIRD_SET',
    }),
  },
];

export const FALLBACK_FORMAT_CODE = 'SHORT4';
