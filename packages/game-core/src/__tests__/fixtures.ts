// packages/game-core/src/__tests__/fixtures.ts
//
// Small latin puzzles shared by the tests.
//
// "s t a r t" (one row) holds four words once compiled with DICTIONARY:
//
//   index  word   classification  path
//   0      rats   excluded        (3,0) → (0,0), westward
//   1      star   normal          (0,0) → (3,0)
//   2      start  normal          (0,0) → (4,0)
//   3      tart   bonus           (1,0) → (4,0)

import { Dictionary, LATIN, compilePuzzle, type Coord, type Puzzle } from '../index.js';

export const START_GRID = 's t a r t';
export const DICTIONARY = Dictionary.fromWords(['star', 'start', 'tart', 'rats', 'art', 'arts']);
export const START_CODE = '1.l.5.START.xADOm,nAAVn,nAAVV,bABVn';

export function buildStartPuzzle(): Puzzle {
  return compilePuzzle(START_GRID, LATIN, DICTIONARY, { bonus: ['tart'], excluded: ['rats'] }).puzzle;
}

/** Cells along row 0 from x = `from` to x = `to`, either direction. */
export function row(from: number, to: number): Coord[] {
  const out: Coord[] = [];
  const dx = from <= to ? 1 : -1;
  for (let x = from; x !== to + dx; x += dx) out.push({ x, y: 0 });
  return out;
}
