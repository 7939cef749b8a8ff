// packages/game-core/src/puzzle.ts
//
// The compiled puzzle: a grid plus its classified words.
//
// A puzzle is built once by the compiler (or by decoding a puzzle code) and
// never changes afterwards; game sessions share it by reference.

import type { Coord } from './directions.js';
import { sameCoord } from './directions.js';
import type { Grid } from './grid.js';

/** Shortest word a puzzle may contain. */
export const MIN_WORD_LENGTH = 4;

export type Path = readonly Coord[];

/**
 * Classification of a word:
 *  - "normal"   → counts toward score and completion
 *  - "bonus"    → optional, tallied separately
 *  - "excluded" → present in the grid but never scored or counted
 */
export type Classification = 'normal' | 'bonus' | 'excluded';

export const CLASSIFICATIONS: readonly Classification[] = ['normal', 'bonus', 'excluded'];

export interface PuzzleWord {
  readonly word: string;
  readonly classification: Classification;
  /** Every route through the grid that spells the word, in discovery order. */
  readonly paths: readonly Path[];
}

export interface Puzzle {
  readonly grid: Grid;
  readonly words: readonly PuzzleWord[];
}

/** Letters along a path, or null if it touches a gap or leaves the grid. */
export function spell(grid: Grid, path: Path): string | null {
  let out = '';
  for (const c of path) {
    const letter = grid.at(c);
    if (letter === null) return null;
    out += letter;
  }
  return out;
}

/**
 * checkPath validates a path against the grid: every cell present, each
 * consecutive pair adjacent, no cell repeated.
 *
 * @returns a description of the first problem, or null for a valid path
 */
export function checkPath(grid: Grid, path: Path): string | null {
  if (path.length === 0) return 'empty path';

  for (let i = 0; i < path.length; i++) {
    const c = path[i];
    if (!grid.isPresent(c)) return `cell (${c.x}, ${c.y}) is not a letter`;
    if (i > 0 && !grid.isAdjacent(path[i - 1], c)) {
      return `cells (${path[i - 1].x}, ${path[i - 1].y}) and (${c.x}, ${c.y}) are not adjacent`;
    }
    for (let j = 0; j < i; j++) {
      if (sameCoord(path[j], c)) return `cell (${c.x}, ${c.y}) is visited twice`;
    }
  }

  return null;
}

/** Words that count toward completion. */
export function normalWords(puzzle: Puzzle): PuzzleWord[] {
  return puzzle.words.filter((w) => w.classification === 'normal');
}
