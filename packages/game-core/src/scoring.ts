// packages/game-core/src/scoring.ts
//
// Score policy, shared by the runtime and the authoring report.
//
// Rules:
//   • Only normal words score. Bonus words feed a separate tally; excluded
//     words feed nothing.
//   • A word's value depends only on its length, through a replaceable table.
//     The default grows faster than linearly so that a handful of long words
//     outweighs a pile of four-letter ones.
//   • The score is always derived from the found set, never stored, so it
//     cannot drift and never decreases as words are added.

import { letterCount } from './alphabet.js';
import { MIN_WORD_LENGTH, type Puzzle } from './puzzle.js';

export interface ScoringTable {
  /** points[i] is the value of a word of MIN_WORD_LENGTH + i letters. */
  readonly points: readonly number[];
  /** Added per letter beyond the last entry of `points`. */
  readonly extraLetterPoints: number;
}

export const DEFAULT_SCORING: ScoringTable = {
  points: [1, 2, 4, 7, 11, 16],
  extraLetterPoints: 6,
};

/**
 * pointsForLength returns the value of a normal word of `length` letters.
 *
 * Example (default table):
 *   4 → 1, 6 → 4, 9 → 16, 10 → 22, 12 → 34
 */
export function pointsForLength(length: number, table: ScoringTable = DEFAULT_SCORING): number {
  if (length < MIN_WORD_LENGTH || table.points.length === 0) return 0;

  const i = length - MIN_WORD_LENGTH;
  const last = table.points.length - 1;
  if (i <= last) return table.points[i];

  return table.points[last] + (i - last) * table.extraLetterPoints;
}

export interface ScoreSummary {
  score: number;
  maxScore: number;
  normalFound: number;
  normalTotal: number;
  bonusFound: number;
  bonusTotal: number;
  lettersFound: number;
  lettersTotal: number;
}

/**
 * summarizeScore tallies a found set (indices into puzzle.words).
 * Indices of excluded words, or outside the table, are ignored.
 */
export function summarizeScore(
  puzzle: Puzzle,
  found: Iterable<number>,
  table: ScoringTable = DEFAULT_SCORING,
): ScoreSummary {
  const summary: ScoreSummary = {
    score: 0,
    maxScore: 0,
    normalFound: 0,
    normalTotal: 0,
    bonusFound: 0,
    bonusTotal: 0,
    lettersFound: 0,
    lettersTotal: 0,
  };

  for (const w of puzzle.words) {
    if (w.classification === 'normal') {
      const n = letterCount(w.word);
      summary.normalTotal++;
      summary.lettersTotal += n;
      summary.maxScore += pointsForLength(n, table);
    } else if (w.classification === 'bonus') {
      summary.bonusTotal++;
    }
  }

  for (const i of new Set(found)) {
    const w = puzzle.words[i];
    if (!w) continue;
    if (w.classification === 'normal') {
      const n = letterCount(w.word);
      summary.normalFound++;
      summary.lettersFound += n;
      summary.score += pointsForLength(n, table);
    } else if (w.classification === 'bonus') {
      summary.bonusFound++;
    }
  }

  return summary;
}
