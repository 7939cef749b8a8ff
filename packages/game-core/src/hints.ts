// packages/game-core/src/hints.ts
//
// Hint computations. All of them are pure functions of the puzzle and the
// set of words found so far.
//
// Hint levels disclose progressively more about the words still hidden:
//
//   0 → only each hidden word's length
//   1 → plus per-cell counts: how many hidden words start at, and pass
//       through, every cell
//   2 → plus, depending on the player's chosen style, either the hidden
//       words' alphabetical positions among the found ones ("alphabetical")
//       or some of their letters ("partial")
//
// Each level shows everything the level below it shows.
//
// Levels also unlock on their own as the player progresses: a threshold
// table gives, per level above 0, the fraction of the puzzle's normal-word
// letters that must be found before that level is reached.

import { letterCount } from './alphabet.js';
import { MIN_WORD_LENGTH, type Puzzle } from './puzzle.js';

export type HintLevel = 0 | 1 | 2;
export const HINT_LEVELS: readonly HintLevel[] = [0, 1, 2];
export const MAX_HINT_LEVEL: HintLevel = 2;

export type HintStyle = 'alphabetical' | 'partial';

export function isHintLevel(value: number): value is HintLevel {
  return value === 0 || value === 1 || value === 2;
}

/* -------------------------------------------------------------------------- */
/*                              Level thresholds                              */
/* -------------------------------------------------------------------------- */

/** thresholds[i] is the found-letter fraction that unlocks level i + 1. */
export type HintThresholds = readonly number[];

export const DEFAULT_HINT_THRESHOLDS: HintThresholds = [0.25, 0.5];

/**
 * Throws RangeError unless every threshold is in (0, 1], they never
 * decrease, and there is at most one per level above 0.
 */
export function assertHintThresholds(thresholds: HintThresholds): void {
  if (thresholds.length > MAX_HINT_LEVEL) {
    throw new RangeError(`at most ${MAX_HINT_LEVEL} hint thresholds are supported`);
  }
  thresholds.forEach((t, i) => {
    if (!(t > 0 && t <= 1)) throw new RangeError(`hint threshold ${t} is outside (0, 1]`);
    if (i > 0 && t < thresholds[i - 1]) throw new RangeError('hint thresholds must not decrease');
  });
}

/**
 * automaticHintLevel is the highest level whose threshold the found letters
 * have reached.
 *
 * Example (default thresholds, 12 letters in total):
 *   2 found → 0, 3 found → 1, 6 found → 2
 */
export function automaticHintLevel(
  lettersFound: number,
  lettersTotal: number,
  thresholds: HintThresholds = DEFAULT_HINT_THRESHOLDS,
): HintLevel {
  let level: HintLevel = 0;
  if (lettersTotal === 0) return level;
  for (const l of HINT_LEVELS) {
    const t = l > 0 ? thresholds[l - 1] : undefined;
    if (t !== undefined && lettersFound >= t * lettersTotal) level = l;
  }
  return level;
}

/* -------------------------------------------------------------------------- */
/*                                 Cell counts                                */
/* -------------------------------------------------------------------------- */

export interface CellCounts {
  /** Hidden words whose path starts here. */
  starts: number;
  /** Hidden words whose path passes through here (the start included). */
  visits: number;
}

/**
 * cellCounts counts, for every cell (row-major, gaps included as zeros),
 * the not-yet-found normal and bonus words using it. Each word is counted
 * along its first path only, so a word never counts twice on one cell.
 */
export function cellCounts(puzzle: Puzzle, found: ReadonlySet<number>): CellCounts[] {
  const { grid } = puzzle;
  const counts = Array.from({ length: grid.cellCount }, () => ({ starts: 0, visits: 0 }));

  puzzle.words.forEach((w, i) => {
    if (w.classification === 'excluded' || found.has(i)) return;
    const path = w.paths[0];
    if (!path || path.length === 0) return;

    counts[grid.indexOf(path[0])].starts++;
    for (const c of path) counts[grid.indexOf(c)].visits++;
  });

  return counts;
}

/* -------------------------------------------------------------------------- */
/*                           Alphabetical insertion                           */
/* -------------------------------------------------------------------------- */

export type ListEntry =
  | { kind: 'found'; index: number }
  | { kind: 'hidden'; index: number };

/**
 * alphabeticalInsertion merges the hidden words, sorted alphabetically, into
 * the found words as they were discovered. Walking both lists, a hidden word
 * is emitted before the next found word whenever it sorts before it.
 *
 * Example: found (in order) ["tame", "bead"], hidden ["cork", "acre"]
 *   hidden sorted → ["acre", "cork"]
 *   → acre, cork, tame, bead
 *   ("acre" < "tame", "cork" < "tame"; "bead" is then emitted last)
 */
export function alphabeticalInsertion(
  puzzle: Puzzle,
  foundOrder: readonly number[],
  hidden: readonly number[],
): ListEntry[] {
  const { alphabet } = puzzle.grid;
  const word = (i: number) => puzzle.words[i].word;
  const sortedHidden = [...hidden].sort((a, b) => alphabet.compareWords(word(a), word(b)));

  const out: ListEntry[] = [];
  let f = 0;
  let h = 0;
  while (f < foundOrder.length && h < sortedHidden.length) {
    if (alphabet.compareWords(word(sortedHidden[h]), word(foundOrder[f])) < 0) {
      out.push({ kind: 'hidden', index: sortedHidden[h++] });
    } else {
      out.push({ kind: 'found', index: foundOrder[f++] });
    }
  }
  while (f < foundOrder.length) out.push({ kind: 'found', index: foundOrder[f++] });
  while (h < sortedHidden.length) out.push({ kind: 'hidden', index: sortedHidden[h++] });

  return out;
}

/* -------------------------------------------------------------------------- */
/*                               Partial reveal                               */
/* -------------------------------------------------------------------------- */

export interface RevealPolicy {
  /** Letters shown from the start of the word. */
  readonly leading: number;
  /** Letters shown from the end of the word. */
  readonly trailing: number;
}

export const DEFAULT_REVEAL: RevealPolicy = { leading: 1, trailing: 1 };

/**
 * Throws RangeError unless the policy leaves at least one letter of the
 * shortest possible word hidden.
 */
export function assertRevealPolicy(policy: RevealPolicy): void {
  const { leading, trailing } = policy;
  if (!Number.isInteger(leading) || !Number.isInteger(trailing) || leading < 0 || trailing < 0) {
    throw new RangeError('reveal counts must be non-negative integers');
  }
  if (leading + trailing >= MIN_WORD_LENGTH) {
    throw new RangeError(
      `revealing ${leading + trailing} letters would show whole ${MIN_WORD_LENGTH}-letter words`,
    );
  }
}

/**
 * revealLetters returns the word's letters with the middle hidden (null).
 *
 * Example (default policy): "𐑤𐑦𐑑𐑤" → ["𐑤", null, null, "𐑤"]
 */
export function revealLetters(word: string, policy: RevealPolicy = DEFAULT_REVEAL): (string | null)[] {
  const letters = Array.from(word);
  const n = letters.length;
  return letters.map((l, i) => (i < policy.leading || i >= n - policy.trailing ? l : null));
}

/** Letters of a hidden word with nothing revealed. */
export function maskedLetters(word: string): null[] {
  return Array.from({ length: letterCount(word) }, () => null);
}
