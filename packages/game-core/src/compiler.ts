// packages/game-core/src/compiler.ts
//
// Offline puzzle compilation: authoring grid + dictionary + curated word
// lists → Puzzle.
//
// Curation is a human job. The bonus and excluded lists name words the
// finder may discover; anything not listed is normal. Listed words the grid
// does not contain are reported as warnings and otherwise ignored.

import type { Alphabet } from './alphabet.js';
import type { Dictionary } from './dictionary.js';
import { parseGrid } from './grid.js';
import type { Classification, Puzzle, PuzzleWord } from './puzzle.js';
import { findWords, type FindOptions, type FoundWord } from './wordFinder.js';

export interface ClassificationLists {
  bonus?: Iterable<string>;
  excluded?: Iterable<string>;
}

export type CompileWarning =
  | { kind: 'no-words' }
  | { kind: 'unknown-classification-word'; list: 'bonus' | 'excluded'; word: string }
  | { kind: 'conflicting-classification'; word: string };

export interface ClassifyResult {
  words: PuzzleWord[];
  warnings: CompileWarning[];
}

export interface CompileResult {
  puzzle: Puzzle;
  warnings: CompileWarning[];
}

/**
 * classifyWords tags each found word. A word on both lists is excluded
 * (and reported); a listed word the finder never produced is reported once
 * per list.
 */
export function classifyWords(
  found: readonly FoundWord[],
  lists: ClassificationLists = {},
): ClassifyResult {
  const bonus = new Set(lists.bonus ?? []);
  const excluded = new Set(lists.excluded ?? []);
  const known = new Set(found.map((f) => f.word));
  const warnings: CompileWarning[] = [];

  const words = found.map(({ word, paths }) => {
    let classification: Classification = 'normal';
    if (excluded.has(word)) {
      classification = 'excluded';
      if (bonus.has(word)) warnings.push({ kind: 'conflicting-classification', word });
    } else if (bonus.has(word)) {
      classification = 'bonus';
    }
    return { word, classification, paths };
  });

  for (const word of bonus) {
    if (!known.has(word)) warnings.push({ kind: 'unknown-classification-word', list: 'bonus', word });
  }
  for (const word of excluded) {
    if (!known.has(word)) warnings.push({ kind: 'unknown-classification-word', list: 'excluded', word });
  }

  return { words, warnings };
}

/**
 * compilePuzzle runs the whole pipeline for one grid.
 *
 * @throws MalformedGridError if the grid text is invalid
 */
export function compilePuzzle(
  gridText: string,
  alphabet: Alphabet,
  dictionary: Dictionary,
  lists: ClassificationLists = {},
  options: FindOptions = {},
): CompileResult {
  const grid = parseGrid(gridText, alphabet);
  const found = findWords(grid, dictionary, options);
  const { words, warnings } = classifyWords(found, lists);

  if (words.length === 0) warnings.unshift({ kind: 'no-words' });

  return { puzzle: { grid, words }, warnings };
}
