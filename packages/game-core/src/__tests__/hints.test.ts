// packages/game-core/src/__tests__/hints.test.ts
//
// Cell counts, alphabetical insertion and partial reveal.

import {
  LATIN,
  alphabeticalInsertion,
  assertHintThresholds,
  assertRevealPolicy,
  automaticHintLevel,
  cellCounts,
  maskedLetters,
  parseGrid,
  revealLetters,
  type Puzzle,
} from '../index.js';
import { buildStartPuzzle } from './fixtures.js';

describe('cellCounts', () => {
  const puzzle = buildStartPuzzle();

  it('counts starts and visits of hidden normal and bonus words', () => {
    expect(cellCounts(puzzle, new Set())).toEqual([
      { starts: 2, visits: 2 },
      { starts: 1, visits: 3 },
      { starts: 0, visits: 3 },
      { starts: 0, visits: 3 },
      { starts: 0, visits: 2 },
    ]);
  });

  it('drops words once found', () => {
    expect(cellCounts(puzzle, new Set([1]))).toEqual([
      { starts: 1, visits: 1 },
      { starts: 1, visits: 2 },
      { starts: 0, visits: 2 },
      { starts: 0, visits: 2 },
      { starts: 0, visits: 2 },
    ]);
  });
});

describe('alphabeticalInsertion', () => {
  const puzzle: Puzzle = {
    grid: parseGrid('a', LATIN),
    words: ['acre', 'bead', 'cork', 'tame'].map((word) => ({
      word,
      classification: 'normal' as const,
      paths: [],
    })),
  };

  it('slots hidden words before the first found word they precede', () => {
    expect(alphabeticalInsertion(puzzle, [3, 1], [2, 0])).toEqual([
      { kind: 'hidden', index: 0 },
      { kind: 'hidden', index: 2 },
      { kind: 'found', index: 3 },
      { kind: 'found', index: 1 },
    ]);
  });

  it('appends hidden words that sort after every found word', () => {
    expect(alphabeticalInsertion(puzzle, [0], [3])).toEqual([
      { kind: 'found', index: 0 },
      { kind: 'hidden', index: 3 },
    ]);
  });
});

describe('partial reveal', () => {
  it('shows the first and last letter by default', () => {
    expect(revealLetters('abcdef')).toEqual(['a', null, null, null, null, 'f']);
    expect(revealLetters('𐑤𐑦𐑑𐑤')).toEqual(['𐑤', null, null, '𐑤']);
  });

  it('follows a custom policy', () => {
    expect(revealLetters('abcd', { leading: 2, trailing: 1 })).toEqual(['a', 'b', null, 'd']);
  });

  it('masks every letter of a hidden word', () => {
    expect(maskedLetters('𐑤𐑦𐑑𐑤')).toEqual([null, null, null, null]);
  });

  it('rejects policies that would reveal a whole four-letter word', () => {
    expect(() => assertRevealPolicy({ leading: 2, trailing: 2 })).toThrow(RangeError);
    expect(() => assertRevealPolicy({ leading: -1, trailing: 0 })).toThrow(RangeError);
    expect(() => assertRevealPolicy({ leading: 3, trailing: 0 })).not.toThrow();
  });
});

describe('automaticHintLevel', () => {
  it('unlocks levels as the found-letter fraction crosses each threshold', () => {
    expect([2, 3, 5, 6, 12].map((n) => automaticHintLevel(n, 12))).toEqual([0, 1, 1, 2, 2]);
  });

  it('stays at 0 without thresholds or letters', () => {
    expect(automaticHintLevel(12, 12, [])).toBe(0);
    expect(automaticHintLevel(0, 0)).toBe(0);
  });

  it('follows a custom table', () => {
    expect(automaticHintLevel(1, 10, [0.1])).toBe(1);
    expect(automaticHintLevel(9, 10, [0.1])).toBe(1);
  });

  it('rejects tables that decrease, leave (0, 1] or have too many entries', () => {
    expect(() => assertHintThresholds([0.5, 0.25])).toThrow(RangeError);
    expect(() => assertHintThresholds([0, 0.5])).toThrow(RangeError);
    expect(() => assertHintThresholds([0.5, 1.5])).toThrow(RangeError);
    expect(() => assertHintThresholds([0.2, 0.4, 0.6])).toThrow(RangeError);
    expect(() => assertHintThresholds([0.5, 0.5])).not.toThrow();
  });
});
