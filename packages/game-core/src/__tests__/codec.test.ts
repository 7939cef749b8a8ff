// packages/game-core/src/__tests__/codec.test.ts
//
// Puzzle code encoding and the decoder's structural checks.

import { LATIN, MalformedCodeError, decodePuzzle, loadPuzzle, savePuzzle } from '../index.js';
import { START_CODE, buildStartPuzzle, row } from './fixtures.js';

describe('savePuzzle / decodePuzzle', () => {
  it('encodes a single-word puzzle compactly', () => {
    const puzzle = decodePuzzle('1.l.4.CART.nAAVn');
    expect(puzzle.grid.alphabet).toBe(LATIN);
    expect(puzzle.grid.rows()).toEqual([['c', 'a', 'r', 't']]);
    expect(puzzle.words).toEqual([{ word: 'cart', classification: 'normal', paths: [row(0, 3)] }]);
    expect(savePuzzle(puzzle)).toBe('1.l.4.CART.nAAVn');
  });

  it('round-trips words, classifications and grid', () => {
    const puzzle = buildStartPuzzle();
    const decoded = decodePuzzle(savePuzzle(puzzle));
    expect(decoded.words).toEqual(puzzle.words);
    expect(decoded.grid.rows()).toEqual(puzzle.grid.rows());
    expect(savePuzzle(decoded)).toBe(START_CODE);
  });

  it('keeps every path of a word', () => {
    const puzzle = decodePuzzle('1.l.4.ABBA.nAAVn+ADOm');
    expect(puzzle.words[0].paths).toEqual([row(0, 3), row(3, 0)]);
  });

  it('accepts a puzzle without words and keeps gaps', () => {
    const puzzle = decodePuzzle('1.l.2.A~~B.');
    expect(puzzle.words).toEqual([]);
    expect(puzzle.grid.rows()).toEqual([
      ['a', null],
      [null, 'b'],
    ]);
  });
});

describe('decodePuzzle rejects malformed codes', () => {
  it.each([
    ['1.l.4.CART', 'expected 5 sections, found 4'],
    ['2.l.4.CART.nAAVn', 'unsupported version "2"'],
    ['1.q.4.CART.nAAVn', 'unknown alphabet "q"'],
    ['1.l.0.CART.nAAVn', 'invalid width "0"'],
    ['1.l.3.CART.nAAVn', '4 cells do not fill rows of 3'],
    ['1.l.4.CAR!.nAAVn', 'invalid cell "!" at position 3'],
    ['1.l.4.CARa.nAAVn', 'invalid cell "a" at position 3'],
    ['1.l.4.~~~~.', 'grid has no letters'],
    ['1.l.4.CART.zAAVn', 'word 1: unknown classification tag "z"'],
    ['1.l.4.CART.n', 'word 1: no path'],
    ['1.l.4.CART.nA', 'word 1: truncated path'],
    ['1.l.4.CART.nAE', 'word 1: start cell 4 is outside the grid'],
    ['1.l.4.CART.nAAmV', 'word 1: invalid step "m"'],
    ['1.l.4.CART.nAAVm', 'word 1: cell (1, 0) is visited twice'],
    ['1.l.4.CART.nADn', 'word 1: cell (4, 0) is not a letter'],
    ['1.l.4.CART.nAAVV', 'word 1: path is longer than the grid has cells'],
    ['1.l.4.CART.nAAV', 'word 1: "car" is shorter than 4 letters'],
    ['1.l.4.CART.nAAVn+ADOm', 'word 1: paths spell different words'],
    ['1.l.4.CART.nAAVn,bAAVn', '"cart" appears more than once'],
  ])('%s', (code, message) => {
    expect(() => decodePuzzle(code)).toThrow(new MalformedCodeError(message));
  });
});

describe('long paths', () => {
  it('stops at the first step past the grid size', () => {
    const code = `1.l.4.CART.nAA${'V'.repeat(100_000)}`;
    expect(() => decodePuzzle(code)).toThrow(
      new MalformedCodeError('word 1: path is longer than the grid has cells'),
    );
  });
});

describe('loadPuzzle', () => {
  it('returns the puzzle on success', () => {
    const result = loadPuzzle(START_CODE);
    expect(result.success).toBe(true);
    if (result.success) expect(result.data.words).toHaveLength(4);
  });

  it('returns the error instead of throwing', () => {
    const result = loadPuzzle('not a code');
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(MalformedCodeError);
      expect(result.error.message).toBe('expected 5 sections, found 1');
    }
  });
});
