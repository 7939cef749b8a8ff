// packages/game-core/src/__tests__/report.test.ts

import { LATIN, compilePuzzle, renderReport } from '../index.js';
import { DICTIONARY, buildStartPuzzle } from './fixtures.js';

describe('renderReport', () => {
  it('lays out letters, counts, words and totals', () => {
    expect(renderReport(buildStartPuzzle())).toBe(
      [
        '  s     t     a     r     t',
        ' 2 2   1 3   0 3   0 3   0 2',
        '',
        'rats (excluded)',
        'star',
        'start',
        'tart (bonus)',
        '',
        '2 words, 1 bonus, 1 excluded, 3 points',
      ].join('\n'),
    );
  });

  it('indents odd rows by half a cell and leaves gaps blank in the counts', () => {
    const { puzzle } = compilePuzzle('s t a r\n . t', LATIN, DICTIONARY);
    const lines = renderReport(puzzle).split('\n');
    expect(lines[2]).toBe('     .     t');
    expect(lines[3]).toBe(`${' '.repeat(10)}0 0`);
  });
});
