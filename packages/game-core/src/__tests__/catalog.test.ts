// packages/game-core/src/__tests__/catalog.test.ts

import { findPuzzle, parseCatalog } from '../index.js';
import { START_CODE } from './fixtures.js';

describe('parseCatalog', () => {
  const text = ['# sample catalog', '1.l.4.CART.nAAVn', '', 'garbage', START_CODE].join('\n');

  it('numbers puzzles by line and skips comments and blanks', () => {
    const catalog = parseCatalog(text);
    expect(catalog.entries.map((e) => e.id)).toEqual([2, 5]);
    expect(findPuzzle(catalog, 5)?.words).toHaveLength(4);
    expect(findPuzzle(catalog, 4)).toBeUndefined();
  });

  it('collects lines that fail to decode', () => {
    const { failures } = parseCatalog(text);
    expect(failures).toHaveLength(1);
    expect(failures[0].line).toBe(4);
    expect(failures[0].error.message).toBe('expected 5 sections, found 1');
  });
});
