// packages/game-core/src/wordFinder.ts
//
// Exhaustive word search over a hex grid.
//
// Starting from every present cell (row-major), a depth-first search extends
// the current route by one unvisited neighbour at a time (compass order) and
// follows the matching branch of the dictionary's prefix tree. A route whose
// letters leave the tree is abandoned immediately, so the search only ever
// branches as far as real prefixes allow.
//
// Every route spelling a word of at least MIN_WORD_LENGTH letters is kept:
// the runtime must accept any of them as a trace. The fixed visiting order
// makes the result, and therefore the encoded puzzle, reproducible.

import type { Dictionary, DictionaryNode } from './dictionary.js';
import type { Coord } from './directions.js';
import type { Grid } from './grid.js';
import { MIN_WORD_LENGTH, type Path } from './puzzle.js';

export interface FoundWord {
  readonly word: string;
  readonly paths: readonly Path[];
}

export interface FindOptions {
  /** Raise the minimum word length. Values below 4 are ignored. */
  minimumLength?: number;
}

/**
 * findWords lists every dictionary word that can be traced through the grid.
 *
 * @returns words in the grid alphabet's order, each with all of its paths
 *
 * Example (latin alphabet, dictionary ["cart", "art"]):
 *   grid "c a r t" → [{ word: "cart", paths: [[(0,0),(1,0),(2,0),(3,0)]] }]
 *   ("art" is too short to be recorded)
 */
export function findWords(
  grid: Grid,
  dictionary: Dictionary,
  options: FindOptions = {},
): FoundWord[] {
  const minimumLength = Math.max(MIN_WORD_LENGTH, options.minimumLength ?? MIN_WORD_LENGTH);
  const found = new Map<string, Path[]>();
  const visited = new Uint8Array(grid.cellCount);
  const route: Coord[] = [];
  const letters: string[] = [];

  const search = (cell: Coord, letter: string, node: DictionaryNode): void => {
    visited[grid.indexOf(cell)] = 1;
    route.push(cell);
    letters.push(letter);

    if (node.isWord && route.length >= minimumLength) {
      const word = letters.join('');
      const paths = found.get(word);
      if (paths) paths.push([...route]);
      else found.set(word, [[...route]]);
    }

    for (const next of grid.neighbors(cell)) {
      if (visited[grid.indexOf(next)]) continue;
      const nextLetter = grid.at(next);
      if (nextLetter === null) continue;
      const child = node.children.get(nextLetter);
      if (child) search(next, nextLetter, child);
    }

    letters.pop();
    route.pop();
    visited[grid.indexOf(cell)] = 0;
  };

  for (const start of grid.presentCells()) {
    const letter = grid.at(start);
    if (letter === null) continue;
    const node = dictionary.root.children.get(letter);
    if (node) search(start, letter, node);
  }

  return [...found.entries()]
    .map(([word, paths]) => ({ word, paths }))
    .sort((a, b) => grid.alphabet.compareWords(a.word, b.word));
}
