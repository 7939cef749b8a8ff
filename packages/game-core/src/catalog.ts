// packages/game-core/src/catalog.ts
//
// Puzzle catalog: a text file with one puzzle code per line.
//
// A puzzle is identified by its 1-based line number, so ids stay stable when
// puzzles are appended. Blank lines and `#` comments are skipped. A line that
// fails to decode is collected as a failure and the rest of the catalog still
// loads.

import { loadPuzzle } from './codec.js';
import type { MalformedCodeError } from './errors.js';
import type { Puzzle } from './puzzle.js';

export interface CatalogEntry {
  readonly id: number;
  readonly puzzle: Puzzle;
}

export interface CatalogFailure {
  readonly line: number;
  readonly error: MalformedCodeError;
}

export interface Catalog {
  readonly entries: readonly CatalogEntry[];
  readonly failures: readonly CatalogFailure[];
}

export function parseCatalog(text: string): Catalog {
  const entries: CatalogEntry[] = [];
  const failures: CatalogFailure[] = [];

  text.split(/\r?\n/).forEach((raw, i) => {
    const line = raw.trim();
    if (!line || line.startsWith('#')) return;

    const result = loadPuzzle(line);
    if (result.success) entries.push({ id: i + 1, puzzle: result.data });
    else failures.push({ line: i + 1, error: result.error });
  });

  return { entries, failures };
}

export function findPuzzle(catalog: Catalog, id: number): Puzzle | undefined {
  return catalog.entries.find((e) => e.id === id)?.puzzle;
}
