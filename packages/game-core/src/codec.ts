// packages/game-core/src/codec.ts
//
// Puzzle code: the single-line text form of a compiled puzzle, one per line
// in the puzzle catalog.
//
// Layout (version 1), sections separated by ".":
//
//   1.<alphabet tag>.<width>.<cells>.<entry>,<entry>,...
//
//   cells  one character per cell, row-major: the letter's position in the
//          alphabet as a base-64 digit, or "~" for a gap. Height is implied
//          by the cell count.
//   entry  classification tag ("n" normal, "b" bonus, "x" excluded) followed
//          by one or more paths joined with "+".
//   path   start cell index as two base-64 digits, then the direction steps
//          (0–5) packed two per digit as 6·a+b; an odd final step is written
//          as the digit 36+step.
//
// Words are stored only as paths; the decoder spells them from the grid, so
// loading a puzzle never needs a dictionary. Anything that does not decode
// to a structurally valid grid and word table is rejected.
//
// Example: the latin grid "c a r t" holding the normal word "cart" encodes
// to "1.l.4.CART.nAAVn" (start cell 0, steps east-east packed as "V", the
// last east step as "n").

import { alphabetByTag, letterCount } from './alphabet.js';
import { directionBetween, isDirection, step, type Coord, type Direction } from './directions.js';
import { MalformedCodeError } from './errors.js';
import { Grid, MAX_GRID_SIZE, type Cell } from './grid.js';
import {
  MIN_WORD_LENGTH,
  checkPath,
  spell,
  type Classification,
  type Path,
  type Puzzle,
  type PuzzleWord,
} from './puzzle.js';

export const CODE_VERSION = '1';

const DIGITS = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789-_';
const GAP_CHAR = '~';
const PAIR_LIMIT = 36;

const TAGS: Readonly<Record<Classification, string>> = {
  normal: 'n',
  bonus: 'b',
  excluded: 'x',
};

const TAG_LOOKUP: ReadonlyMap<string, Classification> = new Map<string, Classification>([
  [TAGS.normal, 'normal'],
  [TAGS.bonus, 'bonus'],
  [TAGS.excluded, 'excluded'],
]);

export type LoadResult =
  | { success: true; data: Puzzle }
  | { success: false; error: MalformedCodeError };

function digitValue(ch: string): number {
  return ch.length === 1 ? DIGITS.indexOf(ch) : -1;
}

/* -------------------------------------------------------------------------- */
/*                                  Encoding                                  */
/* -------------------------------------------------------------------------- */

function encodePath(grid: Grid, path: Path): string {
  if (path.length === 0) throw new Error('cannot encode an empty path');

  const start = grid.indexOf(path[0]);
  let out = DIGITS[start >> 6] + DIGITS[start & 63];

  const steps: Direction[] = [];
  for (let i = 1; i < path.length; i++) {
    const d = directionBetween(path[i - 1], path[i]);
    if (d === null) throw new Error('cannot encode a path through non-adjacent cells');
    steps.push(d);
  }

  let i = 0;
  for (; i + 1 < steps.length; i += 2) out += DIGITS[steps[i] * 6 + steps[i + 1]];
  if (i < steps.length) out += DIGITS[PAIR_LIMIT + steps[i]];

  return out;
}

/**
 * savePuzzle encodes a puzzle as a single printable line.
 *
 * The output is a pure function of the puzzle, so compiling the same grid
 * with the same dictionary always yields the same code.
 */
export function savePuzzle(puzzle: Puzzle): string {
  const { grid } = puzzle;
  const cells = grid
    .rows()
    .flat()
    .map((c) => (c === null ? GAP_CHAR : DIGITS[grid.alphabet.indexOf(c)]))
    .join('');
  const entries = puzzle.words.map(
    (w) => TAGS[w.classification] + w.paths.map((p) => encodePath(grid, p)).join('+'),
  );

  return [CODE_VERSION, grid.alphabet.tag, String(grid.width), cells, entries.join(',')].join('.');
}

/* -------------------------------------------------------------------------- */
/*                                  Decoding                                  */
/* -------------------------------------------------------------------------- */

function decodePath(grid: Grid, text: string, label: string): Path {
  if (text.length < 2) throw new MalformedCodeError(`${label}: truncated path`);

  const hi = digitValue(text[0]);
  const lo = digitValue(text[1]);
  if (hi < 0 || lo < 0) throw new MalformedCodeError(`${label}: invalid start cell "${text.slice(0, 2)}"`);

  const start = hi * 64 + lo;
  if (start >= grid.cellCount) throw new MalformedCodeError(`${label}: start cell ${start} is outside the grid`);

  let cell: Coord = grid.coordAt(start);
  const path: Coord[] = [cell];

  for (let i = 2; i < text.length; i++) {
    const v = digitValue(text[i]);
    let steps: number[];
    if (v >= 0 && v < PAIR_LIMIT) {
      steps = [Math.floor(v / 6), v % 6];
    } else if (v >= PAIR_LIMIT && v < PAIR_LIMIT + 6 && i === text.length - 1) {
      steps = [v - PAIR_LIMIT];
    } else {
      throw new MalformedCodeError(`${label}: invalid step "${text[i]}"`);
    }

    for (const s of steps) {
      if (!isDirection(s)) throw new MalformedCodeError(`${label}: invalid step "${text[i]}"`);
      cell = step(cell, s);
      path.push(cell);
    }
    if (path.length > grid.cellCount) {
      throw new MalformedCodeError(`${label}: path is longer than the grid has cells`);
    }
  }

  const problem = checkPath(grid, path);
  if (problem) throw new MalformedCodeError(`${label}: ${problem}`);

  return path;
}

function decodeEntry(grid: Grid, entry: string, index: number): PuzzleWord {
  const label = `word ${index + 1}`;
  const classification = TAG_LOOKUP.get(entry.charAt(0));
  if (!classification) {
    throw new MalformedCodeError(`${label}: unknown classification tag "${entry.charAt(0)}"`);
  }

  const body = entry.slice(1);
  if (!body) throw new MalformedCodeError(`${label}: no path`);

  const paths = body.split('+').map((p) => decodePath(grid, p, label));
  const word = spell(grid, paths[0]);
  if (word === null) throw new MalformedCodeError(`${label}: path leaves the grid`);

  if (letterCount(word) < MIN_WORD_LENGTH) {
    throw new MalformedCodeError(`${label}: "${word}" is shorter than ${MIN_WORD_LENGTH} letters`);
  }
  for (const p of paths.slice(1)) {
    if (spell(grid, p) !== word) throw new MalformedCodeError(`${label}: paths spell different words`);
  }

  return { word, classification, paths };
}

/**
 * decodePuzzle parses a puzzle code.
 *
 * @throws MalformedCodeError describing the first structural problem found
 */
export function decodePuzzle(code: string): Puzzle {
  const sections = code.split('.');
  if (sections.length !== 5) {
    throw new MalformedCodeError(`expected 5 sections, found ${sections.length}`);
  }
  const [version, tag, widthText, cellText, entryText] = sections;

  if (version !== CODE_VERSION) throw new MalformedCodeError(`unsupported version "${version}"`);

  const alphabet = alphabetByTag(tag);
  if (!alphabet) throw new MalformedCodeError(`unknown alphabet "${tag}"`);

  if (!/^[1-9][0-9]*$/.test(widthText) || Number(widthText) > MAX_GRID_SIZE) {
    throw new MalformedCodeError(`invalid width "${widthText}"`);
  }
  const width = Number(widthText);

  const cellChars = Array.from(cellText);
  if (cellChars.length === 0 || cellChars.length % width !== 0) {
    throw new MalformedCodeError(`${cellChars.length} cells do not fill rows of ${width}`);
  }
  const height = cellChars.length / width;
  if (height > MAX_GRID_SIZE) throw new MalformedCodeError(`grid has ${height} rows`);

  const cells: Cell[] = cellChars.map((ch, i) => {
    if (ch === GAP_CHAR) return null;
    const letter = alphabet.letterAt(digitValue(ch));
    if (letter === undefined) throw new MalformedCodeError(`invalid cell "${ch}" at position ${i}`);
    return letter;
  });
  if (cells.every((c) => c === null)) throw new MalformedCodeError('grid has no letters');

  const grid = new Grid(alphabet, width, height, cells);
  const words = entryText === '' ? [] : entryText.split(',').map((e, i) => decodeEntry(grid, e, i));

  const seen = new Set<string>();
  for (const w of words) {
    if (seen.has(w.word)) throw new MalformedCodeError(`"${w.word}" appears more than once`);
    seen.add(w.word);
  }

  return { grid, words };
}

/** Decodes a puzzle code without throwing on malformed input. */
export function loadPuzzle(code: string): LoadResult {
  try {
    return { success: true, data: decodePuzzle(code) };
  } catch (err) {
    if (err instanceof MalformedCodeError) return { success: false, error: err };
    throw err;
  }
}
