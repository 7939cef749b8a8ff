// packages/game-core/src/grid.ts
//
// Hexagonal letter grid, shared by the compiler and the runtime.
//
// Authoring format (one row per line):
//
//   𐑱 𐑖 𐑩
//    𐑼 𐑦 𐑤 𐑯
//   𐑦 𐑑 𐑟 𐑮 𐑴
//
//   • whitespace is layout only and is ignored
//   • `.` is a permanent gap (never a neighbour, never traversable)
//   • rows shorter than the longest one are padded with gaps
//   • leading/trailing blank lines are ignored, interior ones are an error

import type { Alphabet } from './alphabet.js';
import { DIRECTIONS, step, directionBetween, type Coord } from './directions.js';
import { MalformedGridError } from './errors.js';

export const GAP = '.';
export const MAX_GRID_SIZE = 64;

export type Cell = string | null;

export class Grid {
  private readonly cells: readonly Cell[];

  constructor(
    readonly alphabet: Alphabet,
    readonly width: number,
    readonly height: number,
    cells: readonly Cell[],
  ) {
    if (cells.length !== width * height) {
      throw new RangeError(
        `expected ${width * height} cells for a ${width}x${height} grid, got ${cells.length}`,
      );
    }
    this.cells = cells;
  }

  inBounds(c: Coord): boolean {
    return c.x >= 0 && c.y >= 0 && c.x < this.width && c.y < this.height;
  }

  /** Letter at a coordinate, or null for a gap or an out-of-bounds position. */
  at(c: Coord): Cell {
    return this.inBounds(c) ? this.cells[this.indexOf(c)] : null;
  }

  isPresent(c: Coord): boolean {
    return this.at(c) !== null;
  }

  /** Row-major index of an in-bounds coordinate. */
  indexOf(c: Coord): number {
    return c.y * this.width + c.x;
  }

  coordAt(index: number): Coord {
    return { x: index % this.width, y: Math.floor(index / this.width) };
  }

  get cellCount(): number {
    return this.cells.length;
  }

  /** Present cells around `c`, in compass order. */
  neighbors(c: Coord): Coord[] {
    const out: Coord[] = [];
    for (const d of DIRECTIONS) {
      const next = step(c, d);
      if (this.isPresent(next)) out.push(next);
    }
    return out;
  }

  isAdjacent(a: Coord, b: Coord): boolean {
    return this.isPresent(a) && this.isPresent(b) && directionBetween(a, b) !== null;
  }

  /** Every present cell in row-major order. */
  presentCells(): Coord[] {
    const out: Coord[] = [];
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        if (this.cells[y * this.width + x] !== null) out.push({ x, y });
      }
    }
    return out;
  }

  rows(): Cell[][] {
    const out: Cell[][] = [];
    for (let y = 0; y < this.height; y++) {
      out.push(this.cells.slice(y * this.width, (y + 1) * this.width));
    }
    return out;
  }
}

/**
 * parseGrid builds a grid from authoring text.
 *
 * @throws MalformedGridError when the text has no rows, a blank row between
 *         rows, an unsupported character, more than 64 rows or columns, or
 *         no letters at all.
 */
export function parseGrid(text: string, alphabet: Alphabet): Grid {
  const lines = text.split(/\r?\n/);
  const rows: { line: number; cells: Cell[] }[] = [];
  let pendingBlank: number | null = null;

  lines.forEach((raw, i) => {
    const lineNo = i + 1;
    const cells: Cell[] = [];
    let column = 0;

    for (const ch of raw) {
      column++;
      if (/\s/u.test(ch)) continue;
      if (ch === GAP) {
        cells.push(null);
      } else if (alphabet.has(ch)) {
        cells.push(ch);
      } else {
        throw new MalformedGridError(
          `unsupported character "${ch}" for the ${alphabet.id} alphabet`,
          lineNo,
          column,
        );
      }
    }

    if (cells.length === 0) {
      if (rows.length > 0 && pendingBlank === null) pendingBlank = lineNo;
      return;
    }
    if (pendingBlank !== null) {
      throw new MalformedGridError('blank row inside the grid', pendingBlank);
    }
    rows.push({ line: lineNo, cells });
  });

  if (rows.length === 0) throw new MalformedGridError('empty grid');
  if (rows.length > MAX_GRID_SIZE) {
    throw new MalformedGridError(
      `grid has ${rows.length} rows, at most ${MAX_GRID_SIZE} are supported`,
    );
  }

  const width = Math.max(...rows.map((r) => r.cells.length));
  const wide = rows.find((r) => r.cells.length > MAX_GRID_SIZE);
  if (wide) {
    throw new MalformedGridError(
      `row has ${wide.cells.length} cells, at most ${MAX_GRID_SIZE} are supported`,
      wide.line,
    );
  }

  const cells: Cell[] = [];
  for (const r of rows) {
    cells.push(...r.cells);
    for (let x = r.cells.length; x < width; x++) cells.push(null);
  }

  if (cells.every((c) => c === null)) {
    throw new MalformedGridError('grid has no letters');
  }

  return new Grid(alphabet, width, rows.length, cells);
}

/**
 * formatGrid renders a grid back to authoring text: letters separated by
 * spaces, odd rows indented by one space, gaps written out as `.` so the
 * width survives a round trip through parseGrid.
 */
export function formatGrid(grid: Grid): string {
  return grid
    .rows()
    .map((row, y) => (y & 1 ? ' ' : '') + row.map((c) => c ?? GAP).join(' '))
    .join('\n');
}
