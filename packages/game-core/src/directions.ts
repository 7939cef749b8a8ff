// packages/game-core/src/directions.ts
//
// Hexagonal neighbourhood of a cell.
//
// The grid is drawn as if every odd row were shifted right by half a cell:
//
//   a b c d
//    e f g h
//   i j k l
//
// so the cells above and below an even row are (x-1, x) while those of an
// odd row are (x, x+1). Rather than scattering that arithmetic around, the
// six offsets live in one table keyed by row parity.
//
// Directions are numbered in a fixed compass order. The order matters: the
// word finder visits neighbours in it (for reproducible output) and puzzle
// codes store paths as sequences of these numbers.

export interface Coord {
  readonly x: number;
  readonly y: number;
}

export type Direction = 0 | 1 | 2 | 3 | 4 | 5;

export const DIRECTIONS: readonly Direction[] = [0, 1, 2, 3, 4, 5];

export const DIRECTION_NAMES: Readonly<Record<Direction, string>> = {
  0: 'north-west',
  1: 'north-east',
  2: 'west',
  3: 'east',
  4: 'south-west',
  5: 'south-east',
};

type Offset = readonly [dx: number, dy: number];

const OFFSETS: Readonly<Record<'even' | 'odd', readonly Offset[]>> = {
  even: [[-1, -1], [0, -1], [-1, 0], [1, 0], [-1, 1], [0, 1]],
  odd: [[0, -1], [1, -1], [-1, 0], [1, 0], [0, 1], [1, 1]],
};

function offsetsFor(y: number): readonly Offset[] {
  return (y & 1) === 0 ? OFFSETS.even : OFFSETS.odd;
}

/** Coordinate one step away. May fall outside the grid. */
export function step(from: Coord, direction: Direction): Coord {
  const [dx, dy] = offsetsFor(from.y)[direction];
  return { x: from.x + dx, y: from.y + dy };
}

/** Direction leading back to where `direction` came from. */
export function reverseDirection(direction: Direction): Direction {
  return DIRECTIONS[5 - direction];
}

/** Direction from `from` to an adjacent `to`, or null if they are not neighbours. */
export function directionBetween(from: Coord, to: Coord): Direction | null {
  const offsets = offsetsFor(from.y);
  for (const d of DIRECTIONS) {
    const [dx, dy] = offsets[d];
    if (from.x + dx === to.x && from.y + dy === to.y) return d;
  }
  return null;
}

export function isDirection(value: number): value is Direction {
  return Number.isInteger(value) && value >= 0 && value < DIRECTIONS.length;
}

export function sameCoord(a: Coord, b: Coord): boolean {
  return a.x === b.x && a.y === b.y;
}
