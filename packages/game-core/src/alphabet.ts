// packages/game-core/src/alphabet.ts
//
// Letter sets a puzzle can be written in.
//
// A grid cell holds exactly one letter of its alphabet, and every ordering
// the game shows (the compiled word list, the alphabetical hint view) uses
// the alphabet's own letter order rather than code-point order.
//
// Shavian letters live outside the Basic Multilingual Plane, so words are
// always split with Array.from() (by code point), never by UTF-16 index.

export type AlphabetId = 'shavian' | 'latin';

export class Alphabet {
  readonly letters: readonly string[];
  private readonly positions: ReadonlyMap<string, number>;

  /**
   * @param id   - stable name used in configuration and on the command line
   * @param tag  - single character identifying the alphabet inside a puzzle code
   */
  constructor(
    readonly id: AlphabetId,
    readonly tag: string,
    letters: readonly string[],
  ) {
    this.letters = letters;
    this.positions = new Map(letters.map((letter, i) => [letter, i]));
  }

  get size(): number {
    return this.letters.length;
  }

  has(letter: string): boolean {
    return this.positions.has(letter);
  }

  /** Position of a letter in the alphabet, or -1. */
  indexOf(letter: string): number {
    return this.positions.get(letter) ?? -1;
  }

  letterAt(index: number): string | undefined {
    return this.letters[index];
  }

  /**
   * Orders two words letter by letter using the alphabet's ordering.
   * A word sorts before any longer word it is a prefix of.
   */
  compareWords(a: string, b: string): number {
    const la = Array.from(a);
    const lb = Array.from(b);
    const n = Math.min(la.length, lb.length);

    for (let i = 0; i < n; i++) {
      const diff = this.indexOf(la[i]) - this.indexOf(lb[i]);
      if (diff !== 0) return diff;
    }

    return la.length - lb.length;
  }
}

function codePointRange(first: number, last: number): string[] {
  const out: string[] = [];
  for (let cp = first; cp <= last; cp++) out.push(String.fromCodePoint(cp));
  return out;
}

/** The 48 Shavian letters, U+10450 to U+1047F. */
export const SHAVIAN = new Alphabet(
  'shavian',
  's',
  codePointRange(0x10450, 0x1047f),
);

export const LATIN = new Alphabet('latin', 'l', Array.from('abcdefghijklmnopqrstuvwxyz'));

export const ALPHABETS: readonly Alphabet[] = [SHAVIAN, LATIN];

export function alphabetByTag(tag: string): Alphabet | undefined {
  return ALPHABETS.find((a) => a.tag === tag);
}

export function alphabetById(id: AlphabetId): Alphabet {
  return id === 'shavian' ? SHAVIAN : LATIN;
}

/** Number of letters (code points) in a word. */
export function letterCount(word: string): number {
  return Array.from(word).length;
}
