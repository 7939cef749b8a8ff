// packages/game-core/src/errors.ts
//
// Error types raised by the core. Each carries a stable `name` so callers
// that only see the error across a boundary (logs, HTTP responses) can still
// tell them apart.
//
//   • MalformedGridError      → authoring grid text breaks the shape or
//                                character rules; fatal to one compilation.
//   • MalformedCodeError      → a puzzle code does not decode to a valid
//                                puzzle; fatal to loading that one puzzle.
//   • MalformedSaveStateError → a saved progress string cannot be replayed.
//
// Rejected player actions are not errors: the state machine returns false.

export class MalformedGridError extends Error {
  /** 1-based line of the authoring text, when the problem has one. */
  readonly line: number | undefined;
  /** 1-based column (in code points) within that line. */
  readonly column: number | undefined;

  constructor(message: string, line?: number, column?: number) {
    super(
      line === undefined
        ? message
        : column === undefined
          ? `line ${line}: ${message}`
          : `line ${line}, column ${column}: ${message}`,
    );
    this.name = 'MalformedGridError';
    this.line = line;
    this.column = column;
  }
}

export class MalformedCodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedCodeError';
  }
}

export class MalformedSaveStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedSaveStateError';
  }
}
