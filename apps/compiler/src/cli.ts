// apps/compiler/src/cli.ts
//
// Puzzle compiler command line.
//
//   hexword-build --dictionary words.txt [--bonus bonus.txt] [--excluded excluded.txt]
//                 [--alphabet shavian|latin] [--minimum-length N] [--text] [grid.txt]
//
// The grid is read from the positional file, or from stdin when none is
// given. The puzzle code (or with --text the authoring report) goes to
// stdout; everything else is logged, so the output can be appended straight
// to a catalog.
//
// Exit codes: 0 compiled, 1 malformed grid or unreadable input, 2 bad usage.

import { parseArgs } from 'node:util';
import type { Logger } from 'pino';

import {
  Dictionary,
  MalformedGridError,
  alphabetById,
  compilePuzzle,
  readWordList,
  renderReport,
  savePuzzle,
  type AlphabetId,
  type CompileResult,
  type CompileWarning,
} from '@hexword/game-core';

export const USAGE =
  'usage: hexword-build --dictionary FILE [--bonus FILE] [--excluded FILE] ' +
  '[--alphabet shavian|latin] [--minimum-length N] [--text] [GRID_FILE]';

export const EXIT_OK = 0;
export const EXIT_INPUT = 1;
export const EXIT_USAGE = 2;

/** Everything the compiler touches outside itself; tests pass in-memory versions. */
export interface CompilerIO {
  /** Throws when the file cannot be read. */
  readFile(path: string): string;
  readStdin(): string;
  write(text: string): void;
  log: Logger;
}

interface Options {
  dictionary: string;
  bonus?: string;
  excluded?: string;
  alphabet: AlphabetId;
  minimumLength?: number;
  text: boolean;
  grid?: string;
}

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function isAlphabetId(value: string): value is AlphabetId {
  return value === 'shavian' || value === 'latin';
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        dictionary: { type: 'string' },
        bonus: { type: 'string' },
        excluded: { type: 'string' },
        alphabet: { type: 'string', default: 'shavian' },
        'minimum-length': { type: 'string' },
        text: { type: 'boolean', default: false },
      },
    });
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

function parseOptions(argv: string[]): Options {
  const parsed = readArgs(argv);
  const { values, positionals } = parsed;
  if (!values.dictionary) throw new UsageError('--dictionary is required');
  if (positionals.length > 1) throw new UsageError('at most one grid file may be given');

  const alphabet = values.alphabet ?? 'shavian';
  if (!isAlphabetId(alphabet)) throw new UsageError(`unknown alphabet "${alphabet}"`);

  let minimumLength: number | undefined;
  const rawLength = values['minimum-length'];
  if (rawLength !== undefined) {
    if (!/^[0-9]+$/.test(rawLength)) throw new UsageError(`invalid minimum length "${rawLength}"`);
    minimumLength = Number(rawLength);
  }

  return {
    dictionary: values.dictionary,
    bonus: values.bonus,
    excluded: values.excluded,
    alphabet,
    minimumLength,
    text: values.text ?? false,
    grid: positionals[0],
  };
}

function describeWarning(w: CompileWarning): string {
  switch (w.kind) {
    case 'no-words':
      return 'the grid contains no words';
    case 'unknown-classification-word':
      return `${w.list} word "${w.word}" does not appear in the grid`;
    case 'conflicting-classification':
      return `"${w.word}" is listed as both bonus and excluded; treating it as excluded`;
  }
}

/** Reads one input file, logging and returning null when it cannot be read. */
function readInput(io: CompilerIO, path: string, what: string): string | null {
  try {
    return io.readFile(path);
  } catch (err) {
    io.log.error({ path, err }, `cannot read ${what}`);
    return null;
  }
}

/**
 * runCompiler compiles one grid as the command line describes.
 *
 * @returns the process exit code
 */
export function runCompiler(argv: string[], io: CompilerIO): number {
  let options: Options;
  try {
    options = parseOptions(argv);
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    io.log.error(err.message);
    io.log.info(USAGE);
    return EXIT_USAGE;
  }

  const dictionaryText = readInput(io, options.dictionary, 'dictionary');
  const bonusText = options.bonus === undefined ? '' : readInput(io, options.bonus, 'bonus list');
  const excludedText =
    options.excluded === undefined ? '' : readInput(io, options.excluded, 'excluded list');
  if (dictionaryText === null || bonusText === null || excludedText === null) return EXIT_INPUT;

  let gridText: string;
  if (options.grid === undefined) {
    gridText = io.readStdin();
  } else {
    const text = readInput(io, options.grid, 'grid');
    if (text === null) return EXIT_INPUT;
    gridText = text;
  }

  const dictionary = Dictionary.fromText(dictionaryText);
  io.log.debug({ words: dictionary.size }, 'dictionary loaded');

  let result: CompileResult;
  try {
    result = compilePuzzle(
      gridText,
      alphabetById(options.alphabet),
      dictionary,
      { bonus: readWordList(bonusText), excluded: readWordList(excludedText) },
      { minimumLength: options.minimumLength },
    );
  } catch (err) {
    if (!(err instanceof MalformedGridError)) throw err;
    io.log.error({ line: err.line, column: err.column }, err.message);
    return EXIT_INPUT;
  }

  for (const w of result.warnings) io.log.warn({ warning: w.kind }, describeWarning(w));

  const { puzzle } = result;
  io.log.info(
    {
      width: puzzle.grid.width,
      height: puzzle.grid.height,
      words: puzzle.words.filter((w) => w.classification === 'normal').length,
      bonus: puzzle.words.filter((w) => w.classification === 'bonus').length,
      excluded: puzzle.words.filter((w) => w.classification === 'excluded').length,
    },
    'puzzle compiled',
  );

  io.write(`${options.text ? renderReport(puzzle) : savePuzzle(puzzle)}\n`);
  return EXIT_OK;
}
