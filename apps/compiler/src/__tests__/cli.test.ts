// apps/compiler/src/__tests__/cli.test.ts
//
// The compiler command line against in-memory files. Log lines are
// captured from pino as JSON.

import { pino } from 'pino';

import { EXIT_INPUT, EXIT_OK, EXIT_USAGE, runCompiler, type CompilerIO } from '../cli.js';

interface LogLine {
  level: number;
  msg: string;
  [key: string]: unknown;
}

const WARN = 40;
const ERROR = 50;

function harness(files: Record<string, string>, stdin = '') {
  const out: string[] = [];
  const logs: LogLine[] = [];
  const io: CompilerIO = {
    readFile(path) {
      const text = files[path];
      if (text === undefined) throw new Error(`ENOENT: ${path}`);
      return text;
    },
    readStdin: () => stdin,
    write: (text) => {
      out.push(text);
    },
    log: pino({ level: 'debug' }, { write: (line: string) => logs.push(JSON.parse(line)) }),
  };
  return { io, out, logs };
}

const FILES = {
  'words.txt': '# latin test words\nstar\nstart\ntart\nrats\nart\n',
  'bonus.txt': 'tart\n',
  'excluded.txt': 'rats\nzzzz\n',
  'grid.txt': 's t a r t\n',
};

describe('runCompiler', () => {
  it('prints the puzzle code for a grid file', () => {
    const { io, out } = harness(FILES);
    const code = runCompiler(
      ['--dictionary', 'words.txt', '--bonus', 'bonus.txt', '--excluded', 'excluded.txt', '--alphabet', 'latin', 'grid.txt'],
      io,
    );
    expect(code).toBe(EXIT_OK);
    expect(out).toEqual(['1.l.5.START.xADOm,nAAVn,nAAVV,bABVn\n']);
  });

  it('reads the grid from stdin and prints the report with --text', () => {
    const { io, out } = harness(FILES, 'c a r t');
    const code = runCompiler(['--dictionary', 'words.txt', '--alphabet', 'latin', '--text'], io);
    expect(code).toBe(EXIT_OK);
    expect(out).toEqual(['  c     a     r     t\n 0 0   0 0   0 0   0 0\n\n\n0 words, 0 bonus, 0 excluded, 0 points\n']);
  });

  it('logs classification warnings without failing', () => {
    const { io, logs } = harness(FILES);
    runCompiler(['--dictionary', 'words.txt', '--excluded', 'excluded.txt', '--alphabet', 'latin', 'grid.txt'], io);
    const warnings = logs.filter((l) => l.level === WARN).map((l) => l.msg);
    expect(warnings).toEqual(['excluded word "zzzz" does not appear in the grid']);
  });

  it('applies the minimum length', () => {
    const { io, out } = harness(FILES);
    runCompiler(['--dictionary', 'words.txt', '--alphabet', 'latin', '--minimum-length', '5', 'grid.txt'], io);
    expect(out).toEqual(['1.l.5.START.nAAVV\n']);
  });

  it('exits 1 on a malformed grid and reports where', () => {
    const { io, out, logs } = harness({ ...FILES, 'grid.txt': 's t\n a 9' });
    const code = runCompiler(['--dictionary', 'words.txt', '--alphabet', 'latin', 'grid.txt'], io);
    expect(code).toBe(EXIT_INPUT);
    expect(out).toEqual([]);
    expect(logs.find((l) => l.level === ERROR)).toMatchObject({
      line: 2,
      column: 4,
      msg: 'line 2, column 4: unsupported character "9" for the latin alphabet',
    });
  });

  it('exits 1 when an input file cannot be read', () => {
    const { io } = harness(FILES);
    expect(runCompiler(['--dictionary', 'missing.txt', 'grid.txt'], io)).toBe(EXIT_INPUT);
  });

  it.each([
    [[]],
    [['--dictionary', 'words.txt', '--alphabet', 'greek']],
    [['--dictionary', 'words.txt', '--minimum-length', 'five']],
    [['--dictionary', 'words.txt', '--verbose']],
    [['--dictionary', 'words.txt', 'a.txt', 'b.txt']],
  ])('exits 2 on bad usage: %j', (argv) => {
    const { io } = harness(FILES);
    expect(runCompiler(argv, io)).toBe(EXIT_USAGE);
  });
});
