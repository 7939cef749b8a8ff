// apps/compiler/src/index.ts
//
// Entry point of the puzzle compiler. Logs go to stderr so stdout carries
// only the puzzle code or report.

import 'dotenv/config';
import fs from 'node:fs';
import pino from 'pino';

import { runCompiler } from './cli.js';

const log = pino({ level: process.env.LOG_LEVEL ?? 'info' }, pino.destination(2));

process.exitCode = runCompiler(process.argv.slice(2), {
  readFile: (path) => fs.readFileSync(path, 'utf8'),
  readStdin: () => fs.readFileSync(0, 'utf8'),
  write: (text) => process.stdout.write(text),
  log,
});
