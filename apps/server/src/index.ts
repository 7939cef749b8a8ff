// apps/server/src/index.ts
//
// Boots the puzzle server: configuration from the environment, the puzzle
// catalog from PUZZLES_FILE, then the HTTP API.
//
// Catalog lines that fail to decode are logged and skipped; the remaining
// puzzles are still served under their own line numbers.

import 'dotenv/config';
import fs from 'node:fs';
import { pino } from 'pino';
import { parseCatalog } from '@hexword/game-core';

import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { SessionStore } from './sessions.js';

const config = loadConfig();
const log = pino({ level: config.logLevel });

const catalog = parseCatalog(fs.readFileSync(config.puzzlesFile, 'utf8'));
for (const failure of catalog.failures) {
  log.warn({ line: failure.line, reason: failure.error.message }, 'skipping malformed puzzle');
}
log.info({ file: config.puzzlesFile, puzzles: catalog.entries.length }, 'catalog loaded');

const app = createApp({
  catalog,
  scoring: config.scoring,
  hintThresholds: config.hintThresholds,
  sessions: new SessionStore(config.sessionLimit),
  log,
});
app.listen(config.port, () => log.info({ port: config.port }, 'server up'));
