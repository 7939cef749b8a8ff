// apps/server/src/app.ts
//
// HTTP API over the puzzle runtime.
//
//   GET    /api/puzzles                 catalog summary
//   POST   /api/sessions                open a session (optionally resuming progress)
//   GET    /api/sessions/:id            current snapshot
//   POST   /api/sessions/:id/trace      begin / extend / end a trace
//   POST   /api/sessions/:id/hints      change hint level or style
//   GET    /api/sessions/:id/progress   saved progress string
//   DELETE /api/sessions/:id            close a session
//
// Request bodies are validated with the shared protocol schemas (400 with
// the zod error on failure); responses are parsed through them as well.
// Each request runs synchronously, so actions on one session never overlap.

import express, { type ErrorRequestHandler, type Response } from 'express';
import cors from 'cors';
import type { Logger } from 'pino';

import {
  MalformedSaveStateError,
  beginTrace,
  createGameState,
  endTrace,
  extendTrace,
  findPuzzle,
  normalWords,
  restoreProgress,
  saveProgress,
  setHintLevel,
  setHintStyle,
  snapshot,
  startPuzzle,
  takeNotice,
  type Catalog,
  type HintThresholds,
  type ScoringTable,
} from '@hexword/game-core';
import {
  hintReq,
  newSessionReq,
  newSessionRes,
  progressRes,
  puzzleListRes,
  snapshotSchema,
  traceReq,
  traceRes,
} from '@hexword/protocol';

import { SessionStore, type Session } from './sessions.js';

export interface AppOptions {
  catalog: Catalog;
  scoring: ScoringTable;
  log: Logger;
  /** Defaults to the core's table. */
  hintThresholds?: HintThresholds;
  sessions?: SessionStore;
}

export function createApp({ catalog, scoring, log, hintThresholds, sessions = new SessionStore() }: AppOptions) {
  const app = express();
  app.use(cors());
  app.use(express.json());

  /** Looks a session up, answering 404 itself when there is none. */
  function sessionOr404(id: string, res: Response): Session | undefined {
    const session = sessions.get(id);
    if (!session) res.status(404).json({ error: 'Session not found' });
    return session;
  }

  /* ------------------------------------------------------------------------ */
  /*                                  Routes                                  */
  /* ------------------------------------------------------------------------ */

  app.get('/api/puzzles', (_req, res) => {
    res.json(
      puzzleListRes.parse(
        catalog.entries.map(({ id, puzzle }) => ({
          id,
          width: puzzle.grid.width,
          height: puzzle.grid.height,
          words: normalWords(puzzle).length,
        })),
      ),
    );
  });

  app.post('/api/sessions', (req, res) => {
    const parsed = newSessionReq.safeParse(req.body);
    if (!parsed.success) return res.status(400).json(parsed.error.format());
    const { puzzle: puzzleId, hintStyle, progress } = parsed.data;

    const puzzle = findPuzzle(catalog, puzzleId);
    if (!puzzle) return res.status(404).json({ error: 'Puzzle not found' });

    const state = createGameState({ scoring, hintStyle, hintThresholds });
    startPuzzle(state, puzzle);

    if (progress !== undefined) {
      try {
        restoreProgress(state, progress);
      } catch (err) {
        if (!(err instanceof MalformedSaveStateError)) throw err;
        return res.status(400).json({ error: err.message });
      }
    }

    const { session, evicted } = sessions.create(puzzleId, state);
    if (evicted) {
      log.info({ sessionId: evicted.id, puzzle: evicted.puzzleId, limit: sessions.limit }, 'session evicted');
    }
    log.info(
      { sessionId: session.id, puzzle: puzzleId, resumed: progress !== undefined, open: sessions.size },
      'session opened',
    );
    res.json(newSessionRes.parse({ sessionId: session.id, snapshot: snapshot(state) }));
  });

  app.get('/api/sessions/:id', (req, res) => {
    const session = sessionOr404(req.params.id, res);
    if (!session) return;
    res.json(snapshotSchema.parse(snapshot(session.state)));
  });

  app.post('/api/sessions/:id/trace', (req, res) => {
    const session = sessionOr404(req.params.id, res);
    if (!session) return;
    const parsed = traceReq.safeParse(req.body);
    if (!parsed.success) return res.status(400).json(parsed.error.format());

    const { state } = session;
    const event = parsed.data;
    const accepted =
      event.action === 'begin'
        ? beginTrace(state, event.cell)
        : event.action === 'extend'
          ? extendTrace(state, event.cell)
          : endTrace(state) !== null;

    const outcome = takeNotice(state);
    if (outcome) log.debug({ sessionId: session.id, outcome }, 'trace committed');
    res.json(traceRes.parse({ accepted, outcome, snapshot: snapshot(state) }));
  });

  app.post('/api/sessions/:id/hints', (req, res) => {
    const session = sessionOr404(req.params.id, res);
    if (!session) return;
    const parsed = hintReq.safeParse(req.body);
    if (!parsed.success) return res.status(400).json(parsed.error.format());

    const { level, style } = parsed.data;
    if (style !== undefined) setHintStyle(session.state, style);
    if (level !== undefined) setHintLevel(session.state, level);
    res.json(snapshotSchema.parse(snapshot(session.state)));
  });

  app.get('/api/sessions/:id/progress', (req, res) => {
    const session = sessionOr404(req.params.id, res);
    if (!session) return;
    res.json(progressRes.parse({ progress: saveProgress(session.state) }));
  });

  app.delete('/api/sessions/:id', (req, res) => {
    const session = sessionOr404(req.params.id, res);
    if (!session) return;
    sessions.delete(session.id);
    log.info({ sessionId: session.id, puzzle: session.puzzleId, open: sessions.size }, 'session closed');
    res.status(204).end();
  });

  /* ------------------------------------------------------------------------ */
  /*                                  Errors                                  */
  /* ------------------------------------------------------------------------ */

  const onError: ErrorRequestHandler = (err, req, res, _next) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }
    log.error({ err, method: req.method, url: req.originalUrl }, 'request failed');
    res.status(500).json({ error: 'Internal error' });
  };
  app.use(onError);

  return app;
}
