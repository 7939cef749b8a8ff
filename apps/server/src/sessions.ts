// apps/server/src/sessions.ts
//
// In-memory session store. Every session owns its GameState; puzzles are
// shared from the catalog. Restarting the server loses all sessions, which
// clients recover from with a saved progress string.
//
// The store holds at most `limit` sessions; opening one more drops the
// session that was used least recently.

import { nanoid } from 'nanoid';
import type { GameState } from '@hexword/game-core';

export interface Session {
  readonly id: string;
  readonly puzzleId: number;
  readonly state: GameState;
}

export class SessionStore {
  // Map order doubles as recency: oldest first.
  private readonly sessions = new Map<string, Session>();

  constructor(readonly limit = 10_000) {
    if (!Number.isSafeInteger(limit) || limit < 1) {
      throw new RangeError(`session limit must be a positive integer, got ${limit}`);
    }
  }

  /** Returns the new session and the one evicted to make room, if any. */
  create(puzzleId: number, state: GameState): { session: Session; evicted?: Session } {
    let evicted: Session | undefined;
    if (this.sessions.size >= this.limit) {
      const oldest = this.sessions.values().next();
      if (!oldest.done) {
        evicted = oldest.value;
        this.sessions.delete(evicted.id);
      }
    }

    const session: Session = { id: nanoid(), puzzleId, state };
    this.sessions.set(session.id, session);
    return { session, evicted };
  }

  get(id: string): Session | undefined {
    const session = this.sessions.get(id);
    if (session) {
      this.sessions.delete(id);
      this.sessions.set(id, session);
    }
    return session;
  }

  delete(id: string): boolean {
    return this.sessions.delete(id);
  }

  get size(): number {
    return this.sessions.size;
  }
}
