// apps/server/src/__tests__/sessions.test.ts
//
// Session store capacity: the least recently used session goes first.

import { createGameState } from '@hexword/game-core';

import { SessionStore } from '../sessions.js';

describe('SessionStore', () => {
  it('evicts the oldest session once the limit is reached', () => {
    const store = new SessionStore(2);
    const a = store.create(1, createGameState()).session;
    const b = store.create(1, createGameState()).session;
    const { session: c, evicted } = store.create(2, createGameState());

    expect(evicted).toBe(a);
    expect(store.size).toBe(2);
    expect(store.get(a.id)).toBeUndefined();
    expect(store.get(b.id)).toBe(b);
    expect(store.get(c.id)).toBe(c);
  });

  it('counts a lookup as use', () => {
    const store = new SessionStore(2);
    const a = store.create(1, createGameState()).session;
    const b = store.create(1, createGameState()).session;
    store.get(a.id);

    expect(store.create(1, createGameState()).evicted).toBe(b);
    expect(store.get(a.id)).toBe(a);
  });

  it('evicts nothing below the limit', () => {
    const store = new SessionStore();
    expect(store.create(1, createGameState()).evicted).toBeUndefined();
    expect(store.limit).toBe(10_000);
  });

  it('rejects a limit below one', () => {
    expect(() => new SessionStore(0)).toThrow(RangeError);
  });
});
