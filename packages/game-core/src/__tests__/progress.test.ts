// packages/game-core/src/__tests__/progress.test.ts
//
// Saving a session and replaying it into a fresh one.

import {
  MalformedSaveStateError,
  decodePuzzle,
  beginTrace,
  createGameState,
  endTrace,
  extendTrace,
  restoreProgress,
  saveProgress,
  setHintLevel,
  startPuzzle,
  type Coord,
  type GameState,
} from '../index.js';
import { buildStartPuzzle, row } from './fixtures.js';

function started(): GameState {
  const state = createGameState();
  startPuzzle(state, buildStartPuzzle());
  return state;
}

function trace(state: GameState, cells: Coord[]): void {
  const [first, ...rest] = cells;
  beginTrace(state, first);
  for (const c of rest) extendTrace(state, c);
  endTrace(state);
}

describe('saveProgress', () => {
  it('writes a fresh session', () => {
    expect(saveProgress(started())).toBe('1.0.0.0.');
  });

  it('writes misses, hint use and found words in discovery order', () => {
    const state = started();
    trace(state, row(0, 3));
    trace(state, row(4, 1));
    trace(state, row(1, 4));
    setHintLevel(state, 1);
    expect(saveProgress(state)).toBe('1.1.1.1.1-3');
  });
});

describe('restoreProgress', () => {
  it('replays a saved session', () => {
    const state = started();
    restoreProgress(state, '1.1.1.1.1-3');
    expect(state).toMatchObject({
      phase: 'playing',
      found: [1, 3],
      misses: 1,
      hintLevel: 1,
      hintsUsed: true,
    });
    expect(saveProgress(state)).toBe('1.1.1.1.1-3');
  });

  it('reads base-36 misses and finishes a completed session', () => {
    const state = started();
    restoreProgress(state, '1.z.0.0.2-1');
    expect(state.misses).toBe(35);
    expect(state.phase).toBe('finished');
  });

  it('keeps the saved hint level without counting it as hints used', () => {
    const state = started();
    restoreProgress(state, '1.0.0.2.');
    expect(state).toMatchObject({ hintLevel: 2, hintsUsed: false });
  });

  it('unlocks the hint level the restored words reach', () => {
    const state = started();
    restoreProgress(state, '1.0.0.0.1');
    expect(state.hintLevel).toBe(1);
  });

  it('resumes a puzzle that has only bonus words', () => {
    const bonusOnly = () => {
      const state = createGameState();
      startPuzzle(state, decodePuzzle('1.l.5.START.bABVn'));
      return state;
    };
    const first = bonusOnly();
    expect(first.phase).toBe('finished');
    expect(saveProgress(first)).toBe('1.0.0.0.');

    const resumed = bonusOnly();
    restoreProgress(resumed, '1.0.0.0.');
    expect(resumed.phase).toBe('finished');

    const withBonus = bonusOnly();
    restoreProgress(withBonus, '1.2.0.0.0');
    expect(withBonus).toMatchObject({ found: [0], misses: 2, phase: 'finished' });
  });

  it.each([
    ['1.0.0', 'expected 5 sections, found 3'],
    ['2.0.0.0.', 'unsupported version "2"'],
    ['1.-1.0.0.', 'invalid misses "-1"'],
    [`1.${'z'.repeat(300)}.0.0.`, `invalid misses "${'z'.repeat(300)}"`],
    ['1.0.0.0.zzzzzzzzzzzz', 'invalid found word "zzzzzzzzzzzz"'],
    ['1.0.2.0.', 'invalid hints used "2"'],
    ['1.0.0.3.', 'invalid hint level "3"'],
    ['1.0.0.0.9', 'word 9 does not exist'],
    ['1.0.0.0.0', 'word 0 is excluded and cannot be found'],
    ['1.0.0.0.1-1', 'word 1 is listed twice'],
  ])('rejects %s', (text, message) => {
    const state = started();
    expect(() => restoreProgress(state, text)).toThrow(new MalformedSaveStateError(message));
    expect(state.found).toEqual([]);
    expect(state.misses).toBe(0);
  });

  it('only restores into a freshly started session', () => {
    const state = started();
    trace(state, row(0, 3));
    expect(() => restoreProgress(state, '1.0.0.0.2')).toThrow(MalformedSaveStateError);
    expect(() => restoreProgress(createGameState(), '1.0.0.0.')).toThrow(MalformedSaveStateError);
  });
});
