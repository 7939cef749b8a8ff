// packages/game-core/src/progress.ts
//
// Save and resume one puzzle session.
//
// Format (version 1), sections separated by ".":
//
//   1.<misses>.<hints used>.<hint level>.<found>
//
//   misses      base-36 count of rejected traces
//   hints used  "1" if the player ever raised the hint level, else "0"
//   hint level  0–2
//   found       base-36 word indices in discovery order, joined by "-"
//               (empty when nothing has been found)
//
// The string only makes sense together with the puzzle it was saved from;
// indices are checked against that puzzle when restoring.

import { MalformedSaveStateError } from './errors.js';
import { updatePhase, type GameState } from './game.js';
import { isHintLevel } from './hints.js';

export const PROGRESS_VERSION = '1';

export function saveProgress(state: GameState): string {
  return [
    PROGRESS_VERSION,
    state.misses.toString(36),
    state.hintsUsed ? '1' : '0',
    String(state.hintLevel),
    state.found.map((i) => i.toString(36)).join('-'),
  ].join('.');
}

function parseBase36(text: string, what: string): number {
  const value = /^[0-9a-z]+$/.test(text) ? parseInt(text, 36) : NaN;
  if (!Number.isSafeInteger(value)) throw new MalformedSaveStateError(`invalid ${what} "${text}"`);
  return value;
}

/**
 * restoreProgress replays a saved session into a freshly started game, one
 * with nothing found yet (a puzzle without normal words is already
 * finished at that point). Nothing is changed unless the whole string is
 * valid.
 *
 * @throws MalformedSaveStateError on a malformed string, a word index the
 *         puzzle does not have, a repeated or an excluded word, or a session
 *         that is not freshly started
 */
export function restoreProgress(state: GameState, text: string): void {
  const puzzle = state.puzzle;
  if (state.phase === 'selecting' || !puzzle || state.found.length > 0) {
    throw new MalformedSaveStateError('progress can only be restored into a freshly started puzzle');
  }

  const parts = text.trim().split('.');
  if (parts.length !== 5) throw new MalformedSaveStateError(`expected 5 sections, found ${parts.length}`);
  const [version, missesText, hintsUsedText, levelText, foundText] = parts;

  if (version !== PROGRESS_VERSION) throw new MalformedSaveStateError(`unsupported version "${version}"`);

  const misses = parseBase36(missesText, 'misses');

  if (hintsUsedText !== '0' && hintsUsedText !== '1') {
    throw new MalformedSaveStateError(`invalid hints used "${hintsUsedText}"`);
  }

  const level = Number(levelText);
  if (!/^[0-9]$/.test(levelText) || !isHintLevel(level)) {
    throw new MalformedSaveStateError(`invalid hint level "${levelText}"`);
  }

  const found: number[] = [];
  for (const part of foundText === '' ? [] : foundText.split('-')) {
    const index = parseBase36(part, 'found word');
    const word = puzzle.words[index];
    if (!word) throw new MalformedSaveStateError(`word ${index} does not exist`);
    if (word.classification === 'excluded') {
      throw new MalformedSaveStateError(`word ${index} is excluded and cannot be found`);
    }
    if (found.includes(index)) throw new MalformedSaveStateError(`word ${index} is listed twice`);
    found.push(index);
  }

  state.misses = misses;
  state.hintsUsed = hintsUsedText === '1';
  state.hintLevel = level;
  state.found = found;
  updatePhase(state);
}
