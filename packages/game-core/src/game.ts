// packages/game-core/src/game.ts
//
// Gameplay state machine for one puzzle session.
//
//   selecting ──startPuzzle──▶ playing ──last normal word found──▶ finished
//
// A GameState is a plain value owned by whoever hosts the session; several
// can exist side by side over the same (immutable) Puzzle. Every operation
// is synchronous and mutates only the state passed in.
//
// Player actions that the rules do not allow (tracing before a puzzle is
// loaded, jumping to a non-adjacent cell, revisiting a cell, ...) are
// rejected by returning false / null and leave the state untouched.

import { letterCount } from './alphabet.js';
import { sameCoord, type Coord } from './directions.js';
import {
  DEFAULT_HINT_THRESHOLDS,
  DEFAULT_REVEAL,
  alphabeticalInsertion,
  assertHintThresholds,
  assertRevealPolicy,
  automaticHintLevel,
  cellCounts,
  maskedLetters,
  revealLetters,
  type CellCounts,
  type HintLevel,
  type HintStyle,
  type HintThresholds,
  type ListEntry,
  type RevealPolicy,
} from './hints.js';
import { MIN_WORD_LENGTH, type Classification, type Puzzle } from './puzzle.js';
import { DEFAULT_SCORING, pointsForLength, summarizeScore, type ScoringTable } from './scoring.js';

export type GamePhase = 'selecting' | 'playing' | 'finished';

/**
 * Outcome of committing a trace:
 *  - "found"         → a new normal word; `points` were added to the score
 *  - "bonus"         → a new bonus word
 *  - "already-found" → the word was found earlier; nothing changes
 *  - "excluded"      → a real word the puzzle deliberately leaves out
 *  - "too-short"     → fewer than MIN_WORD_LENGTH letters
 *  - "not-a-word"    → no word in the puzzle is spelled this way
 */
export type TraceOutcome =
  | { kind: 'found'; word: string; points: number }
  | { kind: 'bonus'; word: string }
  | { kind: 'already-found'; word: string; classification: Classification }
  | { kind: 'excluded'; word: string }
  | { kind: 'too-short'; word: string }
  | { kind: 'not-a-word'; word: string };

export interface GameOptions {
  scoring?: ScoringTable;
  reveal?: RevealPolicy;
  hintStyle?: HintStyle;
  /** Found-letter fractions that unlock hint levels; [] turns this off. */
  hintThresholds?: HintThresholds;
}

export interface GameState {
  phase: GamePhase;
  puzzle: Puzzle | null;
  /** Indices into puzzle.words, in the order they were found. */
  found: number[];
  trace: Coord[];
  hintLevel: HintLevel;
  hintStyle: HintStyle;
  /** Set the first time the hint level is raised above 0; never cleared. */
  hintsUsed: boolean;
  /** Highest level unlocked by progress so far. */
  unlockedHintLevel: HintLevel;
  misses: number;
  /** Outcome of the last endTrace until the display layer takes it. */
  notice: TraceOutcome | null;
  readonly scoring: ScoringTable;
  readonly reveal: RevealPolicy;
  readonly hintThresholds: HintThresholds;
  /** word text → index into puzzle.words, built when a puzzle starts. */
  wordIndex: Map<string, number>;
}

export function createGameState(options: GameOptions = {}): GameState {
  const reveal = options.reveal ?? DEFAULT_REVEAL;
  assertRevealPolicy(reveal);
  const hintThresholds = options.hintThresholds ?? DEFAULT_HINT_THRESHOLDS;
  assertHintThresholds(hintThresholds);

  return {
    phase: 'selecting',
    puzzle: null,
    found: [],
    trace: [],
    hintLevel: 0,
    hintStyle: options.hintStyle ?? 'partial',
    hintsUsed: false,
    unlockedHintLevel: 0,
    misses: 0,
    notice: null,
    scoring: options.scoring ?? DEFAULT_SCORING,
    reveal,
    hintThresholds,
    wordIndex: new Map(),
  };
}

/* -------------------------------------------------------------------------- */
/*                                  Lifecycle                                 */
/* -------------------------------------------------------------------------- */

/**
 * startPuzzle loads a puzzle into a session that has not started yet.
 * A puzzle without normal words is finished as soon as it starts.
 */
export function startPuzzle(state: GameState, puzzle: Puzzle): boolean {
  if (state.phase !== 'selecting') return false;

  state.puzzle = puzzle;
  state.wordIndex = new Map(puzzle.words.map((w, i) => [w.word, i]));
  state.phase = 'playing';
  updatePhase(state);
  return true;
}

/**
 * Brings derived state up to date with the found set: a playing session
 * moves to finished once every normal word is found, and the hint level is
 * raised when progress crosses a new threshold. Levels unlocked this way
 * never go back down, though the player may still lower the shown level.
 */
export function updatePhase(state: GameState): void {
  if (!state.puzzle) return;
  const { normalFound, normalTotal, lettersFound, lettersTotal } = summarizeScore(
    state.puzzle,
    state.found,
    state.scoring,
  );

  const unlocked = automaticHintLevel(lettersFound, lettersTotal, state.hintThresholds);
  if (unlocked > state.unlockedHintLevel) {
    state.unlockedHintLevel = unlocked;
    if (unlocked > state.hintLevel) state.hintLevel = unlocked;
  }

  if (state.phase === 'playing' && normalFound === normalTotal) {
    state.phase = 'finished';
    state.trace = [];
  }
}

/* -------------------------------------------------------------------------- */
/*                                   Tracing                                  */
/* -------------------------------------------------------------------------- */

export function beginTrace(state: GameState, cell: Coord): boolean {
  if (state.phase !== 'playing' || !state.puzzle) return false;
  if (state.trace.length > 0) return false;
  if (!state.puzzle.grid.isPresent(cell)) return false;

  state.trace = [{ x: cell.x, y: cell.y }];
  return true;
}

export function extendTrace(state: GameState, cell: Coord): boolean {
  if (state.phase !== 'playing' || !state.puzzle) return false;

  const last = state.trace[state.trace.length - 1];
  if (!last) return false;
  if (!state.puzzle.grid.isAdjacent(last, cell)) return false;
  if (state.trace.some((c) => sameCoord(c, cell))) return false;

  state.trace.push({ x: cell.x, y: cell.y });
  return true;
}

/** Letters along the trace in progress. */
export function traceWord(state: GameState): string {
  const grid = state.puzzle?.grid;
  if (!grid) return '';
  return state.trace.map((c) => grid.at(c) ?? '').join('');
}

function judge(state: GameState, puzzle: Puzzle, word: string): TraceOutcome {
  if (letterCount(word) < MIN_WORD_LENGTH) return { kind: 'too-short', word };

  const index = state.wordIndex.get(word);
  if (index === undefined) {
    state.misses++;
    return { kind: 'not-a-word', word };
  }

  const entry = puzzle.words[index];
  if (entry.classification === 'excluded') return { kind: 'excluded', word };
  if (state.found.includes(index)) {
    return { kind: 'already-found', word, classification: entry.classification };
  }

  state.found.push(index);
  if (entry.classification === 'bonus') return { kind: 'bonus', word };
  return { kind: 'found', word, points: pointsForLength(letterCount(word), state.scoring) };
}

/**
 * endTrace commits the trace in progress: the traced letters are looked up
 * in the puzzle's own word table. The trace is cleared whatever the outcome.
 *
 * @returns the outcome (also kept as the pending notice), or null when no
 *          trace was in progress
 */
export function endTrace(state: GameState): TraceOutcome | null {
  const puzzle = state.puzzle;
  if (state.phase !== 'playing' || !puzzle || state.trace.length === 0) return null;

  const outcome = judge(state, puzzle, traceWord(state));
  state.trace = [];
  state.notice = outcome;
  updatePhase(state);

  return outcome;
}

/** Returns the pending notice once, then clears it. */
export function takeNotice(state: GameState): TraceOutcome | null {
  const notice = state.notice;
  state.notice = null;
  return notice;
}

/* -------------------------------------------------------------------------- */
/*                                    Hints                                   */
/* -------------------------------------------------------------------------- */

/**
 * setHintLevel may move the level either way; found words always stay
 * fully visible, and once hints have been used that fact is remembered.
 */
export function setHintLevel(state: GameState, level: HintLevel): boolean {
  if (state.phase === 'selecting') return false;
  state.hintLevel = level;
  if (level > 0) state.hintsUsed = true;
  return true;
}

export function setHintStyle(state: GameState, style: HintStyle): void {
  state.hintStyle = style;
}

/* -------------------------------------------------------------------------- */
/*                                  Snapshots                                 */
/* -------------------------------------------------------------------------- */

export function score(state: GameState): number {
  return state.puzzle ? summarizeScore(state.puzzle, state.found, state.scoring).score : 0;
}

export type WordView =
  | { status: 'found'; word: string; classification: 'normal' | 'bonus'; points: number }
  | { status: 'hidden'; length: number; letters: (string | null)[] };

export interface GameSnapshot {
  phase: GamePhase;
  grid: { width: number; height: number; rows: (string | null)[][] } | null;
  trace: Coord[];
  traceWord: string;
  score: number;
  maxScore: number;
  normalFound: number;
  normalTotal: number;
  bonusFound: number;
  bonusTotal: number;
  lettersFound: number;
  lettersTotal: number;
  hintLevel: HintLevel;
  hintStyle: HintStyle;
  hintsUsed: boolean;
  misses: number;
  /** Per-cell hidden-word counts by row; only from hint level 1. */
  counts: CellCounts[][] | null;
  words: WordView[];
}

function foundView(state: GameState, puzzle: Puzzle, index: number): WordView {
  const w = puzzle.words[index];
  const points = w.classification === 'normal' ? pointsForLength(letterCount(w.word), state.scoring) : 0;
  return {
    status: 'found',
    word: w.word,
    classification: w.classification === 'bonus' ? 'bonus' : 'normal',
    points,
  };
}

function hiddenView(state: GameState, puzzle: Puzzle, index: number, partial: boolean): WordView {
  const { word } = puzzle.words[index];
  return {
    status: 'hidden',
    length: letterCount(word),
    letters: partial ? revealLetters(word, state.reveal) : maskedLetters(word),
  };
}

function wordList(state: GameState, puzzle: Puzzle): WordView[] {
  const hidden: number[] = [];
  puzzle.words.forEach((w, i) => {
    if (w.classification === 'normal' && !state.found.includes(i)) hidden.push(i);
  });

  if (state.hintLevel === 2 && state.hintStyle === 'alphabetical') {
    return alphabeticalInsertion(puzzle, state.found, hidden).map((e: ListEntry) =>
      e.kind === 'found' ? foundView(state, puzzle, e.index) : hiddenView(state, puzzle, e.index, false),
    );
  }

  const partial = state.hintLevel === 2 && state.hintStyle === 'partial';
  const byLength = [...hidden].sort(
    (a, b) => letterCount(puzzle.words[a].word) - letterCount(puzzle.words[b].word) || a - b,
  );

  return [
    ...state.found.map((i) => foundView(state, puzzle, i)),
    ...byLength.map((i) => hiddenView(state, puzzle, i, partial)),
  ];
}

/** Read-only view of the session for the display layer. */
export function snapshot(state: GameState): GameSnapshot {
  const puzzle = state.puzzle;
  const summary = puzzle ? summarizeScore(puzzle, state.found, state.scoring) : null;

  let counts: CellCounts[][] | null = null;
  if (puzzle && state.hintLevel >= 1) {
    const flat = cellCounts(puzzle, new Set(state.found));
    const { width, height } = puzzle.grid;
    counts = Array.from({ length: height }, (_, y) => flat.slice(y * width, (y + 1) * width));
  }

  return {
    phase: state.phase,
    grid: puzzle
      ? { width: puzzle.grid.width, height: puzzle.grid.height, rows: puzzle.grid.rows() }
      : null,
    trace: state.trace.map((c) => ({ x: c.x, y: c.y })),
    traceWord: traceWord(state),
    score: summary?.score ?? 0,
    maxScore: summary?.maxScore ?? 0,
    normalFound: summary?.normalFound ?? 0,
    normalTotal: summary?.normalTotal ?? 0,
    bonusFound: summary?.bonusFound ?? 0,
    bonusTotal: summary?.bonusTotal ?? 0,
    lettersFound: summary?.lettersFound ?? 0,
    lettersTotal: summary?.lettersTotal ?? 0,
    hintLevel: state.hintLevel,
    hintStyle: state.hintStyle,
    hintsUsed: state.hintsUsed,
    misses: state.misses,
    counts,
    words: puzzle ? wordList(state, puzzle) : [],
  };
}
