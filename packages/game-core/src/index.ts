// packages/game-core/src/index.ts
//
// Entry point for the game-core package.
// Re-exports all core logic so consumers can import from one place.
//
// Includes:
//   • alphabet.ts   → letter sets and their ordering (SHAVIAN, LATIN)
//   • grid.ts       → hex grid model, authoring parser
//   • dictionary.ts → prefix-tree word list
//   • wordFinder.ts → exhaustive word search
//   • compiler.ts   → grid + dictionary + curated lists → Puzzle
//   • codec.ts      → puzzle code (savePuzzle / decodePuzzle / loadPuzzle)
//   • catalog.ts    → one-code-per-line puzzle catalogs
//   • scoring.ts    → point table and score summaries
//   • hints.ts      → cell counts, alphabetical insertion, partial reveal
//   • game.ts       → gameplay state machine and snapshots
//   • progress.ts   → save / resume a session
//   • report.ts     → authoring report
//
// Example usage:
//   import { loadPuzzle, createGameState, startPuzzle } from '@hexword/game-core';

export * from './alphabet.js';
export * from './directions.js';
export * from './errors.js';
export * from './grid.js';
export * from './dictionary.js';
export * from './puzzle.js';
export * from './wordFinder.js';
export * from './compiler.js';
export * from './codec.js';
export * from './catalog.js';
export * from './scoring.js';
export * from './hints.js';
export * from './game.js';
export * from './progress.js';
export * from './report.js';
