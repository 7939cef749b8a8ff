// packages/game-core/src/report.ts
//
// Human-readable compilation report, for reviewing a puzzle while authoring
// it. Under every row of letters sits a row of "starts visits" pairs: how
// many scoring words begin at, and pass through, each cell. Then comes the
// word list with classifications and a totals line.

import { cellCounts } from './hints.js';
import type { Puzzle } from './puzzle.js';
import { DEFAULT_SCORING, summarizeScore, type ScoringTable } from './scoring.js';

const CELL_WIDTH = 6;
const HALF_CELL = ' '.repeat(CELL_WIDTH / 2);

export function renderReport(puzzle: Puzzle, table: ScoringTable = DEFAULT_SCORING): string {
  const { grid } = puzzle;
  const counts = cellCounts(puzzle, new Set());
  const lines: string[] = [];

  grid.rows().forEach((row, y) => {
    const indent = y & 1 ? HALF_CELL : '';
    const letters = row.map((c) => `  ${c ?? '.'}   `).join('');
    const numbers = row
      .map((c, x) => {
        if (c === null) return ' '.repeat(CELL_WIDTH);
        const { starts, visits } = counts[y * grid.width + x];
        return `${String(starts).padStart(2)} ${String(visits).padEnd(3)}`;
      })
      .join('');
    lines.push((indent + letters).trimEnd(), (indent + numbers).trimEnd());
  });

  lines.push('');
  for (const w of puzzle.words) {
    lines.push(w.classification === 'normal' ? w.word : `${w.word} (${w.classification})`);
  }

  const s = summarizeScore(puzzle, [], table);
  const excluded = puzzle.words.length - s.normalTotal - s.bonusTotal;
  lines.push('');
  lines.push(
    `${s.normalTotal} words, ${s.bonusTotal} bonus, ${excluded} excluded, ${s.maxScore} points`,
  );

  return lines.join('\n');
}
