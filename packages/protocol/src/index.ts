// packages/protocol/src/index.ts
//
// Shared protocol definitions for the puzzle server and its clients.
// Uses Zod schemas for runtime validation + TypeScript types for compile-time safety.
//
// Defines:
//   - Coordinates, classifications, hint levels and styles.
//   - Request/response shapes for listing puzzles, opening a session,
//     tracing, hints and progress.
//   - The session snapshot the display layer renders.
//   - The scoring table accepted as configuration.
//
// The server validates every request body with these and parses its own
// responses through them before sending, so both ends agree on the shapes.

import { z } from 'zod';

export const coordSchema = z.object({
  x: z.number().int().min(0),
  y: z.number().int().min(0),
});
export type CoordDto = z.infer<typeof coordSchema>;

/**
 * Classification schema:
 *  - "normal"   → scores and counts toward completion
 *  - "bonus"    → tallied separately
 *  - "excluded" → never scored
 */
export const classificationSchema = z.enum(['normal', 'bonus', 'excluded']);

export const hintLevelSchema = z.union([z.literal(0), z.literal(1), z.literal(2)]);
export const hintStyleSchema = z.enum(['alphabetical', 'partial']);
export const phaseSchema = z.enum(['selecting', 'playing', 'finished']);

/* -------------------------------------------------------------------------- */
/*                               Scoring table                                */
/* -------------------------------------------------------------------------- */

/**
 * Points per word length, starting at four letters. Values must be positive
 * and never drop as words get longer.
 */
export const scoringTableSchema = z
  .object({
    points: z.array(z.number().int().positive()).nonempty(),
    extraLetterPoints: z.number().int().min(0),
  })
  .refine((t) => t.points.every((p, i) => i === 0 || p >= t.points[i - 1]), {
    message: 'points must not decrease with word length',
    path: ['points'],
  });
export type ScoringTableDto = z.infer<typeof scoringTableSchema>;

/**
 * Found-letter fractions that unlock hint levels 1 and 2. An empty list
 * leaves the level entirely to the player.
 */
export const hintThresholdsSchema = z
  .array(z.number().gt(0).max(1))
  .max(2)
  .refine((t) => t.every((v, i) => i === 0 || v >= t[i - 1]), {
    message: 'thresholds must not decrease',
  });

/* -------------------------------------------------------------------------- */
/*                              /puzzles endpoint                             */
/* -------------------------------------------------------------------------- */

export const puzzleSummary = z.object({
  id: z.number().int().min(1),
  width: z.number().int().min(1),
  height: z.number().int().min(1),
  /** Normal words only. */
  words: z.number().int().min(0),
});
export const puzzleListRes = z.array(puzzleSummary);

/* -------------------------------------------------------------------------- */
/*                                  Snapshot                                  */
/* -------------------------------------------------------------------------- */

export const cellCountsSchema = z.object({
  starts: z.number().int().min(0),
  visits: z.number().int().min(0),
});

export const wordViewSchema = z.discriminatedUnion('status', [
  z.object({
    status: z.literal('found'),
    word: z.string(),
    classification: z.enum(['normal', 'bonus']),
    points: z.number().int().min(0),
  }),
  z.object({
    status: z.literal('hidden'),
    length: z.number().int().min(1),
    letters: z.array(z.string().nullable()),
  }),
]);

export const snapshotSchema = z.object({
  phase: phaseSchema,
  grid: z
    .object({
      width: z.number().int(),
      height: z.number().int(),
      rows: z.array(z.array(z.string().nullable())),
    })
    .nullable(),
  trace: z.array(coordSchema),
  traceWord: z.string(),
  score: z.number().int(),
  maxScore: z.number().int(),
  normalFound: z.number().int(),
  normalTotal: z.number().int(),
  bonusFound: z.number().int(),
  bonusTotal: z.number().int(),
  /** Letters of found normal words, out of all normal-word letters. */
  lettersFound: z.number().int(),
  lettersTotal: z.number().int(),
  hintLevel: hintLevelSchema,
  hintStyle: hintStyleSchema,
  hintsUsed: z.boolean(),
  misses: z.number().int(),
  counts: z.array(z.array(cellCountsSchema)).nullable(),
  words: z.array(wordViewSchema),
});
export type SnapshotDto = z.infer<typeof snapshotSchema>;

/* -------------------------------------------------------------------------- */
/*                             /sessions endpoints                            */
/* -------------------------------------------------------------------------- */

/**
 * Request to open a session.
 *  - puzzle:    catalog id (its line number)
 *  - hintStyle: optional, defaults to "partial"
 *  - progress:  optional saved progress to resume from
 */
export const newSessionReq = z.object({
  puzzle: z.number().int().min(1),
  hintStyle: hintStyleSchema.default('partial'),
  progress: z.string().optional(),
});

export const newSessionRes = z.object({
  sessionId: z.string(),
  snapshot: snapshotSchema,
});

/** One pointer event of a trace; "end" commits it. */
export const traceReq = z.discriminatedUnion('action', [
  z.object({ action: z.literal('begin'), cell: coordSchema }),
  z.object({ action: z.literal('extend'), cell: coordSchema }),
  z.object({ action: z.literal('end') }),
]);
export type TraceReq = z.infer<typeof traceReq>;

export const outcomeSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('found'), word: z.string(), points: z.number().int() }),
  z.object({ kind: z.literal('bonus'), word: z.string() }),
  z.object({
    kind: z.literal('already-found'),
    word: z.string(),
    classification: classificationSchema,
  }),
  z.object({ kind: z.literal('excluded'), word: z.string() }),
  z.object({ kind: z.literal('too-short'), word: z.string() }),
  z.object({ kind: z.literal('not-a-word'), word: z.string() }),
]);

/**
 * Response to a trace event:
 *  - accepted: false when the rules rejected the event
 *  - outcome:  set only when an "end" committed a trace
 */
export const traceRes = z.object({
  accepted: z.boolean(),
  outcome: outcomeSchema.nullable(),
  snapshot: snapshotSchema,
});

export const hintReq = z.object({
  level: hintLevelSchema.optional(),
  style: hintStyleSchema.optional(),
});

export const progressRes = z.object({
  progress: z.string(),
});
