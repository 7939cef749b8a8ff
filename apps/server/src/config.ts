// apps/server/src/config.ts
//
// Server configuration, read from the environment (dotenv loads .env first).
//
//   PORT           listen port, default 3001
//   LOG_LEVEL      pino level, default "info"
//   PUZZLES_FILE   puzzle catalog, default data/puzzles.txt
//   SCORING_TABLE  optional JSON, e.g. {"points":[1,2,4],"extraLetterPoints":3}
//   HINT_THRESHOLDS optional JSON found-letter fractions, e.g. [0.25,0.5]
//   SESSION_LIMIT  open sessions kept before the least recently used goes, default 10000

import { z } from 'zod';
import {
  DEFAULT_HINT_THRESHOLDS,
  DEFAULT_SCORING,
  type HintThresholds,
  type ScoringTable,
} from '@hexword/game-core';
import { hintThresholdsSchema, scoringTableSchema } from '@hexword/protocol';

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  PUZZLES_FILE: z.string().min(1).default('data/puzzles.txt'),
  SCORING_TABLE: z.string().optional(),
  HINT_THRESHOLDS: z.string().optional(),
  SESSION_LIMIT: z.coerce.number().int().min(1).default(10_000),
});

export interface ServerConfig {
  port: number;
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  puzzlesFile: string;
  scoring: ScoringTable;
  hintThresholds: HintThresholds;
  sessionLimit: number;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || 'value'}: ${i.message}`).join('; ');
}

/** Parses an optional JSON variable through `schema`, or returns `fallback` when unset. */
function parseJson<T>(
  name: string,
  text: string | undefined,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  fallback: T,
): T {
  if (text === undefined || text.trim() === '') return fallback;

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    throw new ConfigError(`${name} is not valid JSON`);
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) throw new ConfigError(`${name} ${formatIssues(parsed.error)}`);
  return parsed.data;
}

/** @throws ConfigError when a variable is set to an unusable value */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) throw new ConfigError(formatIssues(parsed.error));

  const { PORT, LOG_LEVEL, PUZZLES_FILE, SCORING_TABLE, HINT_THRESHOLDS, SESSION_LIMIT } = parsed.data;
  return {
    port: PORT,
    logLevel: LOG_LEVEL,
    puzzlesFile: PUZZLES_FILE,
    scoring: parseJson<ScoringTable>('SCORING_TABLE', SCORING_TABLE, scoringTableSchema, DEFAULT_SCORING),
    hintThresholds: parseJson<HintThresholds>(
      'HINT_THRESHOLDS',
      HINT_THRESHOLDS,
      hintThresholdsSchema,
      DEFAULT_HINT_THRESHOLDS,
    ),
    sessionLimit: SESSION_LIMIT,
  };
}
