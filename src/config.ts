import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import { ConfigError } from '@domain/errors.ts'
import { formatZodIssues } from '@application/validation/zodIssues.ts'
import type { MatchOptions } from '@application/matching/matchOptions.ts'

const DEFAULT_DATA_DIR = fileURLToPath(new URL('../data', import.meta.url))

const score = (fallback: number) => z.coerce.number().min(0).max(1).default(fallback)

const EnvSchema = z.object({
  LARDER_HINT_BASE_SCORE: score(0.9),
  LARDER_HINT_SCORE_STEP: score(0.1),
  LARDER_HINT_MIN_SCORE: score(0.1),
  LARDER_RECOMMEND_LIMIT: z.coerce.number().int().positive().default(5),
  LARDER_DB_NAME: z.string().min(1).default('LarderDB'),
  LARDER_DATA_DIR: z.string().min(1).default(DEFAULT_DATA_DIR),
})

export interface LarderConfig {
  hintBaseScore: number
  hintScoreStep: number
  hintMinScore: number
  recommendLimit: number
  dbName: string
  dataDir: string
}

/** Read LARDER_* settings. Unset variables take their defaults. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): LarderConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatZodIssues(parsed.error).join('; ')}`)
  }

  const e = parsed.data
  return Object.freeze({
    hintBaseScore: e.LARDER_HINT_BASE_SCORE,
    hintScoreStep: e.LARDER_HINT_SCORE_STEP,
    hintMinScore: e.LARDER_HINT_MIN_SCORE,
    recommendLimit: e.LARDER_RECOMMEND_LIMIT,
    dbName: e.LARDER_DB_NAME,
    dataDir: e.LARDER_DATA_DIR,
  })
}

export function toMatchOptions(config: LarderConfig): MatchOptions {
  return {
    hintBaseScore: config.hintBaseScore,
    hintScoreStep: config.hintScoreStep,
    hintMinScore: config.hintMinScore,
    recommendLimit: config.recommendLimit,
  }
}
