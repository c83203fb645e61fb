import { DEFAULT_INJURY_CATEGORIES, type InjuryCategories } from '@/lib/summary'

export type AppConfig = {
  env: string
  port: number
  dataPath: string
  sentryDsn: string | null
  rateLimitMax: number
  injuryCategories: InjuryCategories
}

type Env = Record<string, string | undefined>

function list(raw: string | undefined, fallback: readonly string[]): readonly string[] {
  if (!raw) return fallback
  const values = raw
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean)
  return values.length > 0 ? values : fallback
}

function positiveInt(raw: string | undefined, fallback: number): number {
  const n = raw ? parseInt(raw, 10) : NaN
  return !isNaN(n) && n > 0 ? n : fallback
}

/**
 * Reads runtime settings from the environment. Absent or invalid values fall
 * back to defaults; nothing here throws.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  return Object.freeze({
    env: env.NODE_ENV ?? 'development',
    port: positiveInt(env.PORT, 4000),
    dataPath: env.DATA_PATH ?? 'data/collisions.csv',
    sentryDsn: env.SENTRY_DSN || null,
    rateLimitMax: positiveInt(env.RATE_LIMIT_MAX, 60),
    injuryCategories: {
      none: list(env.INJURY_NONE_LABELS, DEFAULT_INJURY_CATEGORIES.none),
      fatal: list(env.INJURY_FATAL_LABELS, DEFAULT_INJURY_CATEGORIES.fatal),
    },
  })
}
