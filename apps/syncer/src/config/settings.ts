/**
 * Syncer configuration.
 *
 * Every matching threshold and weight is read from the environment so it can
 * be retuned without touching the matching code.
 */
import { z } from 'zod'

const bool = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1')

const csv = z
  .string()
  .transform((v) =>
    v
      .split(',')
      .map((s) => s.trim())
      .filter((s) => s.length > 0)
  )

export const settingsSchema = z
  .object({
    SYNC_CRON: z.string().default('0 */6 * * *'),
    STORE_BACKEND: z.enum(['memory', 'redis']).default('memory'),

    MATCH_HIGH_THRESHOLD: z.coerce.number().min(0).max(1).default(0.85),
    MATCH_AMBIGUOUS_LOW: z.coerce.number().min(0).max(1).default(0.6),
    MATCH_AMBIGUITY_MARGIN: z.coerce.number().min(0).max(1).default(0.05),
    MATCH_CONTEST_HIGH_SCORES: bool.default('false'),
    MATCH_WEIGHT_NAME: z.coerce.number().min(0).default(0.6),
    MATCH_WEIGHT_BREWERY: z.coerce.number().min(0).default(0.4),
    MATCH_STYLE_BONUS: z.coerce.number().min(0).default(0.03),
    MATCH_STYLE_PENALTY: z.coerce.number().min(0).default(0.1),
    MATCH_ABV_TOLERANCE: z.coerce.number().min(0).default(0.5),
    MATCH_ABV_BONUS: z.coerce.number().min(0).default(0.03),
    MATCH_ABV_PENALTY: z.coerce.number().min(0).default(0.15),
    MATCH_MAX_CANDIDATES: z.coerce.number().int().positive().default(3),
    MATCH_MAX_LOOKUPS: z.coerce.number().int().positive().default(2),
    MATCH_CONCURRENCY: z.coerce.number().int().positive().default(4),
    MAX_MATCHES_PER_CYCLE: z.coerce.number().int().positive().default(200),

    LINK_FAILURE_THRESHOLD: z.coerce.number().int().positive().default(3),
    LINK_STALE_AFTER_HOURS: z.coerce.number().positive().default(168),
    UNMATCHED_RETRY_AFTER_HOURS: z.coerce.number().positive().default(168),
    PRODUCT_STALE_AFTER_DAYS: z.coerce.number().positive().default(30),
    PRICE_EPSILON: z.coerce.number().min(0).default(0.01),

    BEERDB_RPS: z.coerce.number().positive().default(2),
    RETAILER_RPS: z.coerce.number().positive().default(5),
    EXTERNAL_CALL_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
    EXTERNAL_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
    EXTERNAL_RETRY_INITIAL_DELAY_MS: z.coerce.number().int().min(0).default(1_000),
    EXTERNAL_RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(30_000),
    FAILED_CYCLE_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(15 * 60_000),

    RETAILER_BASE_URL: z.string().url().default('http://localhost:8081'),
    RETAILER_CATEGORIES: csv.default('beer'),
    BEERDB_BASE_URL: z.string().url().default('http://localhost:8082'),
    BEERDB_API_KEY: z.string().optional(),

    AUTO_ACCEPT_CORRECTIONS: bool.default('false'),
  })
  .refine((s) => s.MATCH_AMBIGUOUS_LOW <= s.MATCH_HIGH_THRESHOLD, {
    message: 'MATCH_AMBIGUOUS_LOW must not exceed MATCH_HIGH_THRESHOLD',
    path: ['MATCH_AMBIGUOUS_LOW'],
  })
  .refine((s) => s.MATCH_WEIGHT_NAME + s.MATCH_WEIGHT_BREWERY > 0, {
    message: 'Name and brewery weights must not both be zero',
    path: ['MATCH_WEIGHT_NAME'],
  })

export type SyncSettings = z.output<typeof settingsSchema>

/**
 * Parse and validate settings. Throws a ZodError listing every bad variable.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): SyncSettings {
  return settingsSchema.parse(env)
}
