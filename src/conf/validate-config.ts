import { z } from 'zod'
import { ConfigurationError } from '../core/errors'
import type { ExperimentConfig } from './experiment-config'

const count = z.number().int().positive()
const cost = z.number().finite().positive()
const fraction = z.number().min(0).max(1)
const deviation = z.number().finite().nonnegative()

export const experimentConfigSchema = z
  .object({
    MATRIX_SIZE: count.max(500),
    NUMBER_OF_TICKS: count,
    NUMBER_OF_EXPERIMENTS: count,
    STARTING_BUDGET: cost,
    SEARCH_PRICE: cost,
    CONSUME_PRICE: cost,
    UTILITY_MEAN: z.number().finite(),
    UTILITY_STD: deviation,
    EXPECTATION_NOISE_STD: deviation,
    REVIEW_SCALE: z
      .number()
      .int()
      .refine((scale) => scale === 0 || scale >= 2, 'must be 0 (three level) or at least 2'),
    REVIEW_NOISE_STD: deviation,
    SEED_REVIEWS_PER_USER: z.number().int().nonnegative(),
    NEW_USER_SEED_REVIEWS: z.number().int().nonnegative(),
    SIMILARITY: z.enum(['shared-opinions', 'shared-likes', 'agreement', 'inverse-distance']),
    NEIGHBORHOOD_SIZE: z.number().int().nonnegative(),
    CONSUME_RULE: z.enum(['mean', 'positive', 'cutoff']),
    CONSUME_CUTOFF: z.number().finite(),
    WELL_SERVED_THRESHOLD: fraction,
    OPTIMAL_USER_RATIO: fraction,
    TOP_N_SIZE: count,
    NUMBER_OF_NEW_USERS: count,
    SEED: z.number().int().nonnegative(),
    VERBOSE: z.boolean(),
    OUTPUT_DIR: z.string(),
    MESSAGE: z.string(),
  })
  .strict()
  .superRefine((config, ctx) => {
    if (config.TOP_N_SIZE > config.MATRIX_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['TOP_N_SIZE'],
        message: `must not exceed MATRIX_SIZE (${config.MATRIX_SIZE})`,
      })
    }
  }) satisfies z.ZodType<ExperimentConfig>

/**
 *  Validate a configuration, every issue is collected into a single
 *  `ConfigurationError` so that nothing runs with a bad parameter.
 */
export function validateConfig(config: unknown): ExperimentConfig {
  const result = experimentConfigSchema.safeParse(config)
  if (result.success) return result.data
  throw new ConfigurationError(
    result.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
  )
}
