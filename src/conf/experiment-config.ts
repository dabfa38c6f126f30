/**
 * Percentage value as a decimal (e.g. 0.5 = 50%)
 */
export type Percentage = number

/**
 * Abstract unit of time or money a user spends per tick.
 */
export type Cost = number

export type SimilarityName = 'shared-opinions' | 'shared-likes' | 'agreement' | 'inverse-distance'

export type ConsumeRuleName = 'mean' | 'positive' | 'cutoff'

/**
 * Experiment configuration for the popularity-bias simulation.
 */
export interface ExperimentConfig {
  // Population

  /**
   * Number of users and number of goods, the matrices are (n x n).
   * @range 1 - 500
   * @default 20
   */
  MATRIX_SIZE: number

  /**
   * Number of ticks each run lasts, there is no early stopping.
   * @default 10
   */
  NUMBER_OF_TICKS: number

  /**
   * Number of independent runs, each seeded with `SEED + runIndex`.
   * @default 10
   */
  NUMBER_OF_EXPERIMENTS: number

  // Budget

  /**
   * Budget every user starts each tick with.
   * @default 10
   */
  STARTING_BUDGET: Cost

  /**
   * Price of asking for a recommendation, charged before the outcome is known.
   * @default 1
   */
  SEARCH_PRICE: Cost

  /**
   * Price of consuming the recommended good.
   * @default 5
   */
  CONSUME_PRICE: Cost

  // Utility distribution

  /**
   * Mean of the normal distribution true utilities are drawn from.
   * @default 4
   */
  UTILITY_MEAN: number

  /**
   * Standard deviation of the true utility distribution.
   * @default 2
   */
  UTILITY_STD: number

  /**
   * Standard deviation of the noise separating expected from true utility.
   * Higher = users are worse at judging goods before consuming them
   * @default 2
   */
  EXPECTATION_NOISE_STD: number

  // Reviews

  /**
   * Rating system users review with:
   *  0) [-1, 0, 1]
   *  n) [1 to n] where n is the number provided (n >= 2)
   * @default 0
   */
  REVIEW_SCALE: number

  /**
   * Standard deviation of the noise added to true utility when writing a review.
   * @default 0
   */
  REVIEW_NOISE_STD: number

  /**
   * Number of random goods each established user consumes for free before
   * the first tick, gives collaborative filtering its initial overlap. At
   * least one good is always left unconsumed.
   * @default 2
   */
  SEED_REVIEWS_PER_USER: number

  /**
   * Free random goods each cold-start user consumes before being handed to
   * the recommender, 0 starts them with an empty history.
   * @default 2
   */
  NEW_USER_SEED_REVIEWS: number

  // Recommendation

  /**
   * Similarity function used to rank neighbours.
   * @default 'shared-opinions'
   */
  SIMILARITY: SimilarityName

  /**
   * Maximum number of most-similar neighbours the policy listens to, 0 for
   * every user who shares a reviewed good.
   * @default 0
   */
  NEIGHBORHOOD_SIZE: number

  /**
   * Decision rule applied to the expected utility of a recommendation.
   *  mean) consume when expected utility >= UTILITY_MEAN
   *  positive) consume when expected utility > 0
   *  cutoff) consume when expected utility >= CONSUME_CUTOFF
   * @default 'mean'
   */
  CONSUME_RULE: ConsumeRuleName

  /**
   * Cutoff used by the 'cutoff' consume rule.
   * @default 4
   */
  CONSUME_CUTOFF: number

  // Analysis

  /**
   * Fraction of optimal utility a user must reach to count as "well served".
   * @range 0 - 1
   * @default 0.8
   */
  WELL_SERVED_THRESHOLD: Percentage

  /**
   * Utility ratio at or above which a user counts as an "optimal" user.
   * @range 0 - 1
   * @default 0.95
   */
  OPTIMAL_USER_RATIO: Percentage

  /**
   * Number of most and least popular goods analyzed.
   * @range 1 - MATRIX_SIZE
   * @default 10
   */
  TOP_N_SIZE: number

  /**
   * Number of synthetic users driven through the frozen review matrix.
   * @default 10
   */
  NUMBER_OF_NEW_USERS: number

  // Misc

  /**
   * Seed for the pseudo-random number generator.
   * @default 20
   */
  SEED: number

  /**
   * Print every user's review line after each run.
   * @default false
   */
  VERBOSE: boolean

  /**
   * Directory run results are saved to as JSON, empty to skip saving.
   * @default ''
   */
  OUTPUT_DIR: string

  /**
   * Configuration identifier or description.
   * @default "Base Configuration"
   */
  MESSAGE: string
}

/**
 * Default configuration, a small closed population observed for ten ticks.
 */
export const BASE_CONFIG: ExperimentConfig = {
  // Population
  MATRIX_SIZE: 20,
  NUMBER_OF_TICKS: 10,
  NUMBER_OF_EXPERIMENTS: 10,

  // Budget - two searches and one consumption leave room for one more search
  STARTING_BUDGET: 10,
  SEARCH_PRICE: 1,
  CONSUME_PRICE: 5,

  // Utility
  UTILITY_MEAN: 4,
  UTILITY_STD: 2,
  EXPECTATION_NOISE_STD: 2,

  // Reviews
  REVIEW_SCALE: 0,
  REVIEW_NOISE_STD: 0,
  SEED_REVIEWS_PER_USER: 2,
  NEW_USER_SEED_REVIEWS: 2,

  // Recommendation
  SIMILARITY: 'shared-opinions',
  NEIGHBORHOOD_SIZE: 0,
  CONSUME_RULE: 'mean',
  CONSUME_CUTOFF: 4,

  // Analysis
  WELL_SERVED_THRESHOLD: 0.8,
  OPTIMAL_USER_RATIO: 0.95,
  TOP_N_SIZE: 10,
  NUMBER_OF_NEW_USERS: 10,

  // Misc
  SEED: 20,
  VERBOSE: false,
  OUTPUT_DIR: '',
  MESSAGE: 'Base Configuration',
}

/**
 * Larger population rated on a five star scale with noisy reviews.
 */
export const FIVE_STAR_CONFIG: ExperimentConfig = {
  ...BASE_CONFIG,
  MATRIX_SIZE: 50,
  NUMBER_OF_TICKS: 20,
  REVIEW_SCALE: 5,
  REVIEW_NOISE_STD: 1,
  SIMILARITY: 'inverse-distance',
  NEIGHBORHOOD_SIZE: 10,
  MESSAGE: 'Five Star Configuration',
}

/**
 * Users who try almost anything, good for observing how fast reviews pile up.
 */
export const EAGER_CONFIG: ExperimentConfig = {
  ...BASE_CONFIG,
  CONSUME_RULE: 'positive',
  CONSUME_PRICE: 2,
  SEED_REVIEWS_PER_USER: 3,
  MESSAGE: 'Eager Consumers Configuration',
}

export const PRESETS = {
  base: BASE_CONFIG,
  'five-star': FIVE_STAR_CONFIG,
  eager: EAGER_CONFIG,
} satisfies Record<string, ExperimentConfig>

export type PresetName = keyof typeof PRESETS

export const isPresetName = (name: string): name is PresetName => Object.hasOwn(PRESETS, name)
