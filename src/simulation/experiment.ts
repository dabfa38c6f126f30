/** @file experiment.ts */

import type { Metric, Table, UserId } from '../types'
import type { ExperimentConfig } from '../conf/experiment-config'
import { validateConfig } from '../conf/validate-config'
import { Random } from '../core/random'
import { Stats } from '../core/stats'
import { InvariantViolationError, describeError } from '../core/errors'
import { generateEmptyReviewMatrix, type ReviewMatrix } from '../matrix/review-matrix'
import { generateUtilityMatrix, type UtilityDistribution } from '../matrix/utility-matrix'
import { User } from '../agents/user'
import { UserAgent, type AgentAction } from '../agents/user-agent'
import { SimilarityEngine, similarityStrategies, type SimilarityStrategy } from '../recommender/similarity'
import { CollaborativeRecommender, RandomRecommender, RecommendationPolicy } from '../recommender/policy'
import {
  createConsumptionRule,
  createReviewStrategy,
  type ConsumptionRule,
  type ReviewStrategy,
} from '../recommender/strategies'
import { analyzePopulation, oracleConsumptions, type PopulationAnalysis } from '../analysis/population'
import { analyzeColdStart, type ColdStartAnalysis } from '../analysis/cold-start'
import { flattenMetrics, type MetricRecord } from '../analysis/metrics'
import { TickScheduler, type SchedulerHooks } from './tick-scheduler'

export type Strategies = {
  similarity: SimilarityStrategy
  consumption: ConsumptionRule
  review: ReviewStrategy
}

export type ExperimentHooks = SchedulerHooks & {
  onAction?(action: AgentAction): void
  onRunStart?(run: { runIndex: number; seed: number }): void
  onRunEnd?(record: RunRecord): void
}

export type ExperimentOptions = {
  hooks?: ExperimentHooks
  /** replaces the strategies named in the config */
  strategies?: Partial<Strategies>
}

export type UserReviewLine = {
  user: UserId
  reviews: (number | null)[]
  reviewSum: number
  actualUtility: number
  optimalUtility: number
}

export type CompletedRun = {
  status: 'completed'
  runIndex: number
  seed: number
  reviewMatrix: Table
  utilityMatrix: { trueUtility: Table; expectedUtility: Table }
  onboardingReviews: number
  searches: number
  reviewsWritten: number
  population: PopulationAnalysis
  coldStart: ColdStartAnalysis
  metrics: MetricRecord
  users: UserReviewLine[]
}

export type FailedRun = {
  status: 'failed'
  runIndex: number
  seed: number
  reason: string
}

export type RunRecord = CompletedRun | FailedRun

export type ExperimentSummary = {
  config: ExperimentConfig
  runs: RunRecord[]
  completed: number
  failed: number
  /** mean of every metric over the completed runs */
  averages: MetricRecord
}

export function resolveStrategies(config: ExperimentConfig, overrides: Partial<Strategies> = {}): Strategies {
  return {
    similarity: similarityStrategies[config.SIMILARITY],
    consumption: createConsumptionRule(config),
    review: createReviewStrategy(config),
    ...overrides,
  }
}

export function utilityDistribution(config: ExperimentConfig): UtilityDistribution {
  return {
    mean: config.UTILITY_MEAN,
    std: config.UTILITY_STD,
    expectationNoiseStd: config.EXPECTATION_NOISE_STD,
  }
}

/**
 *  Every review in the matrix belongs to a consumed good and every consumed
 *  good has a review.
 */
export function assertReviewConsistency(users: readonly User[], matrix: ReviewMatrix): void {
  let consumed = 0
  for (const user of users) {
    const reviews = matrix.getReviewsForUser(user.id)
    consumed += user.consumedCount
    if (reviews.size !== user.consumedCount) {
      throw new InvariantViolationError(
        `user ${user.id} has ${reviews.size} reviews but consumed ${user.consumedCount} goods`
      )
    }
    for (const good of reviews.keys()) {
      if (!user.consumedGoods.has(good)) {
        throw new InvariantViolationError(`user ${user.id} reviewed good ${good} without consuming it`)
      }
    }
  }
  if (consumed !== matrix.totalReviews) {
    throw new InvariantViolationError(`${matrix.totalReviews} reviews recorded for ${consumed} consumptions`)
  }
}

/**
 *  ## runExperiment
 *
 *  One complete run: generate utilities, onboard users, run the ticks, check
 *  the review/consumption invariant, then analyse the established population
 *  and the cold-start users. Throws on any internal fault, the caller decides
 *  what a failed run means.
 */
export function runExperiment(
  config: ExperimentConfig,
  runIndex = 0,
  options: ExperimentOptions = {}
): CompletedRun {
  const hooks = options.hooks ?? {}
  const strategies = resolveStrategies(config, options.strategies)
  const seed = config.SEED + runIndex
  const rng = new Random(seed)
  const size = config.MATRIX_SIZE
  const distribution = utilityDistribution(config)

  const utilityMatrix = generateUtilityMatrix(size, distribution, rng)
  const reviewMatrix = generateEmptyReviewMatrix(size)

  const agent = new UserAgent({
    prices: { searchPrice: config.SEARCH_PRICE, consumePrice: config.CONSUME_PRICE },
    rule: strategies.consumption,
    review: strategies.review,
    rng,
    onAction: hooks.onAction,
  })
  const similarity = new SimilarityEngine(strategies.similarity, strategies.review.scale)
  const policy = new RecommendationPolicy(strategies.review.scale)
  const recommender = new CollaborativeRecommender(reviewMatrix, similarity, policy, config.NEIGHBORHOOD_SIZE)

  const users = Array.from(
    { length: size },
    (_, id) => new User(id, utilityMatrix.row(id), config.STARTING_BUDGET)
  )
  users.forEach((user) => agent.onboard(user, reviewMatrix, config.SEED_REVIEWS_PER_USER))
  const onboardingReviews = reviewMatrix.totalReviews

  const scheduler = new TickScheduler(agent, recommender, reviewMatrix, hooks)
  const schedule = scheduler.run(users, config.NUMBER_OF_TICKS)

  assertReviewConsistency(users, reviewMatrix)

  const population = analyzePopulation(users, reviewMatrix, {
    wellServedThreshold: config.WELL_SERVED_THRESHOLD,
    optimalUserRatio: config.OPTIMAL_USER_RATIO,
    topN: config.TOP_N_SIZE,
    oracleConsumptions: oracleConsumptions({
      size,
      numberOfTicks: config.NUMBER_OF_TICKS,
      startingBudget: config.STARTING_BUDGET,
      searchPrice: config.SEARCH_PRICE,
      consumePrice: config.CONSUME_PRICE,
    }),
  })

  const reviewsBeforeColdStart = reviewMatrix.totalReviews
  const coldStart = analyzeColdStart(
    {
      matrix: reviewMatrix,
      agent,
      recommender,
      control: new RandomRecommender(size, rng),
      rng,
      utilityMean: config.UTILITY_MEAN,
    },
    {
      numberOfNewUsers: config.NUMBER_OF_NEW_USERS,
      numberOfTicks: config.NUMBER_OF_TICKS,
      topN: config.TOP_N_SIZE,
      startingBudget: config.STARTING_BUDGET,
      seedReviews: config.NEW_USER_SEED_REVIEWS,
      distribution,
    }
  )
  if (reviewMatrix.totalReviews !== reviewsBeforeColdStart) {
    throw new InvariantViolationError('cold-start users wrote to the shared review matrix')
  }

  const reviewTable = reviewMatrix.toTable()

  return {
    status: 'completed',
    runIndex,
    seed,
    reviewMatrix: reviewTable,
    utilityMatrix: utilityMatrix.toTables(),
    onboardingReviews,
    searches: schedule.searches,
    reviewsWritten: schedule.reviewsWritten,
    population,
    coldStart,
    metrics: flattenMetrics(population, coldStart),
    users: users.map((user) => ({
      user: user.id,
      reviews: reviewTable[user.id],
      reviewSum: Stats.sum(reviewTable[user.id].filter((score): score is number => score !== null)),
      actualUtility: user.actualUtility,
      optimalUtility: user.optimalUtility,
    })),
  }
}

/**
 * Mean of each metric over the runs, ignoring undefined values.
 */
export function averageMetrics(records: readonly MetricRecord[]): MetricRecord {
  const names = new Set(records.flatMap((record) => Object.keys(record)))
  const averages: MetricRecord = {}
  for (const name of names) {
    const values = records.map((record): Metric => record[name] ?? Stats.UNDEFINED)
    averages[name] = Stats.averageDefined(values)
  }
  return averages
}

/**
 *  Validates the configuration, then runs every repetition. Each run owns its
 *  own matrices, a run which throws is recorded as failed and the rest carry on.
 */
export function runExperiments(input: unknown, options: ExperimentOptions = {}): ExperimentSummary {
  const config = validateConfig(input)
  const runs: RunRecord[] = []

  for (let runIndex = 0; runIndex < config.NUMBER_OF_EXPERIMENTS; runIndex++) {
    const seed = config.SEED + runIndex
    options.hooks?.onRunStart?.({ runIndex, seed })
    let record: RunRecord
    try {
      record = runExperiment(config, runIndex, options)
    } catch (e) {
      record = { status: 'failed', runIndex, seed, reason: describeError(e) }
    }
    runs.push(record)
    options.hooks?.onRunEnd?.(record)
  }

  const completed = runs.filter((run): run is CompletedRun => run.status === 'completed')

  return {
    config,
    runs,
    completed: completed.length,
    failed: runs.length - completed.length,
    averages: averageMetrics(completed.map((run) => run.metrics)),
  }
}
