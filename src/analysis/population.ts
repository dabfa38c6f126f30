/** @file population.ts */

import type { Good, Metric, UserId } from '../types'
import type { User } from '../agents/user'
import type { ReviewMatrix } from '../matrix/review-matrix'
import type { UtilityRow } from '../matrix/utility-matrix'
import { Stats } from '../core/stats'
import { popularityByTier, reviewCounts, type Consumer, type PopularityUsage } from './popularity'

export type PopulationOptions = {
  wellServedThreshold: number
  optimalUserRatio: number
  topN: number
  /** consumptions each oracle user gets, see `oracleConsumptions` */
  oracleConsumptions: number
}

export type UserUtilitySummary = {
  user: UserId
  consumed: number
  actualUtility: number
  optimalUtility: number
  /** undefined when the user consumed nothing */
  ratio: Metric
  wellServed: boolean | 'undefined'
  optimal: boolean | 'undefined'
}

export type PopulationAnalysis = {
  populationSize: number
  totalMaxUtility: number
  totalActualUtility: number
  percentReceived: Metric
  usersWithoutConsumption: number
  usersWithUndefinedRatio: number
  wellServedCount: number
  /** of the users whose ratio is defined */
  wellServedFraction: Metric
  optimalUserCount: number
  popularity: PopularityUsage[]
  optimalUserPopularity: PopularityUsage[]
  /** the same popularity questions asked of a perfect recommender */
  oraclePopularity: PopularityUsage[]
  users: UserUtilitySummary[]
}

/**
 * Consumptions a perfect recommender could fit into the run.
 */
export function oracleConsumptions(props: {
  size: number
  numberOfTicks: number
  startingBudget: number
  searchPrice: number
  consumePrice: number
}): number {
  const perTick = Math.floor(props.startingBudget / (props.searchPrice + props.consumePrice))
  return Math.min(props.size, props.numberOfTicks * perTick)
}

/**
 * The `count` goods with the highest true utility, ties by ascending index.
 */
export function bestGoods(utility: UtilityRow, count: number): Good[] {
  return Array.from({ length: utility.size }, (_, good) => good)
    .sort((a, b) => utility.trueUtility(b) - utility.trueUtility(a) || a - b)
    .slice(0, count)
}

const summarizeUser = (user: User, options: PopulationOptions): UserUtilitySummary => {
  const defined = user.consumedCount > 0 && user.optimalUtility !== 0
  return {
    user: user.id,
    consumed: user.consumedCount,
    actualUtility: user.actualUtility,
    optimalUtility: user.optimalUtility,
    ratio: defined ? user.actualUtility / user.optimalUtility : Stats.UNDEFINED,
    wellServed: defined ? user.actualUtility >= options.wellServedThreshold * user.optimalUtility : Stats.UNDEFINED,
    optimal: defined ? user.actualUtility >= options.optimalUserRatio * user.optimalUtility : Stats.UNDEFINED,
  }
}

/**
 *  ## analyzePopulation
 *
 *  Utility received against utility achievable, the share of users who were
 *  well served, and how many users ended up with the most reviewed goods.
 *  Reads the final matrices only.
 */
export function analyzePopulation(
  users: readonly User[],
  matrix: ReviewMatrix,
  options: PopulationOptions
): PopulationAnalysis {
  const summaries = users.map((user) => summarizeUser(user, options))
  const definedUsers = summaries.filter((summary) => summary.ratio !== Stats.UNDEFINED)

  const totalMaxUtility = Stats.sum(users.map((user) => user.optimalUtility))
  const totalActualUtility = Stats.sum(users.map((user) => user.actualUtility))
  const wellServedCount = summaries.filter((summary) => summary.wellServed === true).length
  const optimalIds = new Set(summaries.filter((summary) => summary.optimal === true).map((summary) => summary.user))
  const optimalUsers = users.filter((user) => optimalIds.has(user.id))

  const counts = reviewCounts(matrix)
  const oracle = buildOracle(users, options.oracleConsumptions)

  return {
    populationSize: users.length,
    totalMaxUtility,
    totalActualUtility,
    percentReceived: Stats.ratio(totalActualUtility, totalMaxUtility),
    usersWithoutConsumption: summaries.filter((summary) => summary.consumed === 0).length,
    usersWithUndefinedRatio: summaries.length - definedUsers.length,
    wellServedCount,
    wellServedFraction: Stats.ratio(wellServedCount, definedUsers.length),
    optimalUserCount: optimalUsers.length,
    popularity: popularityByTier(users, counts, options.topN, users.length),
    optimalUserPopularity: popularityByTier(optimalUsers, counts, options.topN, optimalUsers.length),
    oraclePopularity: popularityByTier(oracle.consumers, oracle.counts, options.topN, users.length),
    users: summaries,
  }
}

/**
 *  Every user consumes exactly their best goods, the counts are the reviews
 *  such a population would have left.
 */
export function buildOracle(users: readonly Consumer[], consumptions: number) {
  const size = users[0]?.utility.size ?? 0
  const counts = new Array<number>(size).fill(0)
  const consumers: Consumer[] = users.map((user) => {
    const consumedGoods = new Set(bestGoods(user.utility, consumptions))
    consumedGoods.forEach((good) => counts[good]++)
    return { consumedGoods, utility: user.utility }
  })
  return { consumers, counts }
}
