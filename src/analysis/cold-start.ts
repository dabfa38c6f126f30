/** @file cold-start.ts */

import type { Good, Metric, UserId } from '../types'
import type { Random } from '../core/random'
import type { UserAgent } from '../agents/user-agent'
import type { Recommender } from '../recommender/policy'
import { DetachedReviews, type ReviewMatrix } from '../matrix/review-matrix'
import { generateUtilityRow, type UtilityDistribution, type UtilityRow } from '../matrix/utility-matrix'
import { User } from '../agents/user'
import { Stats } from '../core/stats'
import { bottomGoods, rankByPopularity, reviewCounts } from './popularity'

export type ColdStartOptions = {
  numberOfNewUsers: number
  numberOfTicks: number
  topN: number
  startingBudget: number
  seedReviews: number
  distribution: UtilityDistribution
}

export type ColdStartUser = {
  user: UserId
  consumed: Good[]
  actualUtility: number
  optimalUtility: number
  /** utility of as many of the most popular goods as the user consumed */
  popularUtility: number
  topNConsumed: number
  controlConsumed: number
  controlUtility: number
}

export type ColdStartAnalysis = {
  newUsers: number
  topGoods: Good[]
  bottomGoods: Good[]
  /** average share of the top-N goods each new user consumed */
  topNConsumedFraction: Metric
  topRecommendations: number
  bottomRecommendations: number
  /** how many times more often a top-N good was offered than a bottom-N good */
  topVsBottomRatio: Metric
  averageOptimalUtility: number
  averagePopularUtility: number
  averageActualUtility: number
  averageControlUtility: number
  /** actual minus control utility, in multiples of the utility mean */
  advantageOverControl: Metric
  users: ColdStartUser[]
}

export type ColdStartDeps = {
  matrix: ReviewMatrix
  agent: UserAgent
  recommender: Recommender
  /** recommender the control group uses instead of the policy */
  control: Recommender
  rng: Random
  utilityMean: number
}

type DrivenUser = {
  user: User
  offered: Good[]
}

/**
 *  ## analyzeColdStart
 *
 *  Drives synthetic users with fresh utilities and no history through the
 *  frozen review matrix, and a control twin of each one who is offered
 *  random goods instead. New users keep their reviews to themselves, the
 *  shared matrix is only ever read.
 */
export function analyzeColdStart(deps: ColdStartDeps, options: ColdStartOptions): ColdStartAnalysis {
  const { matrix } = deps
  const counts = reviewCounts(matrix)
  const ranking = rankByPopularity(counts)
  const top = ranking.slice(0, options.topN)
  const bottom = bottomGoods(counts, options.topN)
  const topSet = new Set(top)
  const bottomSet = new Set(bottom)

  const users: ColdStartUser[] = []
  let topRecommendations = 0
  let bottomRecommendations = 0

  for (let k = 0; k < options.numberOfNewUsers; k++) {
    const id = matrix.size + k
    const utility = generateUtilityRow(matrix.size, options.distribution, deps.rng)

    const reviews = new DetachedReviews()
    const newUser = new User(id, utility, options.startingBudget)
    const onboarded = deps.agent.onboard(newUser, reviews, options.seedReviews)
    const driven = drive(deps, { user: newUser, offered: [] }, reviews, options.numberOfTicks)

    const controlReviews = new DetachedReviews()
    const twin = new User(id, utility, options.startingBudget)
    deps.agent.replay(twin, controlReviews, onboarded)
    drive({ ...deps, recommender: deps.control }, { user: twin, offered: [] }, controlReviews, options.numberOfTicks)

    for (const good of driven.offered) {
      if (topSet.has(good)) topRecommendations++
      if (bottomSet.has(good)) bottomRecommendations++
    }

    const consumed = [...newUser.consumedGoods]
    users.push({
      user: id,
      consumed,
      actualUtility: newUser.actualUtility,
      optimalUtility: newUser.optimalUtility,
      popularUtility: popularUtility(utility, ranking, consumed.length),
      topNConsumed: consumed.filter((good) => topSet.has(good)).length,
      controlConsumed: twin.consumedCount,
      controlUtility: twin.actualUtility,
    })
  }

  const averageActualUtility = Stats.average(users.map((u) => u.actualUtility))
  const averageControlUtility = Stats.average(users.map((u) => u.controlUtility))

  return {
    newUsers: users.length,
    topGoods: top,
    bottomGoods: bottom,
    topNConsumedFraction: Stats.averageDefined(users.map((u) => Stats.ratio(u.topNConsumed, top.length))),
    topRecommendations,
    bottomRecommendations,
    topVsBottomRatio: Stats.ratio(topRecommendations, bottomRecommendations),
    averageOptimalUtility: Stats.average(users.map((u) => u.optimalUtility)),
    averagePopularUtility: Stats.average(users.map((u) => u.popularUtility)),
    averageActualUtility,
    averageControlUtility,
    advantageOverControl: Stats.ratio(averageActualUtility - averageControlUtility, deps.utilityMean),
    users,
  }
}

const drive = (
  deps: Pick<ColdStartDeps, 'agent' | 'recommender'>,
  driven: DrivenUser,
  reviews: DetachedReviews,
  numberOfTicks: number
): DrivenUser => {
  for (let tick = 0; tick < numberOfTicks; tick++) {
    driven.user.resetForTick()
    const outcome = deps.agent.runTick(driven.user, deps.recommender, reviews)
    driven.offered.push(...outcome.offered)
  }
  return driven
}

/**
 * Utility the user would have had from the `count` most popular goods.
 */
export function popularUtility(utility: UtilityRow, ranking: readonly Good[], count: number): number {
  return Stats.sum(ranking.slice(0, count).map((good) => utility.trueUtility(good)))
}
