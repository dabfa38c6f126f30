/** @file popularity.ts */

import type { Good, Metric } from '../types'
import type { ReviewMatrix } from '../matrix/review-matrix'
import type { UtilityRow } from '../matrix/utility-matrix'
import { Stats } from '../core/stats'

/**
 *  Anything which consumed goods and has utilities for them, established
 *  users, new users and oracle users alike.
 */
export interface Consumer {
  readonly consumedGoods: ReadonlySet<Good>
  readonly utility: UtilityRow
}

export type PopularityUsage = {
  /** number of most popular goods looked at */
  size: number
  goods: Good[]
  /** consumed at least one of the goods */
  usingAny: Metric
  /** ...and every one of those goods had positive true utility for them */
  usingAnyAllPositive: Metric
  usingAnyNotAllPositive: Metric
  /** consumed every one of the goods */
  usingAll: Metric
}

/**
 * Number of reviews every good received.
 */
export function reviewCounts(matrix: ReviewMatrix): number[] {
  return Array.from({ length: matrix.size }, (_, good) => matrix.reviewCount(good))
}

/**
 * Goods ordered from most to least reviewed, equal counts by ascending index.
 */
export function rankByPopularity(counts: readonly number[]): Good[] {
  return counts.map((_, good) => good).sort((a, b) => counts[b] - counts[a] || a - b)
}

/**
 * Least reviewed goods first, equal counts by ascending index.
 */
export function bottomGoods(counts: readonly number[], n: number): Good[] {
  return counts
    .map((_, good) => good)
    .sort((a, b) => counts[a] - counts[b] || a - b)
    .slice(0, n)
}

/**
 * The most popular good, a quarter and a half of the analysed goods, and all of them.
 */
export function popularityTiers(n: number): number[] {
  return [...new Set([1, Math.ceil(n / 4), Math.ceil(n / 2), n])].sort((a, b) => a - b)
}

/**
 *  How concentrated consumption is on the given popular goods. Fractions are
 *  of `population`, which defaults to the number of consumers.
 */
export function popularityUsage(
  consumers: readonly Consumer[],
  goods: readonly Good[],
  population: number = consumers.length
): PopularityUsage {
  let usingAny = 0
  let allPositive = 0
  let usingAll = 0

  for (const consumer of consumers) {
    const used = goods.filter((good) => consumer.consumedGoods.has(good))
    if (used.length === 0) continue
    usingAny++
    if (used.every((good) => consumer.utility.trueUtility(good) > 0)) allPositive++
    if (used.length === goods.length) usingAll++
  }

  return {
    size: goods.length,
    goods: [...goods],
    usingAny: Stats.ratio(usingAny, population),
    usingAnyAllPositive: Stats.ratio(allPositive, population),
    usingAnyNotAllPositive: Stats.ratio(usingAny - allPositive, population),
    usingAll: Stats.ratio(usingAll, population),
  }
}

/**
 * Usage for each tier of the ranking.
 */
export function popularityByTier(
  consumers: readonly Consumer[],
  counts: readonly number[],
  topN: number,
  population: number = consumers.length
): PopularityUsage[] {
  const ranking = rankByPopularity(counts)
  return popularityTiers(topN).map((size) => popularityUsage(consumers, ranking.slice(0, size), population))
}
