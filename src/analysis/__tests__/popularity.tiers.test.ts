import { describe, it, expect } from 'vitest'
import { ReviewMatrix } from '../../matrix/review-matrix'
import { UtilityMatrix } from '../../matrix/utility-matrix'
import {
  bottomGoods,
  popularityByTier,
  popularityTiers,
  popularityUsage,
  rankByPopularity,
  reviewCounts,
  type Consumer,
} from '../popularity'

const SIZE = 20

/** goods 0, 1 and 2 reviewed by 10, 3 and 1 users, the other ten users consumed nothing */
const buildPopulation = () => {
  const matrix = new ReviewMatrix(SIZE)
  const consumed = Array.from({ length: SIZE }, () => new Set<number>())
  const review = (user: number, good: number) => {
    matrix.recordReview(user, good, 1)
    consumed[user].add(good)
  }
  for (let user = 0; user < 10; user++) review(user, 0)
  for (let user = 0; user < 3; user++) review(user, 1)
  review(0, 2)

  const ones = Array.from({ length: SIZE }, () => new Array<number>(SIZE).fill(1))
  const utilities = UtilityMatrix.from2D(ones)
  const consumers: Consumer[] = consumed.map((consumedGoods, user) => ({ consumedGoods, utility: utilities.row(user) }))
  return { matrix, consumers }
}

describe('popularity – ranking', () => {
  it('ranks by review count, equal counts by index', () => {
    expect(rankByPopularity([1, 3, 3, 0])).toEqual([1, 2, 0, 3])
    expect(bottomGoods([1, 3, 3, 0], 2)).toEqual([3, 0])
  })

  it('tiers are the top good, a quarter, a half and all of them', () => {
    expect(popularityTiers(10)).toEqual([1, 3, 5, 10])
    expect(popularityTiers(4)).toEqual([1, 2, 4])
    expect(popularityTiers(2)).toEqual([1, 2])
    expect(popularityTiers(1)).toEqual([1])
  })
})

describe('popularity – usage', () => {
  it('the most reviewed good is used by its reviewers only', () => {
    const { matrix, consumers } = buildPopulation()
    const counts = reviewCounts(matrix)
    expect(counts.slice(0, 4)).toEqual([10, 3, 1, 0])

    const top = rankByPopularity(counts).slice(0, 1)
    expect(top).toEqual([0])
    const usage = popularityUsage(consumers, top)
    expect(usage.usingAny).toBe(10 / SIZE)
    expect(usage.usingAnyAllPositive).toBe(0.5)
    expect(usage.usingAnyNotAllPositive).toBe(0)
    expect(usage.usingAll).toBe(0.5)
  })

  it('reports every tier', () => {
    const { matrix, consumers } = buildPopulation()
    const tiers = popularityByTier(consumers, reviewCounts(matrix), 4)
    expect(tiers.map((tier) => tier.goods)).toEqual([[0], [0, 1], [0, 1, 2, 3]])
    expect(tiers.map((tier) => tier.usingAny)).toEqual([0.5, 0.5, 0.5])
    expect(tiers.map((tier) => tier.usingAll)).toEqual([0.5, 0.15, 0])
  })

  it('separates users who ended up with a good they did not like', () => {
    const utilities = UtilityMatrix.from2D([
      [1, -1],
      [1, 1],
    ])
    const consumers: Consumer[] = [
      { consumedGoods: new Set([0, 1]), utility: utilities.row(0) },
      { consumedGoods: new Set([0]), utility: utilities.row(1) },
    ]
    const usage = popularityUsage(consumers, [0, 1])
    expect(usage.usingAny).toBe(1)
    expect(usage.usingAnyAllPositive).toBe(0.5)
    expect(usage.usingAnyNotAllPositive).toBe(0.5)
    expect(usage.usingAll).toBe(0.5)
  })

  it('an empty population has undefined fractions', () => {
    const usage = popularityUsage([], [0])
    expect(usage.usingAny).toBe('undefined')
    expect(usage.usingAll).toBe('undefined')
  })
})
