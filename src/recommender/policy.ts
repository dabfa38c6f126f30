/** @file policy.ts */

import type { Good, Recommendation, ReviewRow, UserId } from '../types'
import type { ReviewMatrix } from '../matrix/review-matrix'
import type { Random } from '../core/random'
import type { ReviewScale } from './strategies'
import type { SimilarityEngine, SimilarUser } from './similarity'

export type RecommendationTarget = {
  id: UserId
  reviews: ReviewRow
}

export type RecommendationRequest = RecommendationTarget & {
  /** goods offered to the user earlier in the current tick */
  alreadyRecommended: ReadonlySet<Good>
}

/**
 *  Anything which can hand a user a single good to consider.
 */
export interface Recommender {
  readonly name: string
  recommend(request: RecommendationRequest): Recommendation
}

/**
 *  ## RecommendationPolicy
 *
 *  Picks the good the neighbours liked most. Every positive review counts
 *  its distance above neutral, divided by the neighbour's rank (1 for the
 *  most similar, 1/2 for the next, ...). Goods the target already reviewed
 *  or was offered this tick are skipped, ties go to the lowest good index.
 *
 *  Offers rejected in an earlier tick may come back, the policy only
 *  remembers the current tick.
 */
export class RecommendationPolicy {
  constructor(private readonly scale: ReviewScale) {}

  recommend(
    target: RecommendationTarget,
    similarUsers: readonly SimilarUser[],
    reviewMatrix: ReviewMatrix,
    alreadyRecommendedThisTick: ReadonlySet<Good>
  ): Recommendation {
    if (similarUsers.length === 0) return null

    const totals = this.scoreCandidates(target, similarUsers, reviewMatrix, alreadyRecommendedThisTick)

    let best: Good | null = null
    let bestScore = -Infinity
    for (const [good, score] of totals) {
      if (score > bestScore || (score === bestScore && best !== null && good < best)) {
        best = good
        bestScore = score
      }
    }
    return best
  }

  /**
   * Weighted positive score of every eligible good.
   */
  scoreCandidates(
    target: RecommendationTarget,
    similarUsers: readonly SimilarUser[],
    reviewMatrix: ReviewMatrix,
    alreadyRecommendedThisTick: ReadonlySet<Good>
  ): Map<Good, number> {
    const totals = new Map<Good, number>()

    similarUsers.forEach((neighbour, rank) => {
      const weight = 1 / (rank + 1)
      for (const [good, score] of reviewMatrix.getReviewsForUser(neighbour.user)) {
        if (score <= this.scale.neutral) continue
        if (target.reviews.has(good) || alreadyRecommendedThisTick.has(good)) continue
        totals.set(good, (totals.get(good) ?? 0) + (score - this.scale.neutral) * weight)
      }
    })

    return totals
  }
}

/**
 *  Similarity search followed by the policy. A `neighborhoodSize` of 0 lets
 *  every overlapping user contribute, otherwise only the closest ones do.
 */
export class CollaborativeRecommender implements Recommender {
  readonly name = 'collaborative'

  constructor(
    private readonly matrix: ReviewMatrix,
    private readonly similarity: SimilarityEngine,
    private readonly policy: RecommendationPolicy,
    private readonly neighborhoodSize: number
  ) {}

  recommend({ id, reviews, alreadyRecommended }: RecommendationRequest): Recommendation {
    const similar = this.similarity.findSimilar({ id, reviews }, this.matrix)
    const neighbours = this.neighborhoodSize > 0 ? similar.slice(0, this.neighborhoodSize) : similar
    return this.policy.recommend({ id, reviews }, neighbours, this.matrix, alreadyRecommended)
  }
}

/**
 *  Uniform pick among the goods the user has neither reviewed nor been
 *  offered this tick, the baseline the control group uses.
 */
export class RandomRecommender implements Recommender {
  readonly name = 'random'

  constructor(private readonly size: number, private readonly rng: Random) {}

  recommend({ reviews, alreadyRecommended }: RecommendationRequest): Recommendation {
    const available: Good[] = []
    for (let good = 0; good < this.size; good++) {
      if (!reviews.has(good) && !alreadyRecommended.has(good)) available.push(good)
    }
    return this.rng.pick(available) ?? null
  }
}
