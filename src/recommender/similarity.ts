/** @file similarity.ts */

import type { SimilarityName } from '../conf/experiment-config'
import type { ReviewMatrix } from '../matrix/review-matrix'
import type { ReviewRow, UserId } from '../types'
import type { ReviewScale } from './strategies'

/**
 * Scores two users gave the same good.
 */
export type SharedReview = readonly [a: number, b: number]

export type SimilarUser = {
  user: UserId
  similarity: number
  /** number of goods both users reviewed */
  shared: number
}

/**
 *  Similarity over the goods two users both reviewed. Implementations must
 *  be symmetric and defined for a single shared good.
 */
export interface SimilarityStrategy {
  readonly name: SimilarityName
  similarity(shared: readonly SharedReview[], scale: ReviewScale): number
}

const polarity = (score: number, scale: ReviewScale) => Math.sign(score - scale.neutral)

export const similarityStrategies: Record<SimilarityName, SimilarityStrategy> = {
  /** shared likes plus shared dislikes */
  'shared-opinions': {
    name: 'shared-opinions',
    similarity(shared, scale) {
      let count = 0
      for (const [a, b] of shared) {
        const pa = polarity(a, scale)
        if (pa !== 0 && pa === polarity(b, scale)) count++
      }
      return count
    },
  },
  'shared-likes': {
    name: 'shared-likes',
    similarity(shared, scale) {
      let count = 0
      for (const [a, b] of shared) {
        if (polarity(a, scale) > 0 && polarity(b, scale) > 0) count++
      }
      return count
    },
  },
  /** fraction of shared goods rated on the same side of neutral */
  agreement: {
    name: 'agreement',
    similarity(shared, scale) {
      let agreeing = 0
      for (const [a, b] of shared) {
        if (polarity(a, scale) === polarity(b, scale)) agreeing++
      }
      return agreeing / shared.length
    },
  },
  'inverse-distance': {
    name: 'inverse-distance',
    similarity(shared) {
      let distance = 0
      for (const [a, b] of shared) distance += Math.abs(a - b)
      return 1 / (1 + distance / shared.length)
    },
  },
}

/**
 *  ## SimilarityEngine
 *
 *  Finds the users whose reviews overlap with a target user's, most similar
 *  first. Users without a single shared good are left out entirely rather
 *  than scored zero, equal similarities keep ascending user order.
 */
export class SimilarityEngine {
  constructor(private readonly strategy: SimilarityStrategy, private readonly scale: ReviewScale) {}

  /**
   * @param target the user's id and current reviews, the id is skipped when
   *   it belongs to the matrix
   */
  findSimilar(target: { id: UserId; reviews: ReviewRow }, matrix: ReviewMatrix): SimilarUser[] {
    if (target.reviews.size === 0) return []
    const similar: SimilarUser[] = []

    for (let user = 0; user < matrix.size; user++) {
      if (user === target.id) continue
      const shared = sharedReviews(target.reviews, matrix.getReviewsForUser(user))
      if (shared.length === 0) continue
      similar.push({
        user,
        similarity: this.strategy.similarity(shared, this.scale),
        shared: shared.length,
      })
    }

    return similar.sort((a, b) => b.similarity - a.similarity || a.user - b.user)
  }
}

const sharedReviews = (a: ReviewRow, b: ReviewRow): SharedReview[] => {
  const shared: SharedReview[] = []
  for (const [good, score] of a) {
    const other = b.get(good)
    if (other !== undefined) shared.push([score, other])
  }
  return shared
}
