/** @file review-matrix.ts */

import type { Good, ReviewRow, ReviewStore, Table, UserId } from '../types'
import { AlreadyReviewedError } from '../core/errors'
import { Matrix } from './matrix'

/**
 *  ## ReviewMatrix
 *
 *  The shared (user x good) table of review scores. `NaN` marks a pair
 *  without a review, which is not the same as a neutral score. Entries are
 *  write-once for the lifetime of a run.
 */
export class ReviewMatrix implements ReviewStore {
  private readonly scores: Matrix
  private readonly counts: Uint32Array
  private total = 0

  constructor(readonly size: number) {
    this.scores = Matrix.filled(size, size, NaN)
    this.counts = new Uint32Array(size)
  }

  hasReview(user: UserId, good: Good): boolean {
    return !Number.isNaN(this.scores.get(user, good))
  }

  getScore(user: UserId, good: Good): number | undefined {
    const score = this.scores.get(user, good)
    return Number.isNaN(score) ? undefined : score
  }

  /**
   * Write a review, a second review of the same pair is a fatal fault.
   */
  recordReview(user: UserId, good: Good, score: number): void {
    this.assertInRange(user, good)
    if (!Number.isFinite(score)) throw new RangeError(`Review score must be finite, got ${score}`)
    if (this.hasReview(user, good)) throw new AlreadyReviewedError(user, good)
    this.scores.set(user, good, score)
    this.counts[good]++
    this.total++
  }

  getReviewsForUser(user: UserId): ReviewRow {
    const reviews = new Map<Good, number>()
    if (user < 0 || user >= this.size) return reviews
    const row = this.scores.row(user)
    for (let good = 0; good < row.length; good++) {
      if (!Number.isNaN(row[good])) reviews.set(good, row[good])
    }
    return reviews
  }

  /**
   * Number of users who reviewed the good.
   */
  reviewCount(good: Good): number {
    return this.counts[good]
  }

  get totalReviews(): number {
    return this.total
  }

  /**
   * Dense copy of the scores, `null` where no review exists.
   */
  toTable(): Table {
    return this.scores.to2D().map((row) => row.map((score) => (Number.isNaN(score) ? null : score)))
  }

  private assertInRange(user: UserId, good: Good) {
    if (!Number.isInteger(user) || user < 0 || user >= this.size) {
      throw new RangeError(`User ${user} is outside the ${this.size}x${this.size} review matrix`)
    }
    if (!Number.isInteger(good) || good < 0 || good >= this.size) {
      throw new RangeError(`Good ${good} is outside the ${this.size}x${this.size} review matrix`)
    }
  }
}

/**
 *  Reviews written by users outside the established population. Reads of the
 *  shared matrix stay untouched while new users build up their own history.
 */
export class DetachedReviews implements ReviewStore {
  private readonly reviews = new Map<UserId, Map<Good, number>>()

  recordReview(user: UserId, good: Good, score: number): void {
    const row = this.reviews.get(user) ?? new Map<Good, number>()
    if (row.has(good)) throw new AlreadyReviewedError(user, good)
    row.set(good, score)
    this.reviews.set(user, row)
  }

  getReviewsForUser(user: UserId): ReviewRow {
    return new Map(this.reviews.get(user))
  }
}

/**
 *  Creates the empty (n x n) review matrix a run starts from.
 */
export function generateEmptyReviewMatrix(size: number): ReviewMatrix {
  return new ReviewMatrix(size)
}
