/**
 * Column index of a good in the review and utility matrices.
 */
export type Good = number

/**
 * Row index for established users, `matrixSize + k` for the k-th new user.
 */
export type UserId = number

/**
 * Ratio or percentage which is either a number or explicitly undefined
 * (the denominator was zero).
 */
export type Metric = number | 'undefined'

/**
 * The result of asking a recommender for a good, `null` is "no candidate".
 */
export type Recommendation = Good | null

/**
 * A user's reviews keyed by good, only goods which were actually reviewed.
 */
export type ReviewRow = ReadonlyMap<Good, number>

/**
 * Dense table as emitted to the persistence layer, `null` marks an absent review.
 */
export type Table = (number | null)[][]

/**
 * Anything reviews can be written to and read back from for a single user.
 */
export interface ReviewStore {
  recordReview(user: UserId, good: Good, score: number): void
  getReviewsForUser(user: UserId): ReviewRow
}

export type TickEndReason = 'insufficient-budget' | 'no-candidate'
