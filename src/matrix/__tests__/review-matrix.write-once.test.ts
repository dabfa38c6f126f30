import { describe, it, expect } from 'vitest'
import { DetachedReviews, ReviewMatrix, generateEmptyReviewMatrix } from '../review-matrix'
import { AlreadyReviewedError } from '../../core/errors'

describe('ReviewMatrix – write once', () => {
  it('starts empty', () => {
    const matrix = generateEmptyReviewMatrix(3)
    expect(matrix.size).toBe(3)
    expect(matrix.totalReviews).toBe(0)
    expect(matrix.hasReview(0, 1)).toBe(false)
    expect(matrix.getScore(0, 1)).toBeUndefined()
    expect(matrix.getReviewsForUser(0).size).toBe(0)
  })

  it('records a review and counts it against the good', () => {
    const matrix = new ReviewMatrix(3)
    matrix.recordReview(0, 1, 1)
    matrix.recordReview(2, 1, -1)
    expect(matrix.getScore(0, 1)).toBe(1)
    expect(matrix.reviewCount(1)).toBe(2)
    expect(matrix.reviewCount(0)).toBe(0)
    expect(matrix.totalReviews).toBe(2)
  })

  it('a second review of the same pair throws and keeps the first', () => {
    const matrix = new ReviewMatrix(3)
    matrix.recordReview(0, 1, 1)
    expect(() => matrix.recordReview(0, 1, -1)).toThrow(AlreadyReviewedError)
    expect(() => matrix.recordReview(0, 1, -1)).toThrow('ALREADY_REVIEWED: user 0 has already reviewed good 1')
    expect(matrix.getScore(0, 1)).toBe(1)
    expect(matrix.totalReviews).toBe(1)
  })

  it('a neutral score is a review, not an absence', () => {
    const matrix = new ReviewMatrix(3)
    matrix.recordReview(1, 2, 0)
    expect(matrix.hasReview(1, 2)).toBe(true)
    expect([...matrix.getReviewsForUser(1)]).toEqual([[2, 0]])
  })

  it('rejects out of range pairs and non finite scores', () => {
    const matrix = new ReviewMatrix(3)
    expect(() => matrix.recordReview(3, 0, 1)).toThrow(RangeError)
    expect(() => matrix.recordReview(0, -1, 1)).toThrow(RangeError)
    expect(() => matrix.recordReview(0, 0, NaN)).toThrow(RangeError)
    expect(matrix.totalReviews).toBe(0)
  })

  it('unknown users have no reviews', () => {
    expect(new ReviewMatrix(3).getReviewsForUser(5).size).toBe(0)
  })

  it('toTable marks absent reviews with null', () => {
    const matrix = new ReviewMatrix(3)
    matrix.recordReview(0, 1, 1)
    matrix.recordReview(1, 2, 0)
    expect(matrix.toTable()).toEqual([
      [null, 1, null],
      [null, null, 0],
      [null, null, null],
    ])
  })
})

describe('DetachedReviews', () => {
  it('keeps reviews per user and is write once too', () => {
    const reviews = new DetachedReviews()
    reviews.recordReview(7, 0, 1)
    reviews.recordReview(7, 2, -1)
    expect([...reviews.getReviewsForUser(7)]).toEqual([
      [0, 1],
      [2, -1],
    ])
    expect(reviews.getReviewsForUser(8).size).toBe(0)
    expect(() => reviews.recordReview(7, 0, 0)).toThrow(AlreadyReviewedError)
  })
})
