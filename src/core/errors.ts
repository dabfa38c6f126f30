/** @file errors.ts */

import type { Good, UserId } from '../types'

/**
 *  Thrown before any simulation state exists when a parameter is out of range.
 */
export class ConfigurationError extends Error {
  constructor(readonly issues: string[]) {
    super(`INVALID_CONFIGURATION: ${issues.join('; ')}`)
    this.name = 'ConfigurationError'
  }
}

/**
 *  Reviews are write-once, a second write for the same pair means the
 *  scheduler offered a good the user already consumed.
 */
export class AlreadyReviewedError extends Error {
  constructor(readonly user: UserId, readonly good: Good) {
    super(`ALREADY_REVIEWED: user ${user} has already reviewed good ${good}`)
    this.name = 'AlreadyReviewedError'
  }
}

/**
 *  Raised when the review matrix and the users' consumption records disagree.
 */
export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(`INVARIANT_VIOLATION: ${message}`)
    this.name = 'InvariantViolationError'
  }
}

/**
 *  Returns a printable reason for anything thrown inside a run.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}
