/** @file user-agent.ts */

import type { Good, ReviewStore, TickEndReason, UserId } from '../types'
import type { Random } from '../core/random'
import type { Recommender } from '../recommender/policy'
import type { ConsumptionRule, ReviewStrategy } from '../recommender/strategies'
import type { User } from './user'

export type AgentPrices = {
  searchPrice: number
  consumePrice: number
}

export type RejectReason = 'below-threshold' | 'insufficient-budget'

type AgentState =
  | { name: 'idle' }
  | { name: 'searching' }
  | { name: 'consuming'; good: Good }
  | { name: 'rejecting'; good: Good; reason: RejectReason }

export type AgentAction =
  | { type: 'onboard'; user: UserId; good: Good; score: number; budget: number }
  | { type: 'search'; user: UserId; good: Good | null; budget: number }
  | { type: 'consume'; user: UserId; good: Good; score: number; budget: number }
  | { type: 'reject'; user: UserId; good: Good; reason: RejectReason; budget: number }

export type TickOutcome = {
  user: UserId
  searches: number
  /** every good recommended this tick, in order */
  offered: Good[]
  consumed: Good[]
  rejected: Good[]
  endedBy: TickEndReason
  budget: number
}

export type UserAgentOptions = {
  prices: AgentPrices
  rule: ConsumptionRule
  review: ReviewStrategy
  rng: Random
  /** observes every action together with the budget left after it */
  onAction?: (action: AgentAction) => void
}

/**
 *  ## UserAgent
 *
 *  Runs one user through a tick: idle -> searching -> consuming | rejecting
 *  -> idle, until the budget cannot cover another search or the recommender
 *  has nothing left to offer. Neither is an error.
 */
export class UserAgent {
  constructor(private readonly options: UserAgentOptions) {}

  runTick(user: User, recommender: Recommender, reviews: ReviewStore): TickOutcome {
    const { searchPrice } = this.options.prices
    const outcome: TickOutcome = {
      user: user.id,
      searches: 0,
      offered: [],
      consumed: [],
      rejected: [],
      endedBy: 'insufficient-budget',
      budget: user.budget,
    }
    let state: AgentState = { name: 'idle' }

    while (true) {
      switch (state.name) {
        case 'idle': {
          if (user.budget < searchPrice) {
            return this.finish(outcome, user, 'insufficient-budget')
          }
          state = { name: 'searching' }
          break
        }

        case 'searching': {
          // the search is paid for before its outcome is known
          user.budget -= searchPrice
          outcome.searches++
          const good = recommender.recommend({
            id: user.id,
            reviews: reviews.getReviewsForUser(user.id),
            alreadyRecommended: user.recommendedThisTick,
          })
          this.emit({ type: 'search', user: user.id, good, budget: user.budget })
          if (good === null) return this.finish(outcome, user, 'no-candidate')
          outcome.offered.push(good)
          state = this.decide(user, good)
          break
        }

        case 'consuming': {
          const score = this.consume(user, state.good, reviews)
          outcome.consumed.push(state.good)
          this.emit({ type: 'consume', user: user.id, good: state.good, score, budget: user.budget })
          state = { name: 'idle' }
          break
        }

        case 'rejecting': {
          user.recommendedThisTick.add(state.good)
          outcome.rejected.push(state.good)
          this.emit({ type: 'reject', user: user.id, good: state.good, reason: state.reason, budget: user.budget })
          state = { name: 'idle' }
          break
        }
      }
    }
  }

  /**
   * Pay for and consume a good, then review it. Returns the review score.
   */
  consume(user: User, good: Good, reviews: ReviewStore): number {
    user.budget -= this.options.prices.consumePrice
    const score = this.review(user, good, reviews)
    user.recommendedThisTick.add(good)
    return score
  }

  /**
   * Free consumption of up to `count` random goods before the first tick, the
   * initial overlap similarity needs to find any neighbours at all. One
   * unconsumed good is always left for the recommender.
   */
  onboard(user: User, reviews: ReviewStore, count: number): Good[] {
    const goods = Array.from({ length: user.utility.size }, (_, good) => good).filter(
      (good) => !user.consumedGoods.has(good)
    )
    const picked = this.options.rng.sample(goods, Math.max(0, Math.min(count, goods.length - 1)))
    for (const good of picked) {
      const score = this.review(user, good, reviews)
      this.emit({ type: 'onboard', user: user.id, good, score, budget: user.budget })
    }
    return picked
  }

  /**
   * Consume the given goods free of charge, used to give a twin the same
   * starting history as another user.
   */
  replay(user: User, reviews: ReviewStore, goods: readonly Good[]): void {
    for (const good of goods) {
      const score = this.review(user, good, reviews)
      this.emit({ type: 'onboard', user: user.id, good, score, budget: user.budget })
    }
  }

  private decide(user: User, good: Good): AgentState {
    if (!this.options.rule.shouldConsume(user.utility.expectedUtility(good))) {
      return { name: 'rejecting', good, reason: 'below-threshold' }
    }
    if (user.budget < this.options.prices.consumePrice) {
      return { name: 'rejecting', good, reason: 'insufficient-budget' }
    }
    return { name: 'consuming', good }
  }

  private review(user: User, good: Good, reviews: ReviewStore): number {
    const score = this.options.review.score(user.utility.trueUtility(good), this.options.rng)
    reviews.recordReview(user.id, good, score)
    user.recordConsumption(good)
    return score
  }

  private finish(outcome: TickOutcome, user: User, endedBy: TickEndReason): TickOutcome {
    outcome.endedBy = endedBy
    outcome.budget = user.budget
    return outcome
  }

  private emit(action: AgentAction) {
    this.options.onAction?.(action)
  }
}
