/** @file tick-scheduler.ts */

import type { ReviewStore, UserId } from '../types'
import type { User } from '../agents/user'
import type { TickOutcome, UserAgent } from '../agents/user-agent'
import type { Recommender } from '../recommender/policy'

export type TickProgress = {
  tick: number
  numberOfTicks: number
  usersProcessed: number
  reviewsWritten: number
}

export interface SchedulerHooks {
  onTickStart?(progress: TickProgress): void
  onUserProcessed?(outcome: TickOutcome, progress: TickProgress): void
  onTickEnd?(progress: TickProgress): void
}

export type SchedulerSummary = {
  ticks: number
  searches: number
  reviewsWritten: number
  outcomes: Map<UserId, TickOutcome[]>
}

/**
 *  ## TickScheduler
 *
 *  Drives every user through a fixed number of ticks. Users run one after the
 *  other in ascending index order so each one sees the reviews written by
 *  the users before it in the same tick; that ordering is part of the
 *  experiment and must not be parallelised away.
 */
export class TickScheduler {
  constructor(
    private readonly agent: UserAgent,
    private readonly recommender: Recommender,
    private readonly reviews: ReviewStore,
    private readonly hooks: SchedulerHooks = {}
  ) {}

  run(users: readonly User[], numberOfTicks: number): SchedulerSummary {
    const ordered = [...users].sort((a, b) => a.id - b.id)
    const summary: SchedulerSummary = {
      ticks: 0,
      searches: 0,
      reviewsWritten: 0,
      outcomes: new Map(ordered.map((user): [UserId, TickOutcome[]] => [user.id, []])),
    }

    for (let tick = 0; tick < numberOfTicks; tick++) {
      ordered.forEach((user) => user.resetForTick())

      const progress: TickProgress = { tick, numberOfTicks, usersProcessed: 0, reviewsWritten: 0 }
      this.hooks.onTickStart?.({ ...progress })

      for (const user of ordered) {
        const outcome = this.agent.runTick(user, this.recommender, this.reviews)
        summary.outcomes.get(user.id)?.push(outcome)
        summary.searches += outcome.searches
        progress.usersProcessed++
        progress.reviewsWritten += outcome.consumed.length
        this.hooks.onUserProcessed?.(outcome, { ...progress })
      }

      summary.ticks++
      summary.reviewsWritten += progress.reviewsWritten
      this.hooks.onTickEnd?.({ ...progress })
    }

    return summary
  }
}
