import { describe, it, expect } from 'vitest'
import { Random } from '../../core/random'
import { ReviewMatrix } from '../../matrix/review-matrix'
import { UtilityMatrix } from '../../matrix/utility-matrix'
import { User } from '../../agents/user'
import { UserAgent } from '../../agents/user-agent'
import { consumptionRules, threeLevelReviews } from '../../recommender/strategies'
import { CollaborativeRecommender, RecommendationPolicy, type Recommender } from '../../recommender/policy'
import { SimilarityEngine, similarityStrategies } from '../../recommender/similarity'
import { TickScheduler, type TickProgress } from '../tick-scheduler'

const createAgent = () =>
  new UserAgent({
    prices: { searchPrice: 1, consumePrice: 5 },
    rule: consumptionRules.mean(4),
    review: threeLevelReviews({ mean: 4, std: 2, noiseStd: 0 }),
    rng: new Random(1),
  })

const utilities = UtilityMatrix.from2D([
  [9, 9, 9],
  [9, 9, 9],
  [9, 9, 9],
])

describe('TickScheduler – ordering', () => {
  it('runs users in ascending order and resets them every tick', () => {
    const reviews = new ReviewMatrix(3)
    const processed: number[] = []
    const ticks: TickProgress[] = []
    const nothing: Recommender = { name: 'nothing', recommend: () => null }
    const users = [2, 0, 1].map((id) => new User(id, utilities.row(id), 4))

    const summary = new TickScheduler(createAgent(), nothing, reviews, {
      onUserProcessed: (outcome) => processed.push(outcome.user),
      onTickEnd: (progress) => ticks.push(progress),
    }).run(users, 2)

    expect(processed).toEqual([0, 1, 2, 0, 1, 2])
    expect(summary.ticks).toBe(2)
    expect(summary.searches).toBe(6)
    expect(summary.outcomes.get(1)?.map((outcome) => outcome.budget)).toEqual([3, 3])
    expect(ticks).toEqual([
      { tick: 0, numberOfTicks: 2, usersProcessed: 3, reviewsWritten: 0 },
      { tick: 1, numberOfTicks: 2, usersProcessed: 3, reviewsWritten: 0 },
    ])
  })

  it('a review written earlier in the tick is visible to later users', () => {
    const reviews = new ReviewMatrix(3)
    const seen: boolean[] = []
    const recommender: Recommender = {
      name: 'first-come',
      recommend: ({ id, reviews: own }) => {
        if (id === 0 && !own.has(0)) return 0
        if (id === 1) seen.push(reviews.hasReview(0, 0))
        return null
      },
    }
    const users = [0, 1].map((id) => new User(id, utilities.row(id), 6))

    const summary = new TickScheduler(createAgent(), recommender, reviews).run(users, 2)

    expect(seen).toEqual([true, true])
    expect(summary.reviewsWritten).toBe(1)
    expect(summary.searches).toBe(4)
    expect(summary.outcomes.get(0)?.map((outcome) => outcome.endedBy)).toEqual(['insufficient-budget', 'no-candidate'])
  })

  it('a good rejected in one tick is offered again in the next', () => {
    const reviews = new ReviewMatrix(3)
    const picky = UtilityMatrix.from2D([
      [9, 1, 9],
      [9, 9, 9],
      [0, 0, 0],
    ])
    const agent = createAgent()
    const users = [0, 1].map((id) => new User(id, picky.row(id), 2))
    agent.replay(users[0], reviews, [0])
    agent.replay(users[1], reviews, [0, 1])

    const scale = { min: -1, max: 1, neutral: 0 }
    const recommender = new CollaborativeRecommender(
      reviews,
      new SimilarityEngine(similarityStrategies['shared-opinions'], scale),
      new RecommendationPolicy(scale),
      0
    )
    const summary = new TickScheduler(agent, recommender, reviews).run(users, 2)

    expect(summary.outcomes.get(0)?.map((outcome) => outcome.offered)).toEqual([[1], [1]])
    expect(summary.outcomes.get(0)?.map((outcome) => outcome.rejected)).toEqual([[1], [1]])
    expect(summary.outcomes.get(0)?.map((outcome) => outcome.endedBy)).toEqual(['no-candidate', 'no-candidate'])
    expect(summary.reviewsWritten).toBe(0)
  })

  it('zero ticks do nothing', () => {
    const summary = new TickScheduler(createAgent(), { name: 'nothing', recommend: () => null }, new ReviewMatrix(3)).run(
      [new User(0, utilities.row(0), 4)],
      0
    )
    expect(summary).toEqual({ ticks: 0, searches: 0, reviewsWritten: 0, outcomes: new Map([[0, []]]) })
  })
})
