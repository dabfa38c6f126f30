/** @file strategies.ts */

import type { ConsumeRuleName, ExperimentConfig } from '../conf/experiment-config'
import type { Random } from '../core/random'
import { Stats } from '../core/stats'

export type ReviewScale = {
  readonly min: number
  readonly max: number
  /** scores strictly above this are positive, strictly below negative */
  readonly neutral: number
}

/**
 *  Turns the true utility of a consumed good into a review score.
 */
export interface ReviewStrategy {
  readonly name: string
  readonly scale: ReviewScale
  score(trueUtility: number, rng: Random): number
}

/**
 *  Decides whether a recommended good is worth consuming.
 */
export interface ConsumptionRule {
  readonly name: string
  shouldConsume(expectedUtility: number): boolean
}

export type ReviewParams = {
  mean: number
  std: number
  noiseStd: number
}

/**
 * Like (+1) above one deviation from the mean, dislike (-1) below, otherwise neutral (0).
 */
export function threeLevelReviews({ mean, std, noiseStd }: ReviewParams): ReviewStrategy {
  return {
    name: 'three-level',
    scale: { min: -1, max: 1, neutral: 0 },
    score(trueUtility, rng) {
      const perceived = trueUtility + rng.normal(0, noiseStd)
      if (perceived > mean + std) return 1
      if (perceived < mean - std) return -1
      return 0
    },
  }
}

/**
 * Integer ratings 1..size centred on the midpoint, two deviations span half the scale.
 */
export function scaledReviews(size: number, { mean, std, noiseStd }: ReviewParams): ReviewStrategy {
  const neutral = (size + 1) / 2
  return {
    name: `scale-${size}`,
    scale: { min: 1, max: size, neutral },
    score(trueUtility, rng) {
      const perceived = trueUtility + rng.normal(0, noiseStd)
      const z = std === 0 ? Math.sign(perceived - mean) : (perceived - mean) / std
      return Stats.clamp(Math.round(neutral + (z * (size - 1)) / 4), 1, size)
    },
  }
}

export const consumptionRules = {
  mean: (mean: number): ConsumptionRule => ({
    name: 'mean',
    shouldConsume: (expected) => expected >= mean,
  }),
  positive: (): ConsumptionRule => ({
    name: 'positive',
    shouldConsume: (expected) => expected > 0,
  }),
  cutoff: (cutoff: number): ConsumptionRule => ({
    name: 'cutoff',
    shouldConsume: (expected) => expected >= cutoff,
  }),
}

export function createReviewStrategy(config: ExperimentConfig): ReviewStrategy {
  const params: ReviewParams = {
    mean: config.UTILITY_MEAN,
    std: config.UTILITY_STD,
    noiseStd: config.REVIEW_NOISE_STD,
  }
  return config.REVIEW_SCALE === 0 ? threeLevelReviews(params) : scaledReviews(config.REVIEW_SCALE, params)
}

export function createConsumptionRule(config: ExperimentConfig): ConsumptionRule {
  const rule: ConsumeRuleName = config.CONSUME_RULE
  switch (rule) {
    case 'mean':
      return consumptionRules.mean(config.UTILITY_MEAN)
    case 'positive':
      return consumptionRules.positive()
    case 'cutoff':
      return consumptionRules.cutoff(config.CONSUME_CUTOFF)
  }
}
