import type { Metric } from '../types'
import { Stats } from '../core/stats'
import type { MetricRecord } from '../analysis/metrics'
import type { CompletedRun, ExperimentSummary, RunRecord, UserReviewLine } from '../simulation/experiment'

/**
 *  ## Report
 *
 *  Plain text renderers for run results, nothing here changes state.
 */
export namespace Report {
  export const ABSENT = '·'
  export const NOT_AVAILABLE = 'n/a'

  export function metric(value: Metric, places = 1000): string {
    return Stats.isDefined(value) ? String(Stats.round(value, places)) : NOT_AVAILABLE
  }

  export function percent(value: Metric): string {
    return Stats.isDefined(value) ? `${Stats.percent(value, 1)}%` : NOT_AVAILABLE
  }

  /**
   * `User 3: [ · 1 0 · -1 ] = 0 → 12.3 (15.1)`
   */
  export function userLine(line: UserReviewLine): string {
    const reviews = line.reviews.map((score) => (score === null ? ABSENT : String(score))).join(' ')
    const actual = Stats.round(line.actualUtility)
    const optimal = Stats.round(line.optimalUtility)
    return `User ${line.user}: [ ${reviews} ] = ${line.reviewSum} → ${actual} (${optimal})`
  }

  export function runSummary(run: RunRecord): string[] {
    if (run.status === 'failed') {
      return [`run ${run.runIndex} (seed ${run.seed}) failed: ${run.reason}`]
    }
    return completedRunSummary(run)
  }

  const completedRunSummary = (run: CompletedRun): string[] => {
    const { population, coldStart } = run
    const topOne = population.popularity[0]
    return [
      `run ${run.runIndex} (seed ${run.seed}): ${run.reviewsWritten} reviews from ${run.searches} searches, ${run.onboardingReviews} onboarding`,
      `  utility received: ${metric(population.totalActualUtility)} of ${metric(population.totalMaxUtility)} (${percent(population.percentReceived)})`,
      `  well served: ${population.wellServedCount} users (${percent(population.wellServedFraction)}), ${population.usersWithUndefinedRatio} undefined`,
      `  most popular good used by: ${topOne ? percent(topOne.usingAny) : NOT_AVAILABLE}`,
      `  cold start: actual ${metric(coldStart.averageActualUtility)} vs control ${metric(coldStart.averageControlUtility)}, top/bottom offers ${metric(coldStart.topVsBottomRatio)}`,
    ]
  }

  export function metricLines(record: MetricRecord): string[] {
    const width = Math.max(0, ...Object.keys(record).map((name) => name.length))
    return Object.entries(record).map(([name, value]) => `${name.padEnd(width)}  ${metric(value)}`)
  }

  export function experimentSummary(summary: ExperimentSummary): string[] {
    return [
      `"${summary.config.MESSAGE}": ${summary.completed} completed, ${summary.failed} failed`,
      ...metricLines(summary.averages),
    ]
  }
}
