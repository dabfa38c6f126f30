import type { Metric } from '../types'
import type { ColdStartAnalysis } from './cold-start'
import type { PopulationAnalysis } from './population'
import type { PopularityUsage } from './popularity'

export type MetricRecord = Record<string, Metric>

const usageMetrics = (prefix: string, tiers: PopularityUsage[]): MetricRecord => {
  return tiers.reduce<MetricRecord>((record, usage) => {
    const key = `${prefix}.top${usage.size}`
    return {
      ...record,
      [`${key}.usingAny`]: usage.usingAny,
      [`${key}.usingAnyAllPositive`]: usage.usingAnyAllPositive,
      [`${key}.usingAnyNotAllPositive`]: usage.usingAnyNotAllPositive,
      [`${key}.usingAll`]: usage.usingAll,
    }
  }, {})
}

/**
 *  Flat `metric name -> value` record of everything a run measured.
 */
export function flattenMetrics(population: PopulationAnalysis, coldStart: ColdStartAnalysis): MetricRecord {
  return {
    'population.totalMaxUtility': population.totalMaxUtility,
    'population.totalActualUtility': population.totalActualUtility,
    'population.percentReceived': population.percentReceived,
    'population.wellServedFraction': population.wellServedFraction,
    'population.usersWithoutConsumption': population.usersWithoutConsumption,
    'population.usersWithUndefinedRatio': population.usersWithUndefinedRatio,
    'population.optimalUserCount': population.optimalUserCount,
    ...usageMetrics('popularity', population.popularity),
    ...usageMetrics('optimalUsers', population.optimalUserPopularity),
    ...usageMetrics('oracle', population.oraclePopularity),
    'coldStart.topNConsumedFraction': coldStart.topNConsumedFraction,
    'coldStart.topRecommendations': coldStart.topRecommendations,
    'coldStart.bottomRecommendations': coldStart.bottomRecommendations,
    'coldStart.topVsBottomRatio': coldStart.topVsBottomRatio,
    'coldStart.averageOptimalUtility': coldStart.averageOptimalUtility,
    'coldStart.averagePopularUtility': coldStart.averagePopularUtility,
    'coldStart.averageActualUtility': coldStart.averageActualUtility,
    'coldStart.averageControlUtility': coldStart.averageControlUtility,
    'coldStart.advantageOverControl': coldStart.advantageOverControl,
  }
}
