import type { Metric } from '../types'

/**
 *  A collection of useful statistical methods and helpers for computing metrics.
 */
export namespace Stats {
  /**
   * Marker stored in place of a ratio whose denominator is zero.
   */
  export const UNDEFINED = 'undefined' as const

  /**
   * Calculate the average (mean) value of an array.
   */
  export function average(items: number[]): number {
    if (!items || items.length === 0) return 0
    return items.reduce((total, current) => total + current, 0) / items.length
  }

  /**
   * Sum all values in array.
   */
  export function sum(nums: Iterable<number>): number {
    let total = 0
    for (const num of nums) total += num
    return total
  }

  /**
   * Divide two numbers, a zero denominator yields the undefined marker
   * instead of `NaN` or `Infinity`.
   */
  export function ratio(numerator: number, denominator: number): Metric {
    if (denominator === 0) return UNDEFINED
    return numerator / denominator
  }

  /**
   * Average of the metrics which are defined, undefined if none are.
   */
  export function averageDefined(metrics: Metric[]): Metric {
    const defined = metrics.filter(isDefined)
    if (defined.length === 0) return UNDEFINED
    return average(defined)
  }

  export function isDefined(metric: Metric): metric is number {
    return metric !== UNDEFINED
  }

  /**
   * Sum of the `count` largest values.
   */
  export function sumOfLargest(nums: ArrayLike<number>, count: number): number {
    if (count <= 0) return 0
    const sorted = Array.from(nums).sort((a, b) => b - a)
    return sum(sorted.slice(0, count))
  }

  /**
   * Round the number to the specified places.
   */
  export function round(num: number, places = 10): number {
    return Math.round(num * places) / places
  }

  /**
   * Convert a decimal to a percentage with specified decimal places.
   */
  export function percent(num: number, decimalPlaces = 0): number {
    const multiplier = Math.pow(10, decimalPlaces + 2) // +2 for percentage
    return Math.round(num * multiplier) / Math.pow(10, decimalPlaces)
  }

  /**
   * Clamp a number between min and max values.
   */
  export function clamp(value: number, min: number, max: number): number {
    return Math.max(min, Math.min(value, max))
  }
}
