import type { Good, UserId } from '../types'
import type { UtilityRow } from '../matrix/utility-matrix'
import { Stats } from '../core/stats'

/**
 *  A single user's mutable state. Budget and this tick's offers are reset at
 *  every tick boundary, consumption and utility persist for the whole run.
 */
export class User {
  budget: number
  readonly recommendedThisTick = new Set<Good>()
  readonly consumedGoods = new Set<Good>()
  actualUtility = 0
  /** best total utility reachable with as many consumptions as the user made */
  optimalUtility = 0

  constructor(readonly id: UserId, readonly utility: UtilityRow, readonly startingBudget: number) {
    this.budget = startingBudget
  }

  resetForTick(): void {
    this.budget = this.startingBudget
    this.recommendedThisTick.clear()
  }

  recordConsumption(good: Good): number {
    const trueUtility = this.utility.trueUtility(good)
    this.consumedGoods.add(good)
    this.actualUtility += trueUtility
    this.optimalUtility = Stats.sumOfLargest(this.utility.trueUtilities(), this.consumedGoods.size)
    return trueUtility
  }

  get consumedCount(): number {
    return this.consumedGoods.size
  }
}
