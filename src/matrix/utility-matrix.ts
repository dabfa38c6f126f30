/** @file utility-matrix.ts */

import type { Good, Table } from '../types'
import type { Random } from '../core/random'
import { Matrix } from './matrix'

export type UtilityDistribution = {
  mean: number
  std: number
  expectationNoiseStd: number
}

/**
 *  One user's hidden utilities, the agent only ever looks at the expected value
 *  before consuming.
 */
export interface UtilityRow {
  readonly size: number
  trueUtility(good: Good): number
  expectedUtility(good: Good): number
  trueUtilities(): Float64Array
}

class MatrixUtilityRow implements UtilityRow {
  constructor(private readonly trueRow: Float64Array, private readonly expectedRow: Float64Array) {}

  get size() {
    return this.trueRow.length
  }

  trueUtility(good: Good): number {
    return this.trueRow[good]
  }

  expectedUtility(good: Good): number {
    return this.expectedRow[good]
  }

  trueUtilities(): Float64Array {
    return this.trueRow.slice()
  }
}

/**
 * Draws a single (true, expected) utility pair.
 */
const drawUtility = (rng: Random, dist: UtilityDistribution): [number, number] => {
  const trueUtility = rng.normal(dist.mean, dist.std)
  const expectedUtility = trueUtility + rng.normal(0, dist.expectationNoiseStd)
  return [trueUtility, expectedUtility]
}

/**
 *  ## UtilityMatrix
 *
 *  Dense (user x good) table of true and expected utility, generated once
 *  at the start of a run and never written again.
 */
export class UtilityMatrix {
  private constructor(private readonly trueValues: Matrix, private readonly expectedValues: Matrix) {}

  static generate(size: number, dist: UtilityDistribution, rng: Random): UtilityMatrix {
    const trueValues = new Matrix(size, size)
    const expectedValues = new Matrix(size, size)
    for (let i = 0; i < trueValues.data.length; i++) {
      const [trueUtility, expectedUtility] = drawUtility(rng, dist)
      trueValues.data[i] = trueUtility
      expectedValues.data[i] = expectedUtility
    }
    return new UtilityMatrix(trueValues, expectedValues)
  }

  /**
   * Build from explicit tables, expected defaults to the true utilities.
   */
  static from2D(trueValues: number[][], expectedValues: number[][] = trueValues): UtilityMatrix {
    const t = Matrix.from2D(trueValues)
    const e = Matrix.from2D(expectedValues)
    if (t.rows !== t.cols || e.rows !== t.rows || e.cols !== t.cols) {
      throw new Error(`UtilityMatrix: expected two square tables of the same size`)
    }
    return new UtilityMatrix(t, e)
  }

  row(user: number): UtilityRow {
    return new MatrixUtilityRow(this.trueValues.row(user), this.expectedValues.row(user))
  }

  toTables(): { trueUtility: Table; expectedUtility: Table } {
    return {
      trueUtility: this.trueValues.to2D(),
      expectedUtility: this.expectedValues.to2D(),
    }
  }
}

/**
 *  Fresh utility row for a synthetic user, drawn from the same distribution.
 */
export function generateUtilityRow(size: number, dist: UtilityDistribution, rng: Random): UtilityRow {
  const trueRow = new Float64Array(size)
  const expectedRow = new Float64Array(size)
  for (let good = 0; good < size; good++) {
    ;[trueRow[good], expectedRow[good]] = drawUtility(rng, dist)
  }
  return new MatrixUtilityRow(trueRow, expectedRow)
}

export function generateUtilityMatrix(size: number, dist: UtilityDistribution, rng: Random): UtilityMatrix {
  return UtilityMatrix.generate(size, dist, rng)
}
