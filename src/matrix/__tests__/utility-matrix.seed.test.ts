import { describe, it, expect } from 'vitest'
import { Random } from '../../core/random'
import { UtilityMatrix, generateUtilityMatrix, generateUtilityRow } from '../utility-matrix'

const dist = { mean: 4, std: 2, expectationNoiseStd: 1 }

describe('UtilityMatrix – generation', () => {
  it('is bit identical for the same seed', () => {
    const a = generateUtilityMatrix(6, dist, new Random(11))
    const b = generateUtilityMatrix(6, dist, new Random(11))
    expect(a.toTables()).toEqual(b.toTables())
  })

  it('differs for another seed', () => {
    const a = generateUtilityMatrix(6, dist, new Random(11))
    const b = generateUtilityMatrix(6, dist, new Random(12))
    expect(a.toTables().trueUtility).not.toEqual(b.toTables().trueUtility)
  })

  it('expected equals true utility without expectation noise', () => {
    const m = generateUtilityMatrix(4, { mean: 4, std: 2, expectationNoiseStd: 0 }, new Random(3))
    const { trueUtility, expectedUtility } = m.toTables()
    expect(expectedUtility).toEqual(trueUtility)
  })

  it('zero deviation yields the mean everywhere', () => {
    const row = generateUtilityRow(3, { mean: 4, std: 0, expectationNoiseStd: 0 }, new Random(1))
    expect(Array.from(row.trueUtilities())).toEqual([4, 4, 4])
    expect(row.expectedUtility(2)).toBe(4)
  })

  it('from2D exposes rows', () => {
    const m = UtilityMatrix.from2D(
      [
        [1, 2],
        [3, 4],
      ],
      [
        [0, 0],
        [5, 6],
      ]
    )
    const row = m.row(1)
    expect(row.size).toBe(2)
    expect(row.trueUtility(0)).toBe(3)
    expect(row.expectedUtility(1)).toBe(6)
    expect(m.row(0).trueUtility(1)).toBe(2)
    expect(() => UtilityMatrix.from2D([[1, 2]])).toThrow()
  })
})
