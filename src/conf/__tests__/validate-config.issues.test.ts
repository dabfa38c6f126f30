import { describe, it, expect } from 'vitest'
import { BASE_CONFIG, PRESETS, isPresetName } from '../experiment-config'
import { validateConfig } from '../validate-config'
import { ConfigurationError } from '../../core/errors'

const issuesOf = (config: unknown): string[] => {
  try {
    validateConfig(config)
    return []
  } catch (e) {
    if (e instanceof ConfigurationError) return e.issues
    throw e
  }
}

describe('validateConfig', () => {
  it('accepts the defaults and every preset', () => {
    expect(validateConfig(BASE_CONFIG)).toEqual(BASE_CONFIG)
    Object.values(PRESETS).forEach((preset) => expect(issuesOf(preset)).toEqual([]))
  })

  it('top N cannot exceed the number of goods', () => {
    expect(issuesOf({ ...BASE_CONFIG, TOP_N_SIZE: 21 })).toEqual(['TOP_N_SIZE: must not exceed MATRIX_SIZE (20)'])
  })

  it('a single good is valid with the default onboarding', () => {
    expect(issuesOf({ ...BASE_CONFIG, MATRIX_SIZE: 1, TOP_N_SIZE: 1 })).toEqual([])
    expect(issuesOf({ ...BASE_CONFIG, NEW_USER_SEED_REVIEWS: 0 })).toEqual([])
    expect(issuesOf({ ...BASE_CONFIG, NEW_USER_SEED_REVIEWS: -1 })).toEqual([
      'NEW_USER_SEED_REVIEWS: Number must be greater than or equal to 0',
    ])
  })

  it('matrix size is capped at 500', () => {
    expect(issuesOf({ ...BASE_CONFIG, MATRIX_SIZE: 500 })).toEqual([])
    expect(issuesOf({ ...BASE_CONFIG, MATRIX_SIZE: 501 })).toEqual(['MATRIX_SIZE: Number must be less than or equal to 500'])
  })

  it('a neighbourhood of 0 listens to everyone', () => {
    expect(BASE_CONFIG.NEIGHBORHOOD_SIZE).toBe(0)
    expect(issuesOf({ ...BASE_CONFIG, NEIGHBORHOOD_SIZE: 3 })).toEqual([])
    expect(issuesOf({ ...BASE_CONFIG, NEIGHBORHOOD_SIZE: -1 })).toEqual([
      'NEIGHBORHOOD_SIZE: Number must be greater than or equal to 0',
    ])
  })

  it('review scale is three level or at least two points', () => {
    expect(issuesOf({ ...BASE_CONFIG, REVIEW_SCALE: 1 })).toEqual(['REVIEW_SCALE: must be 0 (three level) or at least 2'])
    expect(issuesOf({ ...BASE_CONFIG, REVIEW_SCALE: 7 })).toEqual([])
  })

  it('collects every out of range parameter', () => {
    const issues = issuesOf({ ...BASE_CONFIG, MATRIX_SIZE: -1, WELL_SERVED_THRESHOLD: 2, UTILITY_STD: -1 })
    expect(issues.some((issue) => issue.startsWith('MATRIX_SIZE: '))).toBe(true)
    expect(issues.some((issue) => issue.startsWith('WELL_SERVED_THRESHOLD: '))).toBe(true)
    expect(issues.some((issue) => issue.startsWith('UTILITY_STD: '))).toBe(true)
  })

  it('rejects unknown keys and bad names', () => {
    expect(issuesOf({ ...BASE_CONFIG, FOO: 1 })).toHaveLength(1)
    expect(issuesOf({ ...BASE_CONFIG, SIMILARITY: 'cosine' })[0]).toMatch(/^SIMILARITY: /)
  })

  it('throws a single error naming the code', () => {
    expect(() => validateConfig({ ...BASE_CONFIG, SEARCH_PRICE: 0 })).toThrow(/^INVALID_CONFIGURATION: SEARCH_PRICE: /)
  })
})

describe('presets', () => {
  it('isPresetName only knows the declared presets', () => {
    expect(isPresetName('eager')).toBe(true)
    expect(isPresetName('five-star')).toBe(true)
    expect(isPresetName('toString')).toBe(false)
  })
})
