import { describe, it, expect } from 'vitest'
import { Report } from '../report'
import { BASE_CONFIG } from '../../conf/experiment-config'

describe('Report', () => {
  it('userLine', () => {
    const line = Report.userLine({
      user: 3,
      reviews: [null, 1, 0, null, -1],
      reviewSum: 0,
      actualUtility: 12.34,
      optimalUtility: 15.06,
    })
    expect(line).toBe('User 3: [ · 1 0 · -1 ] = 0 → 12.3 (15.1)')
  })

  it('undefined metrics render as n/a', () => {
    expect(Report.metric('undefined')).toBe('n/a')
    expect(Report.metric(0.12345)).toBe('0.123')
    expect(Report.percent('undefined')).toBe('n/a')
    expect(Report.percent(0.5)).toBe('50%')
  })

  it('failed runs', () => {
    expect(Report.runSummary({ status: 'failed', runIndex: 2, seed: 22, reason: 'boom' })).toEqual([
      'run 2 (seed 22) failed: boom',
    ])
  })

  it('metric lines are aligned', () => {
    expect(Report.metricLines({ a: 1, bbb: 'undefined' })).toEqual(['a    1', 'bbb  n/a'])
  })

  it('experimentSummary', () => {
    expect(
      Report.experimentSummary({
        config: { ...BASE_CONFIG, MESSAGE: 'demo' },
        runs: [],
        completed: 0,
        failed: 0,
        averages: { x: 2 },
      })
    ).toEqual(['"demo": 0 completed, 0 failed', 'x  2'])
  })
})
