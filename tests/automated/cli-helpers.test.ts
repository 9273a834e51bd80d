/**
 * AUTOMATED TEST SUITE: CLI Helpers
 * Table layout, duration formatting and scenario flag parsing
 */
import { describe, it, expect } from 'vitest'
import { ScenarioKind } from '@loopwatch/types'
import {
  fmtMs,
  parseScenarioChoice,
  renderTable,
  summaryRows,
  visibleLength,
} from '../../apps/loopwatch-cli/src/helpers'

describe('renderTable', () => {
  it('pads columns to the widest cell plus two', () => {
    expect(renderTable([['A', 'Bb'], ['xyz', '1']])).toEqual([
      'A    Bb',
      '─────────',
      'xyz  1',
    ])
  })

  it('ignores colour codes when measuring cells', () => {
    expect(visibleLength('\x1b[32mCOMPLETED\x1b[39m')).toBe(9)
    expect(renderTable([['S', 'N'], ['\x1b[31mFAILED\x1b[39m', '2']])[2]).toBe('\x1b[31mFAILED\x1b[39m  2')
  })

  it('renders nothing without data rows', () => {
    expect(renderTable([['only', 'headers']])).toEqual([])
  })
})

describe('fmtMs', () => {
  it('switches to seconds at one second', () => {
    expect(fmtMs(null)).toBe('—')
    expect(fmtMs(999.6)).toBe('1000ms')
    expect(fmtMs(1_000)).toBe('1.0s')
    expect(fmtMs(30_000)).toBe('30.0s')
  })
})

describe('summaryRows', () => {
  it('formats one row per scenario', () => {
    const rows = summaryRows([{
      scenario: ScenarioKind.RETRY_STORM, total: 3, successes: 0, failures: 3,
      timed_out: 0, failed: 0, avg_duration_ms: 3_640, avg_steps: 16,
    }])
    expect(rows[1]).toEqual(['RETRY_STORM', '3', '0', '3', '0', '3.6s', '16.0'])
  })
})

describe('parseScenarioChoice', () => {
  it('expands all and matches names case-insensitively', () => {
    expect(parseScenarioChoice('all')).toEqual([
      ScenarioKind.NORMAL, ScenarioKind.INFINITE_LOOP, ScenarioKind.RETRY_STORM,
    ])
    expect(parseScenarioChoice(' retry_storm ')).toEqual([ScenarioKind.RETRY_STORM])
    expect(parseScenarioChoice('loop')).toBeNull()
  })
})
