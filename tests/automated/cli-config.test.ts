/**
 * AUTOMATED TEST SUITE: CLI Config Store
 * Credential refusal, key checks and validation before anything is written
 */
import { describe, it, expect, vi, beforeEach } from 'vitest'
import { HarnessConfigError } from '@loopwatch/harness-core'
import { config } from '../../apps/loopwatch-cli/src/config'

vi.mock('conf', () => ({
  default: class {
    store: Record<string, unknown> = {}
    path = 'memory://loopwatch/config.json'
    set(patch: Record<string, unknown>) { Object.assign(this.store, patch) }
    clear() { this.store = {} }
  },
}))

describe('config store', () => {
  beforeEach(() => { config.reset() })

  it('refuses API keys and other credentials', () => {
    expect(() => config.set('agent_api_key', 'test-secret')).toThrow(
      'Credentials are not stored. Set LOOPWATCH_AGENT_API_KEY in the environment instead.'
    )
    expect(() => config.set('token', 'test-secret')).toThrow(HarnessConfigError)
    expect(config.stored).toEqual({})
  })

  it('persists a parsed value for a known key', () => {
    expect(config.set('timeout_ms', '5000')).toEqual({ timeout_ms: 5_000 })
    expect(config.set('simulate', 'yes')).toEqual({ simulate: true })
    expect(config.stored).toEqual({ timeout_ms: 5_000, simulate: true })
  })

  it('rejects unknown keys and invalid values without writing', () => {
    expect(() => config.set('colour', 'red')).toThrow('Unknown setting "colour". Run: loopwatch config show')
    expect(() => config.set('sample_interval_ms', '5'))
      .toThrow('Invalid settings: sample_interval_ms must be between 10 and 60000')
    expect(config.stored).toEqual({})
  })
})
