/**
 * @loopwatch/harness-core — Settings
 *
 * Four layers, later layers win:
 *   1. built-in defaults
 *   2. the persisted CLI config (conf store)
 *   3. LOOPWATCH_* environment variables
 *   4. command-line flags
 *
 * The agent API key is the exception: it only ever comes from the
 * environment (LOOPWATCH_AGENT_API_KEY) and is never persisted.
 */

import type { EvaluationMode } from '@loopwatch/types'
import { assertFinite, assertString, ValidationError } from '@loopwatch/run-store'

export interface HarnessSettings {
  results_dir: string
  sample_interval_ms: number
  timeout_ms: number
  runs_per_scenario: number
  simulate: boolean
  agent_host: string
  request_timeout_ms: number
  gpu_index: number
  expected_normal_duration_ms: number
  spike_threshold_pct: number
  retry_spike_min: number
  loop_duration_ratio: number
  evaluation_mode: EvaluationMode
  accuracy_target: number
  latency_target_ms: number
  min_runs_per_scenario: number
  agent_api_key?: string
}

export type PersistedSettings = Omit<HarnessSettings, 'agent_api_key'>
export type StoredSettings = Partial<PersistedSettings>

export const DEFAULT_SETTINGS: PersistedSettings = {
  results_dir:                 'results',
  sample_interval_ms:          100,
  timeout_ms:                  30_000,
  runs_per_scenario:           3,
  simulate:                    false,
  agent_host:                  'http://localhost',
  request_timeout_ms:          10_000,
  gpu_index:                   0,
  expected_normal_duration_ms: 1_500,
  spike_threshold_pct:         50,
  retry_spike_min:             4,
  loop_duration_ratio:         3,
  evaluation_mode:             'POOLED',
  accuracy_target:             0.8,
  latency_target_ms:           10_000,
  min_runs_per_scenario:       1,
}

export class HarnessConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'HarnessConfigError'
  }
}

// ─── Keys ─────────────────────────────────────────────────────────────────────

type NumericKey = {
  [K in keyof PersistedSettings]: PersistedSettings[K] extends number ? K : never
}[keyof PersistedSettings]

export type SettingKey = keyof PersistedSettings

const NUMERIC_RANGES: Record<NumericKey, readonly [number, number]> = {
  sample_interval_ms:          [10, 60_000],
  timeout_ms:                  [100, 3_600_000],
  runs_per_scenario:           [1, 1_000],
  request_timeout_ms:          [100, 600_000],
  gpu_index:                   [0, 64],
  expected_normal_duration_ms: [1, 3_600_000],
  spike_threshold_pct:         [0, 100],
  retry_spike_min:             [1, 1_000],
  loop_duration_ratio:         [1, 1_000],
  accuracy_target:             [0, 1],
  latency_target_ms:           [1, 3_600_000],
  min_runs_per_scenario:       [1, 1_000],
}

export const SETTING_KEYS: readonly SettingKey[] = [
  'results_dir',
  'simulate',
  'agent_host',
  'evaluation_mode',
  ...Object.keys(NUMERIC_RANGES).filter(isNumericKey),
]

function isNumericKey(key: string): key is NumericKey {
  return Object.prototype.hasOwnProperty.call(NUMERIC_RANGES, key)
}

export function isSettingKey(key: string): key is SettingKey {
  return SETTING_KEYS.some(k => k === key)
}

export function envName(key: SettingKey | 'agent_api_key'): string {
  return `LOOPWATCH_${key.toUpperCase()}`
}

// ─── Parsing ──────────────────────────────────────────────────────────────────

/**
 * Parse raw string values (env vars, flags, `config set`) into a typed layer.
 * Unknown or absent keys are left out.
 */
export function parseLayer(
  get: (key: SettingKey) => string | undefined,
  source: string
): StoredSettings {
  const layer: StoredSettings = {}

  const results_dir = get('results_dir')
  if (results_dir !== undefined) layer.results_dir = results_dir

  const agent_host = get('agent_host')
  if (agent_host !== undefined) layer.agent_host = agent_host

  const simulate = get('simulate')
  if (simulate !== undefined) {
    const v = simulate.trim().toLowerCase()
    if (!['1', '0', 'true', 'false', 'yes', 'no'].includes(v)) {
      throw new HarnessConfigError(`${source}: simulate must be true or false, got "${simulate}"`)
    }
    layer.simulate = v === '1' || v === 'true' || v === 'yes'
  }

  const mode = get('evaluation_mode')
  if (mode !== undefined) {
    const v = mode.trim().toUpperCase()
    if (v !== 'POOLED' && v !== 'PER_SCENARIO') {
      throw new HarnessConfigError(`${source}: evaluation_mode must be pooled or per_scenario, got "${mode}"`)
    }
    layer.evaluation_mode = v
  }

  for (const key of Object.keys(NUMERIC_RANGES).filter(isNumericKey)) {
    const raw = get(key)
    if (raw === undefined) continue
    const value = Number(raw)
    if (raw.trim() === '' || !Number.isFinite(value)) {
      throw new HarnessConfigError(`${source}: ${key} must be a number, got "${raw}"`)
    }
    layer[key] = value
  }

  return layer
}

export function envLayer(env: Record<string, string | undefined>): StoredSettings {
  return parseLayer(key => env[envName(key)], 'environment')
}

// ─── Resolution ───────────────────────────────────────────────────────────────

function merge(base: PersistedSettings, layer: StoredSettings): PersistedSettings {
  return {
    results_dir:                 layer.results_dir                 ?? base.results_dir,
    sample_interval_ms:          layer.sample_interval_ms          ?? base.sample_interval_ms,
    timeout_ms:                  layer.timeout_ms                  ?? base.timeout_ms,
    runs_per_scenario:           layer.runs_per_scenario           ?? base.runs_per_scenario,
    simulate:                    layer.simulate                    ?? base.simulate,
    agent_host:                  layer.agent_host                  ?? base.agent_host,
    request_timeout_ms:          layer.request_timeout_ms          ?? base.request_timeout_ms,
    gpu_index:                   layer.gpu_index                   ?? base.gpu_index,
    expected_normal_duration_ms: layer.expected_normal_duration_ms ?? base.expected_normal_duration_ms,
    spike_threshold_pct:         layer.spike_threshold_pct         ?? base.spike_threshold_pct,
    retry_spike_min:             layer.retry_spike_min             ?? base.retry_spike_min,
    loop_duration_ratio:         layer.loop_duration_ratio         ?? base.loop_duration_ratio,
    evaluation_mode:             layer.evaluation_mode             ?? base.evaluation_mode,
    accuracy_target:             layer.accuracy_target             ?? base.accuracy_target,
    latency_target_ms:           layer.latency_target_ms           ?? base.latency_target_ms,
    min_runs_per_scenario:       layer.min_runs_per_scenario       ?? base.min_runs_per_scenario,
  }
}

// Counts and device indexes
const WHOLE_NUMBER_KEYS: readonly NumericKey[] = [
  'runs_per_scenario',
  'gpu_index',
  'retry_spike_min',
  'min_runs_per_scenario',
]

export function validateSettings(settings: PersistedSettings): void {
  try {
    assertString(settings.results_dir, 'results_dir', 1024)
    assertString(settings.agent_host, 'agent_host', 1024)
    if (!/^https?:\/\//.test(settings.agent_host)) {
      throw new ValidationError('agent_host must start with http:// or https://')
    }
    if (typeof settings.simulate !== 'boolean') {
      throw new ValidationError('simulate must be a boolean')
    }
    if (settings.evaluation_mode !== 'POOLED' && settings.evaluation_mode !== 'PER_SCENARIO') {
      throw new ValidationError('evaluation_mode must be POOLED or PER_SCENARIO')
    }
    for (const key of Object.keys(NUMERIC_RANGES).filter(isNumericKey)) {
      const [min, max] = NUMERIC_RANGES[key]
      assertFinite(settings[key], key, min, max)
      if (WHOLE_NUMBER_KEYS.includes(key) && !Number.isInteger(settings[key])) {
        throw new ValidationError(`${key} must be a whole number`)
      }
    }
    if (settings.timeout_ms <= settings.sample_interval_ms) {
      throw new ValidationError('timeout_ms must be longer than sample_interval_ms')
    }
  } catch (err) {
    if (err instanceof ValidationError) throw new HarnessConfigError(`Invalid settings: ${err.message}`)
    throw err
  }
}

export function resolveSettings(
  stored: StoredSettings,
  env: Record<string, string | undefined>,
  overrides: StoredSettings = {}
): HarnessSettings {
  const resolved = [stored, envLayer(env), overrides].reduce(merge, DEFAULT_SETTINGS)
  validateSettings(resolved)

  const api_key = env[envName('agent_api_key')]
  return api_key ? { ...resolved, agent_api_key: api_key } : resolved
}
