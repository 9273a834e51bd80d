/**
 * @loopwatch/run-store — Record Validation
 *
 * Persisted runs come back as untyped JSON. These assertions rebuild the
 * typed records field by field and name the first field that is wrong.
 */

import {
  ALL_SCENARIOS,
  type CompletionStatus,
  type DetectionResult,
  type DetectionVerdict,
  type RunFeatures,
  type RunRecord,
  type ScenarioKind,
  type TelemetrySample,
} from '@loopwatch/types'

export class ValidationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ValidationError'
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function assertFinite(
  value: unknown,
  name: string,
  min = -Infinity,
  max = Infinity
): asserts value is number {
  if (typeof value !== 'number' || !isFinite(value)) {
    throw new ValidationError(`${name} must be a finite number`)
  }
  if (value < min || value > max) {
    throw new ValidationError(`${name} must be between ${min} and ${max}`)
  }
}

export function assertString(
  value: unknown,
  name: string,
  max_len = 4096
): asserts value is string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ValidationError(`${name} must be a non-empty string`)
  }
  if (value.length > max_len) {
    throw new ValidationError(`${name} must be at most ${max_len} characters`)
  }
}

export function assertBoolean(value: unknown, name: string): asserts value is boolean {
  if (typeof value !== 'boolean') throw new ValidationError(`${name} must be a boolean`)
}

export function assertOneOf<T extends string>(
  value: unknown,
  name: string,
  allowed: readonly T[]
): asserts value is T {
  if (!allowed.some(a => a === value)) {
    throw new ValidationError(`${name} must be one of ${allowed.join(', ')}`)
  }
}

function field(obj: Record<string, unknown>, key: string, name: string): Record<string, unknown> {
  const value = obj[key]
  if (!isRecord(value)) throw new ValidationError(`${name}.${key} must be an object`)
  return value
}

function list(obj: Record<string, unknown>, key: string, name: string): unknown[] {
  const value = obj[key]
  if (!Array.isArray(value)) throw new ValidationError(`${name}.${key} must be an array`)
  return value
}

function finiteOrNull(value: unknown, name: string): number | null {
  if (value === null) return null
  assertFinite(value, name)
  return value
}

const STATUSES: readonly CompletionStatus[] = ['COMPLETED', 'TIMED_OUT', 'FAILED']
const VERDICTS: readonly DetectionVerdict[] = [
  'TRUE_POSITIVE', 'TRUE_NEGATIVE', 'FALSE_POSITIVE', 'FALSE_NEGATIVE',
]

// ─── Run Record ───────────────────────────────────────────────────────────────

function parseSample(raw: unknown, name: string): TelemetrySample {
  if (!isRecord(raw)) throw new ValidationError(`${name} must be an object`)
  const { timestamp, elapsed_ms, gpu_utilization_pct, gpu_memory_used_mb } = raw
  assertFinite(timestamp,           `${name}.timestamp`, 0)
  assertFinite(elapsed_ms,          `${name}.elapsed_ms`, 0)
  assertFinite(gpu_utilization_pct, `${name}.gpu_utilization_pct`, 0, 100)
  assertFinite(gpu_memory_used_mb,  `${name}.gpu_memory_used_mb`, 0)
  return Object.freeze({ timestamp, elapsed_ms, gpu_utilization_pct, gpu_memory_used_mb })
}

export function parseRunRecord(raw: unknown, name = 'run'): RunRecord {
  if (!isRecord(raw)) throw new ValidationError(`${name} must be an object`)

  const { run_id, scenario, status, started_at, ended_at, duration_ms,
          sample_interval_ms, timeout_ms, failed_ticks } = raw
  assertString(run_id, `${name}.run_id`, 128)
  assertOneOf<ScenarioKind>(scenario, `${name}.scenario`, ALL_SCENARIOS)
  assertOneOf(status, `${name}.status`, STATUSES)
  assertFinite(started_at,         `${name}.started_at`, 0)
  assertFinite(ended_at,           `${name}.ended_at`, 0)
  assertFinite(duration_ms,        `${name}.duration_ms`, 0)
  assertFinite(sample_interval_ms, `${name}.sample_interval_ms`, 0)
  assertFinite(timeout_ms,         `${name}.timeout_ms`, 0)
  assertFinite(failed_ticks,       `${name}.failed_ticks`, 0)

  const samples = list(raw, 'samples', name).map((s, i) => parseSample(s, `${name}.samples[${i}]`))
  for (let i = 1; i < samples.length; i++) {
    if (samples[i].timestamp <= samples[i - 1].timestamp) {
      throw new ValidationError(`${name}.samples must be strictly increasing in timestamp (index ${i})`)
    }
  }

  const outcome = field(raw, 'outcome', name)
  const { agent_succeeded, steps, error_message } = outcome
  assertBoolean(agent_succeeded, `${name}.outcome.agent_succeeded`)
  assertFinite(steps, `${name}.outcome.steps`, 0)
  if (error_message !== undefined) assertString(error_message, `${name}.outcome.error_message`)

  return Object.freeze({
    run_id,
    scenario,
    status,
    samples: Object.freeze(samples),
    started_at,
    ended_at,
    duration_ms,
    sample_interval_ms,
    timeout_ms,
    failed_ticks,
    outcome: Object.freeze(
      error_message === undefined
        ? { agent_succeeded, steps }
        : { agent_succeeded, steps, error_message }
    ),
  })
}

// ─── Detection Result ─────────────────────────────────────────────────────────

function parseFeatures(raw: unknown, name: string): RunFeatures {
  if (!isRecord(raw)) throw new ValidationError(`${name} must be an object`)
  const {
    sample_count, duration_ms, duration_ratio, peak_utilization_pct, mean_utilization_pct,
    utilization_cv, spike_count, time_to_first_spike_ms, peak_memory_mb, memory_growth_mb, timed_out,
  } = raw
  assertFinite(sample_count,         `${name}.sample_count`, 0)
  assertFinite(duration_ms,          `${name}.duration_ms`, 0)
  assertFinite(duration_ratio,       `${name}.duration_ratio`, 0)
  assertFinite(peak_utilization_pct, `${name}.peak_utilization_pct`, 0, 100)
  assertFinite(mean_utilization_pct, `${name}.mean_utilization_pct`, 0, 100)
  assertFinite(utilization_cv,       `${name}.utilization_cv`, 0)
  assertFinite(spike_count,          `${name}.spike_count`, 0)
  assertFinite(peak_memory_mb,       `${name}.peak_memory_mb`, 0)
  assertFinite(memory_growth_mb,     `${name}.memory_growth_mb`)
  assertBoolean(timed_out,           `${name}.timed_out`)

  const spike_elapsed_ms = list(raw, 'spike_elapsed_ms', name).map((v, i) => {
    assertFinite(v, `${name}.spike_elapsed_ms[${i}]`, 0)
    return v
  })

  return {
    sample_count, duration_ms, duration_ratio, peak_utilization_pct, mean_utilization_pct,
    utilization_cv, spike_count, spike_elapsed_ms,
    time_to_first_spike_ms: finiteOrNull(time_to_first_spike_ms, `${name}.time_to_first_spike_ms`),
    peak_memory_mb, memory_growth_mb, timed_out,
  }
}

export function parseDetection(raw: unknown, name = 'detection'): DetectionResult {
  if (!isRecord(raw)) throw new ValidationError(`${name} must be an object`)

  const { run_id, scenario, predicted, score, correct, verdict,
          detection_latency_ms, policy, classified_at } = raw
  assertString(run_id, `${name}.run_id`, 128)
  assertOneOf<ScenarioKind>(scenario,  `${name}.scenario`, ALL_SCENARIOS)
  assertOneOf<ScenarioKind>(predicted, `${name}.predicted`, ALL_SCENARIOS)
  assertFinite(score, `${name}.score`, 0, 1)
  assertBoolean(correct, `${name}.correct`)
  assertOneOf(verdict, `${name}.verdict`, VERDICTS)
  assertString(policy, `${name}.policy`, 128)
  assertString(classified_at, `${name}.classified_at`, 64)

  const reasons = list(raw, 'reasons', name).map((r, i) => {
    if (typeof r !== 'string') throw new ValidationError(`${name}.reasons[${i}] must be a string`)
    return r
  })

  return {
    run_id,
    scenario,
    predicted,
    score,
    correct,
    verdict,
    detection_latency_ms: finiteOrNull(detection_latency_ms, `${name}.detection_latency_ms`),
    features: parseFeatures(raw['features'], `${name}.features`),
    policy,
    reasons,
    classified_at,
  }
}
