/**
 * @loopwatch/analyzer — Feature Extraction
 *
 * Turns a run's sample sequence into a handful of scalars.
 *
 * A spike is a rising edge across spike_threshold_pct: a sample at or above
 * the threshold whose predecessor was below it. The first sample counts as
 * a spike if it already starts above the threshold.
 */

import type { RunFeatures, RunRecord } from '@loopwatch/types'

export interface FeatureOptions {
  spike_threshold_pct: number
  expected_normal_duration_ms: number
}

export const DEFAULT_FEATURE_OPTIONS: FeatureOptions = {
  spike_threshold_pct:         50,
  expected_normal_duration_ms: 1_500,
}

export function extractFeatures(
  record: RunRecord,
  options: FeatureOptions = DEFAULT_FEATURE_OPTIONS
): RunFeatures {
  const { samples } = record
  const utilization = samples.map(s => s.gpu_utilization_pct)

  const spike_elapsed_ms: number[] = []
  let above = false
  for (const sample of samples) {
    const now_above = sample.gpu_utilization_pct >= options.spike_threshold_pct
    if (now_above && !above) spike_elapsed_ms.push(sample.elapsed_ms)
    above = now_above
  }

  const mean = avg(utilization)
  const cv   = mean > 0 ? stddev(utilization, mean) / mean : 0

  const memory = samples.map(s => s.gpu_memory_used_mb)
  const first  = samples.at(0)
  const last   = samples.at(-1)

  return {
    sample_count:           samples.length,
    duration_ms:            record.duration_ms,
    duration_ratio:         options.expected_normal_duration_ms > 0
                              ? record.duration_ms / options.expected_normal_duration_ms
                              : 0,
    peak_utilization_pct:   utilization.length ? Math.max(...utilization) : 0,
    mean_utilization_pct:   mean,
    utilization_cv:         cv,
    spike_count:            spike_elapsed_ms.length,
    spike_elapsed_ms,
    time_to_first_spike_ms: spike_elapsed_ms.at(0) ?? null,
    peak_memory_mb:         memory.length ? Math.max(...memory) : 0,
    memory_growth_mb:       first && last ? last.gpu_memory_used_mb - first.gpu_memory_used_mb : 0,
    timed_out:              record.status === 'TIMED_OUT',
  }
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

function avg(values: number[]): number {
  if (values.length === 0) return 0
  return values.reduce((a, b) => a + b, 0) / values.length
}

function stddev(values: number[], mean: number): number {
  if (values.length === 0) return 0
  return Math.sqrt(avg(values.map(v => (v - mean) ** 2)))
}
