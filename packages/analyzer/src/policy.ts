/**
 * @loopwatch/analyzer — Classification Policy
 *
 * The decision rule is a replaceable strategy: the analyzer hands it the
 * extracted features and takes back a predicted scenario. Nothing else in
 * the harness depends on how that decision is made.
 *
 * ThresholdPolicy (the default) checks, in order:
 *   1. spike_count ≥ retry_spike_min                  → RETRY_STORM
 *   2. timed out, or duration_ratio ≥ loop_duration_ratio → INFINITE_LOOP
 *   3. otherwise                                      → NORMAL
 *
 * Retries are checked first because a retry storm can also run long.
 */

import { ScenarioKind, type RunFeatures } from '@loopwatch/types'

export interface PolicyDecision {
  predicted: ScenarioKind
  score: number                       // 0..1
  detected_after_ms: number | null    // elapsed time at which the evidence was complete
  reasons: string[]
}

export interface ClassificationPolicy {
  readonly name: string
  classify(features: RunFeatures): PolicyDecision
}

export interface ThresholdPolicyConfig {
  retry_spike_min: number
  loop_duration_ratio: number
  expected_normal_duration_ms: number
}

export const DEFAULT_THRESHOLDS: ThresholdPolicyConfig = {
  retry_spike_min:             4,
  loop_duration_ratio:         3,
  expected_normal_duration_ms: 1_500,
}

const clamp01 = (n: number) => Math.min(1, Math.max(0, n))

export class ThresholdPolicy implements ClassificationPolicy {
  readonly name = 'threshold'
  readonly config: ThresholdPolicyConfig

  constructor(config?: Partial<ThresholdPolicyConfig>) {
    this.config = { ...DEFAULT_THRESHOLDS, ...config }
  }

  classify(features: RunFeatures): PolicyDecision {
    const { retry_spike_min, loop_duration_ratio, expected_normal_duration_ms } = this.config

    if (features.spike_count >= retry_spike_min) {
      return {
        predicted:         ScenarioKind.RETRY_STORM,
        score:             clamp01(features.spike_count / (2 * retry_spike_min)),
        detected_after_ms: features.spike_elapsed_ms[retry_spike_min - 1] ?? null,
        reasons: [`${features.spike_count} utilization spikes (≥ ${retry_spike_min})`],
      }
    }

    if (features.timed_out || features.duration_ratio >= loop_duration_ratio) {
      const reasons: string[] = []
      if (features.timed_out) reasons.push('run hit the hard timeout')
      if (features.duration_ratio >= loop_duration_ratio) {
        reasons.push(`ran ${features.duration_ratio.toFixed(1)}× the expected normal duration`)
      }
      return {
        predicted:         ScenarioKind.INFINITE_LOOP,
        score:             features.timed_out ? 1 : clamp01(features.duration_ratio / (2 * loop_duration_ratio)),
        detected_after_ms: Math.min(features.duration_ms, expected_normal_duration_ms * loop_duration_ratio),
        reasons,
      }
    }

    return {
      predicted:         ScenarioKind.NORMAL,
      score:             clamp01(1 - Math.max(
                           features.spike_count / retry_spike_min,
                           features.duration_ratio / loop_duration_ratio,
                         )),
      detected_after_ms: null,
      reasons: [
        `${features.spike_count} spike(s), ${features.duration_ratio.toFixed(1)}× expected duration`,
      ],
    }
  }
}
