/**
 * @loopwatch/types — Runs, Detections and Evaluation
 *
 * A run is one execution of one scenario against the external agent.
 * The runner owns the RunRecord while it is being built, then hands a
 * frozen copy to the analyzer and the store.
 *
 * Lifecycle of a single run:
 *   IDLE → SAMPLING → COMPLETED | TIMED_OUT | FAILED
 *   COMPLETED | TIMED_OUT → CLASSIFIED
 *
 * FAILED is terminal: the agent invocation errored before any telemetry
 * was captured, so there is nothing to classify.
 */

import type { TelemetrySample } from './telemetry'

// ─── Scenarios ────────────────────────────────────────────────────────────────

export enum ScenarioKind {
  NORMAL        = 'NORMAL',        // single clean purchase pass
  INFINITE_LOOP = 'INFINITE_LOOP', // contradictory mandate, agent never settles
  RETRY_STORM   = 'RETRY_STORM',   // payment keeps failing, caller keeps retrying
}

export const ALL_SCENARIOS: readonly ScenarioKind[] = [
  ScenarioKind.NORMAL,
  ScenarioKind.INFINITE_LOOP,
  ScenarioKind.RETRY_STORM,
]

export function isAnomalous(scenario: ScenarioKind): boolean {
  return scenario !== ScenarioKind.NORMAL
}

// ─── Lifecycle ────────────────────────────────────────────────────────────────

export type CompletionStatus = 'COMPLETED' | 'TIMED_OUT' | 'FAILED'

export type RunState = 'IDLE' | 'SAMPLING' | CompletionStatus | 'CLASSIFIED'

// ─── Run Record ───────────────────────────────────────────────────────────────

/** What the scenario driver reported about the agent, independent of telemetry. */
export interface AgentOutcome {
  agent_succeeded: boolean
  steps: number             // agent calls made
  error_message?: string
}

export interface RunRecord {
  readonly run_id: string
  readonly scenario: ScenarioKind
  readonly status: CompletionStatus
  readonly samples: readonly TelemetrySample[]
  readonly started_at: number     // epoch ms
  readonly ended_at: number       // epoch ms
  readonly duration_ms: number
  readonly sample_interval_ms: number
  readonly timeout_ms: number
  readonly failed_ticks: number   // GPU queries that failed and were skipped
  readonly outcome: Readonly<AgentOutcome>
}

// ─── Detection ────────────────────────────────────────────────────────────────

/** Binary anomaly-vs-normal verdict, independent of which anomaly class was picked. */
export type DetectionVerdict =
  | 'TRUE_POSITIVE'
  | 'TRUE_NEGATIVE'
  | 'FALSE_POSITIVE'
  | 'FALSE_NEGATIVE'

export interface RunFeatures {
  sample_count: number
  duration_ms: number
  duration_ratio: number            // duration / expected normal duration
  peak_utilization_pct: number
  mean_utilization_pct: number
  utilization_cv: number            // stddev / mean (population)
  spike_count: number
  spike_elapsed_ms: number[]        // elapsed time of each rising edge
  time_to_first_spike_ms: number | null
  peak_memory_mb: number
  memory_growth_mb: number          // last − first sample
  timed_out: boolean
}

export interface DetectionResult {
  run_id: string
  scenario: ScenarioKind            // ground truth
  predicted: ScenarioKind
  score: number                     // 0..1 confidence in `predicted`
  correct: boolean
  verdict: DetectionVerdict
  detection_latency_ms: number | null
  features: RunFeatures
  policy: string
  reasons: string[]
  classified_at: string             // ISO 8601
}

// ─── Evaluation ───────────────────────────────────────────────────────────────

export type EvaluationMode = 'POOLED' | 'PER_SCENARIO'

export interface EvaluationProtocol {
  mode: EvaluationMode
  accuracy_target: number           // fraction, e.g. 0.8
  latency_target_ms: number         // detection must land before this
  min_runs_per_scenario: number
}

export interface ScenarioAccuracy {
  total: number
  correct: number
  accuracy: number
  accuracy_pct: number
}

export interface EvaluationReport {
  protocol: EvaluationProtocol
  total: number
  correct: number
  accuracy: number                  // exact fraction
  accuracy_pct: number              // rounded to one decimal
  per_scenario: Partial<Record<ScenarioKind, ScenarioAccuracy>>
  confusion: Record<ScenarioKind, Record<ScenarioKind, number>>   // truth → predicted → count
  verdicts: Record<DetectionVerdict, number>
  mean_detection_latency_ms: number | null
  max_detection_latency_ms: number | null
  sufficient_runs: boolean
  accuracy_target_met: boolean
  latency_target_met: boolean
}
