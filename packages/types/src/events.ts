/**
 * @loopwatch/types — Run Lifecycle Event Definitions
 *
 * Every event that flows through the harness event bus is typed here.
 * This is the contract between the runner, the harness core and the CLI.
 *
 * Naming convention: run.ACTION
 * Payload: always includes a timestamp and the run_id as correlation_id.
 */

import type { CompletionStatus, DetectionVerdict, ScenarioKind } from './runs'

// ─── Base ─────────────────────────────────────────────────────────────────────

export interface BaseEvent {
  event_id: string
  correlation_id: string   // the run_id; traces one run across modules
  timestamp: string        // ISO 8601
  source: string           // e.g. "loopwatch.runner", "loopwatch.harness"
}

// ─── Runner Events ────────────────────────────────────────────────────────────

export interface RunStartedEvent extends BaseEvent {
  type: 'run.started'
  run_id: string
  scenario: ScenarioKind
  sample_interval_ms: number
  timeout_ms: number
}

export interface SampleFailedEvent extends BaseEvent {
  type: 'run.sample_failed'
  run_id: string
  failed_ticks: number
  error: string
}

export interface RunCompletedEvent extends BaseEvent {
  type: 'run.completed'
  run_id: string
  scenario: ScenarioKind
  duration_ms: number
  sample_count: number
  agent_succeeded: boolean
  steps: number
}

export interface RunTimedOutEvent extends BaseEvent {
  type: 'run.timed_out'
  run_id: string
  scenario: ScenarioKind
  duration_ms: number
  sample_count: number
  steps: number
}

export interface RunFailedEvent extends BaseEvent {
  type: 'run.failed'
  run_id: string
  scenario: ScenarioKind
  error: string
}

// ─── Harness Events ───────────────────────────────────────────────────────────

export interface RunClassifiedEvent extends BaseEvent {
  type: 'run.classified'
  run_id: string
  scenario: ScenarioKind
  predicted: ScenarioKind
  score: number
  verdict: DetectionVerdict
  detection_latency_ms: number | null
}

export interface RunPersistedEvent extends BaseEvent {
  type: 'run.persisted'
  run_id: string
  status: CompletionStatus
  location: string
}

// ─── Union of all lifecycle events ────────────────────────────────────────────

export type HarnessEvent =
  | RunStartedEvent
  | SampleFailedEvent
  | RunCompletedEvent
  | RunTimedOutEvent
  | RunFailedEvent
  | RunClassifiedEvent
  | RunPersistedEvent

export type HarnessEventType = HarnessEvent['type']
