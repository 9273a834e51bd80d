/**
 * @loopwatch/harness-core — Experiment
 *
 * runExperiment: run → classify → persist, once per (scenario, repetition),
 * strictly one run at a time so runs never share the GPU.
 *
 * FAILED runs are persisted but never classified. A PersistenceError aborts
 * the whole experiment; everything saved before it stays on disk.
 */

import { createPublisher } from '@loopwatch/event-bus'
import { RunLifecycle } from '@loopwatch/scenario-runner'
import type { Analyzer } from '@loopwatch/analyzer'
import type { RunStore } from '@loopwatch/run-store'
import type {
  DetectionResult,
  EvaluationProtocol,
  EvaluationReport,
  RunRecord,
  ScenarioKind,
} from '@loopwatch/types'
import type { Harness } from './bootstrap'

export interface RunResult {
  record: RunRecord
  detection: DetectionResult | null
  location: string
}

export interface ScenarioSummary {
  scenario: ScenarioKind
  total: number
  successes: number          // agent_succeeded
  failures: number
  timed_out: number
  failed: number             // status FAILED, never classified
  avg_duration_ms: number
  avg_steps: number
}

export interface ExperimentResult {
  results: RunResult[]
  report: EvaluationReport
  summary: ScenarioSummary[]
  /** Runs whose agent invocation failed before any telemetry. */
  failed_runs: number
}

export interface ExperimentPlan {
  scenarios: readonly ScenarioKind[]
  runs_per_scenario: number
}

export interface ExperimentHooks {
  onRunStart?(scenario: ScenarioKind, index: number, total: number): void
  onRunEnd?(result: RunResult, index: number, total: number): void
}

export function summarizeRuns(records: readonly RunRecord[]): ScenarioSummary[] {
  const groups = new Map<ScenarioKind, RunRecord[]>()
  for (const r of records) {
    const group = groups.get(r.scenario)
    if (group) group.push(r)
    else groups.set(r.scenario, [r])
  }

  const avg = (xs: number[]) => xs.length === 0 ? 0 : xs.reduce((a, b) => a + b, 0) / xs.length

  return [...groups.entries()].map(([scenario, runs]) => {
    const successes = runs.filter(r => r.outcome.agent_succeeded).length
    return {
      scenario,
      total:           runs.length,
      successes,
      failures:        runs.length - successes,
      timed_out:       runs.filter(r => r.status === 'TIMED_OUT').length,
      failed:          runs.filter(r => r.status === 'FAILED').length,
      avg_duration_ms: avg(runs.map(r => r.duration_ms)),
      avg_steps:       avg(runs.map(r => r.outcome.steps)),
    }
  })
}

export async function runExperiment(
  harness: Harness,
  plan: ExperimentPlan,
  hooks: ExperimentHooks = {}
): Promise<ExperimentResult> {
  const { runner, analyzer, store, bus } = harness
  const publisher = createPublisher(bus, 'loopwatch.harness')
  const total = plan.scenarios.length * plan.runs_per_scenario
  const results: RunResult[] = []

  console.log(`[harness] Experiment: ${plan.scenarios.join(', ')} × ${plan.runs_per_scenario} (${total} run(s))`)

  let index = 0
  for (const scenario of plan.scenarios) {
    for (let i = 0; i < plan.runs_per_scenario; i++) {
      index++
      hooks.onRunStart?.(scenario, index, total)

      const record    = await runner.run(scenario)
      const lifecycle = RunLifecycle.fromRecord(record)

      let detection: DetectionResult | null = null
      if (record.status !== 'FAILED') {
        detection = analyzer.classify(record)
        lifecycle.transition('CLASSIFIED')
        await publisher.runClassified({
          run_id:               record.run_id,
          scenario:             record.scenario,
          predicted:            detection.predicted,
          score:                detection.score,
          verdict:              detection.verdict,
          detection_latency_ms: detection.detection_latency_ms,
        })
      }

      // PersistenceError propagates: the experiment stops here
      const location = await store.save(record, detection)
      await publisher.runPersisted({ run_id: record.run_id, status: record.status, location })

      const result = { record, detection, location }
      results.push(result)
      hooks.onRunEnd?.(result, index, total)
    }
  }

  const detections = results.flatMap(r => (r.detection ? [r.detection] : []))
  return {
    results,
    report:      analyzer.evaluate(detections, harness.protocol),
    summary:     summarizeRuns(results.map(r => r.record)),
    failed_runs: results.filter(r => r.record.status === 'FAILED').length,
  }
}

// ─── Batch analysis ───────────────────────────────────────────────────────────

export interface AnalysisResult {
  detections: DetectionResult[]
  report: EvaluationReport
  summary: ScenarioSummary[]
  /** FAILED runs found on disk; they are counted but not classified. */
  skipped_failed: number
}

/** Reload every persisted run and classify it with the analyzer's current policy. */
export async function analyzeResults(
  store: RunStore,
  analyzer: Analyzer,
  protocol?: EvaluationProtocol
): Promise<AnalysisResult> {
  const stored = await store.list()
  const records = stored.map(s => s.run)
  const classifiable = records.filter(r => r.status !== 'FAILED')
  const detections = classifiable.map(r => analyzer.classify(r))

  console.log(`[harness] Analyzed ${detections.length} of ${records.length} persisted run(s)`)

  return {
    detections,
    report:         analyzer.evaluate(detections, protocol),
    summary:        summarizeRuns(records),
    skipped_failed: records.length - classifiable.length,
  }
}
