/**
 * @loopwatch/analyzer — Evaluation
 *
 * Aggregates detection results against their ground-truth labels.
 *
 * Targets: ≥ 80% accuracy, < 10 s detection. Two protocols:
 *   POOLED        accuracy = correct / total across every run
 *   PER_SCENARIO  every scenario present must reach the target on its own
 *
 * Detection latency is measured over true positives only: anomalous runs
 * that were flagged as anomalous. If there are none, the latency target
 * is not met.
 */

import {
  ALL_SCENARIOS,
  ScenarioKind,
  type DetectionResult,
  type DetectionVerdict,
  type EvaluationProtocol,
  type EvaluationReport,
  type ScenarioAccuracy,
} from '@loopwatch/types'

export const DEFAULT_PROTOCOL: EvaluationProtocol = {
  mode:                  'POOLED',
  accuracy_target:       0.8,
  latency_target_ms:     10_000,
  min_runs_per_scenario: 1,
}

/** 2/3 → 66.7 */
export function toPct(fraction: number): number {
  return Math.round(fraction * 1000) / 10
}

function emptyConfusion(): Record<ScenarioKind, Record<ScenarioKind, number>> {
  const row = () => ({
    [ScenarioKind.NORMAL]:        0,
    [ScenarioKind.INFINITE_LOOP]: 0,
    [ScenarioKind.RETRY_STORM]:   0,
  })
  return {
    [ScenarioKind.NORMAL]:        row(),
    [ScenarioKind.INFINITE_LOOP]: row(),
    [ScenarioKind.RETRY_STORM]:   row(),
  }
}

export function evaluateDetections(
  results: readonly DetectionResult[],
  protocol: EvaluationProtocol = DEFAULT_PROTOCOL
): EvaluationReport {
  const confusion = emptyConfusion()
  const verdicts: Record<DetectionVerdict, number> = {
    TRUE_POSITIVE:  0,
    TRUE_NEGATIVE:  0,
    FALSE_POSITIVE: 0,
    FALSE_NEGATIVE: 0,
  }
  const per_scenario: Partial<Record<ScenarioKind, ScenarioAccuracy>> = {}
  const latencies: number[] = []

  for (const r of results) {
    confusion[r.scenario][r.predicted]++
    verdicts[r.verdict]++

    const entry = per_scenario[r.scenario] ?? { total: 0, correct: 0, accuracy: 0, accuracy_pct: 0 }
    entry.total++
    if (r.correct) entry.correct++
    per_scenario[r.scenario] = entry

    if (r.verdict === 'TRUE_POSITIVE' && r.detection_latency_ms !== null) {
      latencies.push(r.detection_latency_ms)
    }
  }

  const present = ALL_SCENARIOS.filter(s => per_scenario[s] !== undefined)
  for (const s of present) {
    const entry = per_scenario[s]
    if (!entry) continue
    entry.accuracy     = entry.correct / entry.total
    entry.accuracy_pct = toPct(entry.accuracy)
  }

  const total    = results.length
  const correct  = results.filter(r => r.correct).length
  const accuracy = total > 0 ? correct / total : 0

  const accuracy_target_met = total > 0 && (
    protocol.mode === 'POOLED'
      ? accuracy >= protocol.accuracy_target
      : present.every(s => (per_scenario[s]?.accuracy ?? 0) >= protocol.accuracy_target)
  )

  const max_latency  = latencies.length ? Math.max(...latencies) : null
  const mean_latency = latencies.length ? latencies.reduce((a, b) => a + b, 0) / latencies.length : null

  return {
    protocol,
    total,
    correct,
    accuracy,
    accuracy_pct: toPct(accuracy),
    per_scenario,
    confusion,
    verdicts,
    mean_detection_latency_ms: mean_latency,
    max_detection_latency_ms:  max_latency,
    sufficient_runs: total > 0 && present.every(
      s => (per_scenario[s]?.total ?? 0) >= protocol.min_runs_per_scenario
    ),
    accuracy_target_met,
    latency_target_met: max_latency !== null && max_latency < protocol.latency_target_ms,
  }
}
