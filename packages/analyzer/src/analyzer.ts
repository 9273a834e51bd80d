/**
 * @loopwatch/analyzer — Analyzer
 *
 * classify(record) → DetectionResult
 *   features → policy decision → correctness against the record's label
 *
 * evaluate(results) → EvaluationReport
 *
 * FAILED runs carry no telemetry worth judging and are refused.
 */

import {
  isAnomalous,
  type DetectionResult,
  type DetectionVerdict,
  type EvaluationProtocol,
  type EvaluationReport,
  type RunRecord,
  type ScenarioKind,
} from '@loopwatch/types'
import { DEFAULT_FEATURE_OPTIONS, extractFeatures, type FeatureOptions } from './features'
import { ThresholdPolicy, type ClassificationPolicy } from './policy'
import { DEFAULT_PROTOCOL, evaluateDetections } from './evaluation'

export interface AnalyzerConfig {
  features: FeatureOptions
  policy: ClassificationPolicy
  protocol: EvaluationProtocol
  clock: () => number
}

export class UnclassifiableRunError extends Error {
  constructor(readonly run_id: string, reason: string) {
    super(`Run ${run_id} cannot be classified: ${reason}`)
    this.name = 'UnclassifiableRunError'
  }
}

export function verdictFor(truth: ScenarioKind, predicted: ScenarioKind): DetectionVerdict {
  const actual  = isAnomalous(truth)
  const flagged = isAnomalous(predicted)
  if (actual && flagged)  return 'TRUE_POSITIVE'
  if (!actual && !flagged) return 'TRUE_NEGATIVE'
  return flagged ? 'FALSE_POSITIVE' : 'FALSE_NEGATIVE'
}

export class Analyzer {
  readonly config: AnalyzerConfig

  constructor(config?: Partial<AnalyzerConfig>) {
    const features = config?.features ?? DEFAULT_FEATURE_OPTIONS
    this.config = {
      features,
      // Keep the policy's notion of "normal duration" in step with the features
      policy:   config?.policy ?? new ThresholdPolicy({
        expected_normal_duration_ms: features.expected_normal_duration_ms,
      }),
      protocol: config?.protocol ?? DEFAULT_PROTOCOL,
      clock:    config?.clock    ?? Date.now,
    }
  }

  classify(record: RunRecord): DetectionResult {
    if (record.status === 'FAILED') {
      throw new UnclassifiableRunError(record.run_id, 'agent invocation failed before any telemetry was captured')
    }

    const features = extractFeatures(record, this.config.features)
    const decision = this.config.policy.classify(features)
    const verdict  = verdictFor(record.scenario, decision.predicted)

    return {
      run_id:               record.run_id,
      scenario:             record.scenario,
      predicted:            decision.predicted,
      score:                decision.score,
      correct:              decision.predicted === record.scenario,
      verdict,
      detection_latency_ms: isAnomalous(decision.predicted) ? decision.detected_after_ms : null,
      features,
      policy:               this.config.policy.name,
      reasons:              decision.reasons,
      classified_at:        new Date(this.config.clock()).toISOString(),
    }
  }

  evaluate(
    results: readonly DetectionResult[],
    protocol: EvaluationProtocol = this.config.protocol
  ): EvaluationReport {
    return evaluateDetections(results, protocol)
  }
}
