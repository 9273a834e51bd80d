/**
 * @loopwatch/analyzer — Public API
 */

export { Analyzer, UnclassifiableRunError, verdictFor } from './analyzer'
export type { AnalyzerConfig } from './analyzer'
export { extractFeatures, DEFAULT_FEATURE_OPTIONS } from './features'
export type { FeatureOptions } from './features'
export { ThresholdPolicy, DEFAULT_THRESHOLDS } from './policy'
export type { ClassificationPolicy, PolicyDecision, ThresholdPolicyConfig } from './policy'
export { evaluateDetections, DEFAULT_PROTOCOL, toPct } from './evaluation'
