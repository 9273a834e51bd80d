/**
 * @loopwatch/harness-core — Public API
 *
 *   import { resolveSettings, bootstrapHarness, runExperiment } from '@loopwatch/harness-core'
 */

export {
  resolveSettings,
  validateSettings,
  parseLayer,
  envLayer,
  envName,
  isSettingKey,
  HarnessConfigError,
  DEFAULT_SETTINGS,
  SETTING_KEYS,
} from './settings'
export type { HarnessSettings, PersistedSettings, StoredSettings, SettingKey } from './settings'
export { bootstrapHarness, buildAnalyzer, protocolFrom } from './bootstrap'
export type { Harness, BootstrapOverrides } from './bootstrap'
export { runExperiment, analyzeResults, summarizeRuns } from './experiment'
export type {
  RunResult,
  ScenarioSummary,
  ExperimentResult,
  ExperimentPlan,
  ExperimentHooks,
  AnalysisResult,
} from './experiment'
export { startRunLogSubscriber, describeEvent } from './run-log-subscriber'
export type { RunLogSubscriberOptions, LogLevel } from './run-log-subscriber'
