/**
 * @loopwatch/harness-core — Harness Bootstrap
 *
 * Wires every module together from resolved settings.
 *
 * Order of operations:
 *   1. Start the event bus
 *   2. Attach the run-log subscriber (optional)
 *   3. Pick the GPU query and agent: nvidia-smi + HTTP agents, or the
 *      simulated pair sharing one LoadSignal
 *   4. Build the runner, the analyzer and the run store
 *
 * Any piece can be swapped through BootstrapOverrides; tests use that to
 * plug in fakes without touching the rest.
 */

import { HarnessEventBus, type Subscription } from '@loopwatch/event-bus'
import {
  LoadSignal,
  NvidiaSmiGpuQuery,
  SimulatedGpuQuery,
  type GpuQuery,
} from '@loopwatch/telemetry-sampler'
import {
  HttpAgentInvoker,
  ScenarioRunner,
  SimulatedAgent,
  defaultEndpoints,
  type AgentInvoker,
  type DriverConfig,
} from '@loopwatch/scenario-runner'
import { Analyzer, ThresholdPolicy, type ClassificationPolicy } from '@loopwatch/analyzer'
import { FileRunStore, type RunStore } from '@loopwatch/run-store'
import type { EvaluationProtocol } from '@loopwatch/types'
import type { HarnessSettings } from './settings'
import { startRunLogSubscriber } from './run-log-subscriber'

export interface Harness {
  settings: HarnessSettings
  bus: HarnessEventBus
  gpu: GpuQuery
  agent: AgentInvoker
  runner: ScenarioRunner
  analyzer: Analyzer
  store: RunStore
  protocol: EvaluationProtocol
  /** Detach bus subscribers created during bootstrap. */
  shutdown(): void
}

export interface BootstrapOverrides {
  gpu?: GpuQuery
  agent?: AgentInvoker
  store?: RunStore
  policy?: ClassificationPolicy
  drivers?: Partial<DriverConfig>
  clock?: () => number
  /** Attach the run-log subscriber. Default true. */
  run_log?: boolean
}

export function protocolFrom(settings: HarnessSettings): EvaluationProtocol {
  return {
    mode:                  settings.evaluation_mode,
    accuracy_target:       settings.accuracy_target,
    latency_target_ms:     settings.latency_target_ms,
    min_runs_per_scenario: settings.min_runs_per_scenario,
  }
}

/** Analyzer configured from settings; also used on its own for batch analysis. */
export function buildAnalyzer(
  settings: HarnessSettings,
  policy?: ClassificationPolicy,
  clock: () => number = Date.now
): Analyzer {
  return new Analyzer({
    features: {
      spike_threshold_pct:         settings.spike_threshold_pct,
      expected_normal_duration_ms: settings.expected_normal_duration_ms,
    },
    policy: policy ?? new ThresholdPolicy({
      retry_spike_min:             settings.retry_spike_min,
      loop_duration_ratio:         settings.loop_duration_ratio,
      expected_normal_duration_ms: settings.expected_normal_duration_ms,
    }),
    protocol: protocolFrom(settings),
    clock,
  })
}

export function bootstrapHarness(settings: HarnessSettings, overrides: BootstrapOverrides = {}): Harness {
  const clock = overrides.clock ?? Date.now

  // ── 1. Event Bus ────────────────────────────────────────────────────────────
  const bus = new HarnessEventBus()
  const subscriptions: Subscription[] = []

  // ── 2. Run log ──────────────────────────────────────────────────────────────
  if (overrides.run_log ?? true) {
    subscriptions.push(startRunLogSubscriber({ bus }))
  }

  // ── 3. GPU + agent ──────────────────────────────────────────────────────────
  let gpu: GpuQuery
  let agent: AgentInvoker
  if (settings.simulate) {
    const load = new LoadSignal()
    gpu   = overrides.gpu   ?? new SimulatedGpuQuery(load)
    agent = overrides.agent ?? new SimulatedAgent(load)
  } else {
    gpu   = overrides.gpu   ?? new NvidiaSmiGpuQuery({ gpu_index: settings.gpu_index })
    agent = overrides.agent ?? new HttpAgentInvoker({
      endpoints:          defaultEndpoints(settings.agent_host),
      request_timeout_ms: settings.request_timeout_ms,
      api_key:            settings.agent_api_key,
    })
  }

  // ── 4. Runner, analyzer, store ──────────────────────────────────────────────
  const runner = new ScenarioRunner(
    { agent, gpu, bus },
    {
      sample_interval_ms: settings.sample_interval_ms,
      timeout_ms:         settings.timeout_ms,
      clock,
      drivers:            overrides.drivers,
    }
  )

  const protocol = protocolFrom(settings)
  const analyzer = buildAnalyzer(settings, overrides.policy, clock)

  const store = overrides.store ?? new FileRunStore(settings.results_dir)

  console.log(
    `[harness] Ready — gpu=${gpu.name}, agent=${agent.name}, ` +
    `interval=${settings.sample_interval_ms}ms, timeout=${settings.timeout_ms}ms`
  )

  return {
    settings,
    bus,
    gpu,
    agent,
    runner,
    analyzer,
    store,
    protocol,
    shutdown: () => {
      for (const sub of subscriptions) sub.unsubscribe()
      subscriptions.length = 0
    },
  }
}
