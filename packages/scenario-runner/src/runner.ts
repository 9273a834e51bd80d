/**
 * @loopwatch/scenario-runner — Scenario Runner
 *
 * Executes one scenario against the agent while the sampler runs.
 *
 * Order of operations for run(scenario):
 *   1. Start the sampler (first sample is taken immediately)
 *   2. Drive the agent, raced against the hard timeout
 *   3. On timeout, abort the signal and abandon the driver
 *   4. Stop and drain the sampler, then freeze the RunRecord
 *
 * The timeout is the only cancellation path. INFINITE_LOOP never settles by
 * design, so every run ends within timeout_ms plus one sampling interval
 * (given a GPU query that itself answers).
 *
 * Outcome mapping:
 *   driver resolved                          → COMPLETED
 *   timeout fired first                      → TIMED_OUT
 *   driver rejected, no sample recorded yet  → FAILED
 *   driver rejected after samples exist      → COMPLETED, agent_succeeded=false
 */

import { v4 as uuidv4 } from 'uuid'
import {
  DEFAULT_SAMPLE_INTERVAL_MS,
  type AgentOutcome,
  type CompletionStatus,
  type RunRecord,
  type ScenarioKind,
} from '@loopwatch/types'
import { createPublisher, type HarnessEventBus, type RunPublisher } from '@loopwatch/event-bus'
import { TelemetrySampler, type GpuQuery } from '@loopwatch/telemetry-sampler'
import type { AgentInvoker, AgentPayload, AgentReply } from './agent'
import { RunLifecycle } from './lifecycle'
import { createDrivers, type DriverConfig, type ScenarioDriver } from './scenarios'

export interface RunnerConfig {
  sample_interval_ms: number
  timeout_ms: number
  clock: () => number
  drivers?: Partial<DriverConfig>
}

export interface RunnerDeps {
  agent: AgentInvoker
  gpu: GpuQuery
  bus?: HarnessEventBus
  /** Replace individual scenario drivers, e.g. with a tuned variant. */
  drivers?: Partial<Record<ScenarioKind, ScenarioDriver>>
}

export const DEFAULT_TIMEOUT_MS = 30_000

type Settled =
  | { kind: 'done'; outcome: AgentOutcome }
  | { kind: 'timeout' }
  | { kind: 'error'; error: Error; samples_at_error: number }

/** Counts calls so a timed-out run can still report how far the agent got. */
class CountingInvoker implements AgentInvoker {
  calls = 0

  constructor(private readonly inner: AgentInvoker) {}

  get name(): string {
    return this.inner.name
  }

  invoke(payload: AgentPayload, signal: AbortSignal): Promise<AgentReply> {
    this.calls++
    return this.inner.invoke(payload, signal)
  }
}

export class ScenarioRunner {
  private readonly config: RunnerConfig
  private readonly drivers: Record<ScenarioKind, ScenarioDriver>
  private readonly publisher: RunPublisher | null

  constructor(private readonly deps: RunnerDeps, config?: Partial<RunnerConfig>) {
    this.config = {
      sample_interval_ms: config?.sample_interval_ms ?? DEFAULT_SAMPLE_INTERVAL_MS,
      timeout_ms:         config?.timeout_ms         ?? DEFAULT_TIMEOUT_MS,
      clock:              config?.clock              ?? Date.now,
      drivers:            config?.drivers,
    }
    this.drivers   = { ...createDrivers(this.config.drivers), ...deps.drivers }
    this.publisher = deps.bus ? createPublisher(deps.bus, 'loopwatch.runner') : null
  }

  get timeout_ms(): number {
    return this.config.timeout_ms
  }

  get sample_interval_ms(): number {
    return this.config.sample_interval_ms
  }

  async run(scenario: ScenarioKind): Promise<RunRecord> {
    const { sample_interval_ms, timeout_ms, clock } = this.config
    const run_id    = uuidv4()
    const lifecycle = new RunLifecycle(run_id, 'IDLE', clock)
    const driver    = this.drivers[scenario]
    const agent     = new CountingInvoker(this.deps.agent)

    const sampler = new TelemetrySampler(this.deps.gpu, {
      interval_ms: sample_interval_ms,
      clock,
      onTickFailed: (failed_ticks, error) => {
        this.publisher?.sampleFailed({ run_id, failed_ticks, error: error.message })
          .catch(console.error)
      },
    })

    const started_at = clock()
    sampler.start()
    lifecycle.transition('SAMPLING')
    console.log(`[runner] ${scenario} run ${run_id} started — timeout ${timeout_ms}ms, sampling every ${sample_interval_ms}ms`)
    await this.publisher?.runStarted({ run_id, scenario, sample_interval_ms, timeout_ms })

    const controller = new AbortController()
    const driving    = driver.drive(agent, controller.signal)
    const settled    = await this.race(driving, sampler)
    if (settled.kind === 'timeout') {
      // Best effort: the agent may ignore the abort. Its late result is dropped.
      controller.abort()
      driving.then(
        outcome => console.log(`[runner] ${scenario} run ${run_id} abandoned driver settled late (${outcome.steps} step(s)); result ignored`),
        err => console.log(`[runner] ${scenario} run ${run_id} abandoned driver failed late; error ignored: ${err instanceof Error ? err.message : String(err)}`)
      ).catch(console.error)
    }

    const samples  = await sampler.stop()
    const ended_at = clock()

    const { status, outcome } = this.resolve(settled, agent.calls, timeout_ms)
    lifecycle.transition(status)

    const record = freezeRecord({
      run_id,
      scenario,
      status,
      samples,
      started_at,
      ended_at,
      duration_ms: ended_at - started_at,
      sample_interval_ms,
      timeout_ms,
      failed_ticks: sampler.failed_ticks,
      outcome,
    })

    await this.announce(record)
    return record
  }

  // ─── Internals ──────────────────────────────────────────────────────────────

  private async race(driving: Promise<AgentOutcome>, sampler: TelemetrySampler): Promise<Settled> {
    let timer: ReturnType<typeof setTimeout> | undefined
    const timeout = new Promise<Settled>(resolve => {
      timer = setTimeout(() => resolve({ kind: 'timeout' }), this.config.timeout_ms)
    })

    try {
      return await Promise.race([
        driving.then((outcome): Settled => ({ kind: 'done', outcome })),
        timeout,
      ])
    } catch (err) {
      return {
        kind: 'error',
        error: err instanceof Error ? err : new Error(String(err)),
        samples_at_error: sampler.sample_count,
      }
    } finally {
      clearTimeout(timer)
    }
  }

  private resolve(
    settled: Settled,
    calls: number,
    timeout_ms: number
  ): { status: CompletionStatus; outcome: AgentOutcome } {
    switch (settled.kind) {
      case 'done':
        return { status: 'COMPLETED', outcome: settled.outcome }
      case 'timeout':
        return {
          status: 'TIMED_OUT',
          outcome: {
            agent_succeeded: false,
            steps: calls,
            error_message: `Timed out after ${timeout_ms}ms (${calls} agent call(s))`,
          },
        }
      case 'error':
        return {
          status: settled.samples_at_error === 0 ? 'FAILED' : 'COMPLETED',
          outcome: {
            agent_succeeded: false,
            steps: calls,
            error_message: settled.error.message || settled.error.name || 'unknown error',
          },
        }
    }
  }

  private async announce(record: RunRecord): Promise<void> {
    const { run_id, scenario, duration_ms, outcome } = record
    const sample_count = record.samples.length

    switch (record.status) {
      case 'COMPLETED':
        console.log(`[runner] ${scenario} run ${run_id} completed in ${duration_ms}ms — ${sample_count} sample(s), ${outcome.steps} step(s)`)
        await this.publisher?.runCompleted({
          run_id, scenario, duration_ms, sample_count,
          agent_succeeded: outcome.agent_succeeded,
          steps: outcome.steps,
        })
        break
      case 'TIMED_OUT':
        console.log(`[runner] ${scenario} run ${run_id} timed out after ${duration_ms}ms — ${sample_count} sample(s)`)
        await this.publisher?.runTimedOut({ run_id, scenario, duration_ms, sample_count, steps: outcome.steps })
        break
      case 'FAILED':
        console.error(`[runner] ${scenario} run ${run_id} failed before any telemetry: ${outcome.error_message ?? 'unknown error'}`)
        await this.publisher?.runFailed({ run_id, scenario, error: outcome.error_message ?? 'unknown error' })
        break
    }
  }
}

function freezeRecord(record: RunRecord): RunRecord {
  return Object.freeze({
    ...record,
    samples: Object.freeze([...record.samples]),
    outcome: Object.freeze({ ...record.outcome }),
  })
}
