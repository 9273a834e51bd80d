/**
 * Shared builders for the automated suites.
 */
import { vi } from 'vitest'
import {
  ScenarioKind,
  type GpuReading,
  type RunFeatures,
  type RunRecord,
  type TelemetrySample,
} from '@loopwatch/types'
import type { GpuQuery } from '@loopwatch/telemetry-sampler'
import type { AgentInvoker, AgentPayload, AgentReply } from '@loopwatch/scenario-runner'

export const T0 = Date.UTC(2026, 9, 18, 9, 15, 2, 123)

/** One sample per entry, `step_ms` apart, starting at T0. */
export function makeSamples(
  utilization: number[],
  step_ms = 100,
  memory: number[] = []
): TelemetrySample[] {
  return utilization.map((u, i) => ({
    timestamp:           T0 + i * step_ms,
    elapsed_ms:          i * step_ms,
    gpu_utilization_pct: u,
    gpu_memory_used_mb:  memory[i] ?? 1024,
  }))
}

export function makeRecord(overrides: Partial<RunRecord> = {}): RunRecord {
  const samples = overrides.samples ?? makeSamples([10, 60, 10])
  return {
    run_id:             'abcdef12-3456-4789-8abc-def012345678',
    scenario:           ScenarioKind.NORMAL,
    status:             'COMPLETED',
    samples,
    started_at:         T0,
    ended_at:           T0 + 1_000,
    duration_ms:        1_000,
    sample_interval_ms: 100,
    timeout_ms:         30_000,
    failed_ticks:       0,
    outcome:            { agent_succeeded: true, steps: 3 },
    ...overrides,
  }
}

export function makeFeatures(overrides: Partial<RunFeatures> = {}): RunFeatures {
  return {
    sample_count:           10,
    duration_ms:            1_200,
    duration_ratio:         0.8,
    peak_utilization_pct:   75,
    mean_utilization_pct:   20,
    utilization_cv:         1.2,
    spike_count:            2,
    spike_elapsed_ms:       [100, 700],
    time_to_first_spike_ms: 100,
    peak_memory_mb:         2048,
    memory_growth_mb:       0,
    timed_out:              false,
    ...overrides,
  }
}

/** GPU that answers with `reading` every time. */
export function fixedGpu(reading: GpuReading = { utilization_pct: 10, memory_used_mb: 1024 }): GpuQuery {
  return { name: 'fixed', query: vi.fn(async () => reading) }
}

/** Agent that answers through `respond`; records every payload it was sent. */
export function scriptedAgent(
  respond: (payload: AgentPayload, call: number) => AgentReply | Promise<AgentReply>
): AgentInvoker & { calls: AgentPayload[] } {
  const calls: AgentPayload[] = []
  return {
    name: 'scripted',
    calls,
    async invoke(payload: AgentPayload): Promise<AgentReply> {
      calls.push(payload)
      return respond(payload, calls.length)
    },
  }
}

export const OK: AgentReply = { ok: true, status_code: 200, text: 'ok' }
