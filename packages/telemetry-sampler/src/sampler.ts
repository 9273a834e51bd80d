/**
 * @loopwatch/telemetry-sampler — Telemetry Sampler
 *
 * Background sampling loop for a single run.
 *
 * Lifecycle:
 *   start(interval)  → take one sample now, then one every `interval` ms
 *   stop()           → clear the timer, drain the in-flight query, return
 *                      the ordered sample sequence
 *
 * Bulkhead: a failing GPU query skips that tick and is logged. It never
 * aborts the run. A tick that fires while the previous query is still
 * running is skipped as well, so queries never overlap and timestamps
 * stay strictly increasing.
 */

import type { GpuReading, TelemetrySample } from '@loopwatch/types'
import { DEFAULT_SAMPLE_INTERVAL_MS } from '@loopwatch/types'
import type { GpuQuery } from './gpu-query'

export interface SamplerConfig {
  interval_ms: number
  drain_timeout_ms: number          // upper bound on waiting for the last query in stop()
  clock: () => number               // epoch ms
  onTickFailed?: (failed_ticks: number, error: Error) => void
}

export class SamplerStateError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'SamplerStateError'
  }
}

type SamplerState = 'IDLE' | 'SAMPLING' | 'STOPPED'

export class TelemetrySampler {
  private readonly config: SamplerConfig
  private timer?: ReturnType<typeof setInterval>
  private state: SamplerState = 'IDLE'
  private buffer: TelemetrySample[] = []
  private in_flight: Promise<void> | null = null
  private start_ms = 0
  private failed = 0
  private skipped = 0

  constructor(private readonly gpu: GpuQuery, config?: Partial<SamplerConfig>) {
    this.config = {
      interval_ms:      config?.interval_ms      ?? DEFAULT_SAMPLE_INTERVAL_MS,
      drain_timeout_ms: config?.drain_timeout_ms ?? 2_000,
      clock:            config?.clock            ?? Date.now,
      onTickFailed:     config?.onTickFailed,
    }
  }

  start(interval_ms: number = this.config.interval_ms): void {
    if (this.state !== 'IDLE') {
      throw new SamplerStateError(`Sampler cannot start from state ${this.state}`)
    }
    if (!Number.isFinite(interval_ms) || interval_ms <= 0) {
      throw new SamplerStateError(`Sampling interval must be a positive number, got ${interval_ms}`)
    }

    this.state = 'SAMPLING'
    this.start_ms = this.config.clock()
    this.timer = setInterval(() => this.tick(), interval_ms)
    // Sample immediately so short runs still get a reading
    this.tick()
  }

  async stop(): Promise<readonly TelemetrySample[]> {
    if (this.state !== 'SAMPLING') {
      throw new SamplerStateError(`Sampler cannot stop from state ${this.state}`)
    }

    clearInterval(this.timer)
    this.timer = undefined
    this.state = 'STOPPED'
    await this.drain()

    if (this.skipped > 0) {
      console.log(`[sampler] ${this.skipped} tick(s) skipped while a query was still running`)
    }
    return Object.freeze([...this.buffer])
  }

  get started_at(): number {
    return this.start_ms
  }

  get failed_ticks(): number {
    return this.failed
  }

  get skipped_ticks(): number {
    return this.skipped
  }

  get sample_count(): number {
    return this.buffer.length
  }

  // ─── Internals ──────────────────────────────────────────────────────────────

  private tick(): void {
    if (this.in_flight) {
      this.skipped++
      return
    }

    const timestamp = this.config.clock()
    this.in_flight = Promise.resolve()
      .then(() => this.gpu.query())
      .then(
        reading => this.record(timestamp, reading),
        err => this.fail(err instanceof Error ? err : new Error(String(err)))
      )
      .finally(() => { this.in_flight = null })
  }

  private record(timestamp: number, reading: GpuReading): void {
    const last = this.buffer.at(-1)
    if (last && timestamp <= last.timestamp) {
      console.warn(`[sampler] Dropped out-of-order sample at ${timestamp} (last ${last.timestamp})`)
      return
    }

    this.buffer.push(Object.freeze({
      timestamp,
      elapsed_ms:          timestamp - this.start_ms,
      gpu_utilization_pct: reading.utilization_pct,
      gpu_memory_used_mb:  reading.memory_used_mb,
    }))
  }

  private fail(error: Error): void {
    this.failed++
    console.warn(`[sampler] GPU query failed on ${this.gpu.name} (tick skipped): ${error.message}`)
    try {
      this.config.onTickFailed?.(this.failed, error)
    } catch (err) {
      console.error('[sampler] onTickFailed handler threw:', err instanceof Error ? err.message : err)
    }
  }

  private async drain(): Promise<void> {
    const pending = this.in_flight
    if (!pending) return

    let timer: ReturnType<typeof setTimeout> | undefined
    const timed_out = await Promise.race([
      pending.then(() => false),
      new Promise<boolean>(resolve => {
        timer = setTimeout(() => resolve(true), this.config.drain_timeout_ms)
      }),
    ])
    clearTimeout(timer)

    if (timed_out) {
      console.warn(
        `[sampler] Last GPU query did not settle within ${this.config.drain_timeout_ms}ms — its sample is dropped`
      )
    }
  }
}
