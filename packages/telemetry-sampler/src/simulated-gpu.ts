/**
 * @loopwatch/telemetry-sampler — Simulated GPU
 *
 * For machines without a GPU. Utilization follows agent activity:
 *   - a call in flight            → busy_pct (the agent is "thinking")
 *   - a call finished since read  → burst_pct
 *   - nothing happened            → idle_pct
 *
 * The simulated agent drives the shared LoadSignal; this query only reads it.
 * Readings are deterministic so that recorded runs are reproducible.
 */

import type { GpuReading } from '@loopwatch/types'
import type { GpuQuery } from './gpu-query'

export class LoadSignal {
  private in_flight = 0
  private pulses = 0

  /** Mark one agent call as in flight. Call the returned function when it settles. */
  begin(): () => void {
    this.in_flight++
    let ended = false
    return () => {
      if (ended) return
      ended = true
      this.in_flight--
      this.pulses++
    }
  }

  pulse(): void {
    this.pulses++
  }

  get active(): number {
    return this.in_flight
  }

  get total_pulses(): number {
    return this.pulses
  }
}

export interface SimulatedGpuConfig {
  idle_pct: number
  burst_pct: number
  busy_pct: number
  base_memory_mb: number
  memory_per_call_mb: number
}

export class SimulatedGpuQuery implements GpuQuery {
  readonly name = 'simulated'
  private readonly config: SimulatedGpuConfig
  private pulses_seen = 0

  constructor(private readonly load: LoadSignal, config?: Partial<SimulatedGpuConfig>) {
    this.config = {
      idle_pct:           config?.idle_pct           ?? 4,
      burst_pct:          config?.burst_pct          ?? 75,
      busy_pct:           config?.busy_pct           ?? 92,
      base_memory_mb:     config?.base_memory_mb     ?? 2_048,
      memory_per_call_mb: config?.memory_per_call_mb ?? 512,
    }
  }

  async query(): Promise<GpuReading> {
    const pulses = this.load.total_pulses
    const fresh  = pulses > this.pulses_seen
    this.pulses_seen = pulses

    const active = this.load.active
    const utilization_pct =
      active > 0 ? this.config.busy_pct :
      fresh      ? this.config.burst_pct :
                   this.config.idle_pct

    return {
      utilization_pct,
      memory_used_mb: this.config.base_memory_mb + active * this.config.memory_per_call_mb,
    }
  }
}
