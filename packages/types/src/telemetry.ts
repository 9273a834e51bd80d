/**
 * @loopwatch/types — Telemetry Definitions
 *
 * One GPU reading, as returned by a point-query, and one timestamped
 * sample, as recorded by the sampler. Samples are frozen the moment they
 * are appended to a run's buffer.
 */

// ─── GPU Reading ──────────────────────────────────────────────────────────────

export interface GpuReading {
  utilization_pct: number   // 0–100
  memory_used_mb: number
}

// ─── Telemetry Sample ─────────────────────────────────────────────────────────

export interface TelemetrySample {
  readonly timestamp: number          // epoch ms, strictly increasing within a run
  readonly elapsed_ms: number         // timestamp − run start
  readonly gpu_utilization_pct: number
  readonly gpu_memory_used_mb: number
}

export const DEFAULT_SAMPLE_INTERVAL_MS = 100
