/**
 * @loopwatch/telemetry-sampler — GPU Point Query
 *
 * The harness treats the GPU metrics source as an opaque point-query:
 * one call, one (utilization %, memory used) reading, or a rejection.
 *
 * NvidiaSmiGpuQuery shells out to nvidia-smi once per call:
 *   nvidia-smi --query-gpu=utilization.gpu,memory.used --format=csv,noheader,nounits -i <index>
 * Output is a single CSV line, e.g. "87, 10240".
 */

import { execFile } from 'child_process'
import { promisify } from 'util'
import type { GpuReading } from '@loopwatch/types'

const execFileAsync = promisify(execFile)

export interface GpuQuery {
  readonly name: string
  query(): Promise<GpuReading>
}

export class GpuQueryError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'GpuQueryError'
  }
}

// ─── nvidia-smi ───────────────────────────────────────────────────────────────

export interface NvidiaSmiConfig {
  binary: string
  gpu_index: number
  timeout_ms: number
}

export function parseNvidiaSmiLine(output: string): GpuReading {
  const line = output.split('\n').map(l => l.trim()).find(l => l.length > 0)
  if (!line) throw new GpuQueryError('nvidia-smi returned no data')

  const fields = line.split(',').map(f => f.trim())
  if (fields.length < 2) {
    throw new GpuQueryError(`Unexpected nvidia-smi output: "${line}"`)
  }

  const utilization_pct = Number(fields[0])
  const memory_used_mb  = Number(fields[1])
  if (fields[0] === '' || fields[1] === '' ||
      !Number.isFinite(utilization_pct) || !Number.isFinite(memory_used_mb)) {
    // "[N/A]" or "[GPU is lost]" land here
    throw new GpuQueryError(`Unreadable nvidia-smi values: "${line}"`)
  }
  if (utilization_pct < 0 || utilization_pct > 100 || memory_used_mb < 0) {
    throw new GpuQueryError(`nvidia-smi values out of range: "${line}"`)
  }

  return { utilization_pct, memory_used_mb }
}

export class NvidiaSmiGpuQuery implements GpuQuery {
  readonly name = 'nvidia-smi'
  private readonly config: NvidiaSmiConfig

  constructor(config?: Partial<NvidiaSmiConfig>) {
    this.config = {
      binary:     config?.binary     ?? 'nvidia-smi',
      gpu_index:  config?.gpu_index  ?? 0,
      timeout_ms: config?.timeout_ms ?? 2_000,
    }
  }

  async query(): Promise<GpuReading> {
    const { binary, gpu_index, timeout_ms } = this.config
    try {
      const { stdout } = await execFileAsync(
        binary,
        [
          '--query-gpu=utilization.gpu,memory.used',
          '--format=csv,noheader,nounits',
          '-i', String(gpu_index),
        ],
        { timeout: timeout_ms }
      )
      return parseNvidiaSmiLine(stdout)
    } catch (err) {
      if (err instanceof GpuQueryError) throw err
      throw new GpuQueryError(
        `nvidia-smi query failed: ${err instanceof Error ? err.message : String(err)}`
      )
    }
  }
}
