/**
 * AUTOMATED TEST SUITE: Telemetry Sampler
 * Sampling loop ordering, failure tolerance and nvidia-smi parsing
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import {
  GpuQueryError,
  LoadSignal,
  SamplerStateError,
  SimulatedGpuQuery,
  TelemetrySampler,
  parseNvidiaSmiLine,
  type GpuQuery,
} from '@loopwatch/telemetry-sampler'
import { fixedGpu, T0 } from '../helpers'

const clock = () => Date.now()

describe('TelemetrySampler', () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(T0)
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.useRealTimers()
    vi.restoreAllMocks()
  })

  it('samples immediately and then once per interval', async () => {
    const sampler = new TelemetrySampler(fixedGpu(), { interval_ms: 100, clock })
    sampler.start()
    await vi.advanceTimersByTimeAsync(350)
    const samples = await sampler.stop()

    expect(samples.map(s => s.elapsed_ms)).toEqual([0, 100, 200, 300])
    expect(samples.map(s => s.timestamp)).toEqual([T0, T0 + 100, T0 + 200, T0 + 300])
    expect(sampler.started_at).toBe(T0)
  })

  it('returns frozen samples in strictly increasing timestamp order', async () => {
    const sampler = new TelemetrySampler(fixedGpu({ utilization_pct: 33, memory_used_mb: 512 }), { clock })
    sampler.start(50)
    await vi.advanceTimersByTimeAsync(500)
    const samples = await sampler.stop()

    expect(samples.length).toBe(11)
    for (let i = 1; i < samples.length; i++) {
      expect(samples[i].timestamp).toBeGreaterThan(samples[i - 1].timestamp)
    }
    expect(Object.isFrozen(samples)).toBe(true)
    expect(Object.isFrozen(samples[0])).toBe(true)
    expect(samples[0]).toEqual({
      timestamp: T0, elapsed_ms: 0, gpu_utilization_pct: 33, gpu_memory_used_mb: 512,
    })
  })

  it('skips a failing tick and keeps sampling', async () => {
    let call = 0
    const gpu: GpuQuery = {
      name: 'flaky',
      query: async () => {
        call++
        if (call === 2 || call === 3) throw new GpuQueryError('GPU is lost')
        return { utilization_pct: 20, memory_used_mb: 100 }
      },
    }
    const onTickFailed = vi.fn()
    const sampler = new TelemetrySampler(gpu, { interval_ms: 100, clock, onTickFailed })

    sampler.start()
    await vi.advanceTimersByTimeAsync(350)
    const samples = await sampler.stop()

    expect(samples.map(s => s.elapsed_ms)).toEqual([0, 300])
    expect(sampler.failed_ticks).toBe(2)
    expect(onTickFailed).toHaveBeenCalledTimes(2)
    expect(onTickFailed).toHaveBeenNthCalledWith(2, 2, expect.any(GpuQueryError))
  })

  it('does not let a throwing onTickFailed handler stop the loop', async () => {
    const gpu: GpuQuery = { name: 'dead', query: async () => { throw new Error('no device') } }
    const sampler = new TelemetrySampler(gpu, {
      interval_ms: 100,
      clock,
      onTickFailed: () => { throw new Error('handler broke') },
    })

    sampler.start()
    await vi.advanceTimersByTimeAsync(250)
    const samples = await sampler.stop()

    expect(samples).toEqual([])
    expect(sampler.failed_ticks).toBe(3)
  })

  it('skips ticks while a slow query is still running, then drains the last one', async () => {
    const gpu: GpuQuery = {
      name: 'slow',
      query: () => new Promise(resolve =>
        setTimeout(() => resolve({ utilization_pct: 90, memory_used_mb: 100 }), 250)
      ),
    }
    const sampler = new TelemetrySampler(gpu, { interval_ms: 100, clock })

    sampler.start()                              // query #1: 0 → 250
    await vi.advanceTimersByTimeAsync(350)       // ticks at 100 and 200 skipped; query #2: 300 → 550
    const stopping = sampler.stop()
    await vi.advanceTimersByTimeAsync(300)
    const samples = await stopping

    expect(samples.map(s => s.elapsed_ms)).toEqual([0, 300])
    expect(sampler.skipped_ticks).toBe(2)
  })

  it('rejects invalid state transitions and intervals', async () => {
    const sampler = new TelemetrySampler(fixedGpu(), { clock })
    await expect(sampler.stop()).rejects.toBeInstanceOf(SamplerStateError)
    expect(() => sampler.start(0)).toThrow(SamplerStateError)

    sampler.start(100)
    expect(() => sampler.start(100)).toThrow('Sampler cannot start from state SAMPLING')
    await sampler.stop()
    expect(() => sampler.start(100)).toThrow('Sampler cannot start from state STOPPED')
  })
})

describe('SimulatedGpuQuery', () => {
  it('reads busy while a call is in flight, a burst once after it ends, then idle', async () => {
    const load = new LoadSignal()
    const gpu  = new SimulatedGpuQuery(load)

    expect(await gpu.query()).toEqual({ utilization_pct: 4, memory_used_mb: 2048 })

    const done = load.begin()
    expect(await gpu.query()).toEqual({ utilization_pct: 92, memory_used_mb: 2560 })

    done()
    done()   // idempotent
    expect(load.active).toBe(0)
    expect(load.total_pulses).toBe(1)
    expect(await gpu.query()).toEqual({ utilization_pct: 75, memory_used_mb: 2048 })
    expect(await gpu.query()).toEqual({ utilization_pct: 4, memory_used_mb: 2048 })
  })
})

describe('parseNvidiaSmiLine', () => {
  it('parses utilization and memory from csv,noheader,nounits output', () => {
    expect(parseNvidiaSmiLine('45, 1024\n')).toEqual({ utilization_pct: 45, memory_used_mb: 1024 })
    expect(parseNvidiaSmiLine('\n  7 , 512  \n')).toEqual({ utilization_pct: 7, memory_used_mb: 512 })
  })

  it('uses the first line when several GPUs answer', () => {
    expect(parseNvidiaSmiLine('12, 300\n99, 8000\n')).toEqual({ utilization_pct: 12, memory_used_mb: 300 })
  })

  it('rejects empty, short, unreadable and out-of-range output', () => {
    expect(() => parseNvidiaSmiLine('')).toThrow('nvidia-smi returned no data')
    expect(() => parseNvidiaSmiLine('42')).toThrow('Unexpected nvidia-smi output: "42"')
    expect(() => parseNvidiaSmiLine('[N/A], 100')).toThrow(GpuQueryError)
    expect(() => parseNvidiaSmiLine('150, 100')).toThrow('nvidia-smi values out of range: "150, 100"')
  })

  it('rejects a blank field instead of reading it as zero', () => {
    expect(() => parseNvidiaSmiLine(', 100')).toThrow('Unreadable nvidia-smi values: ", 100"')
    expect(() => parseNvidiaSmiLine('45, ')).toThrow(GpuQueryError)
  })
})
