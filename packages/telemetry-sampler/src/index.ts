/**
 * @loopwatch/telemetry-sampler — Public API
 */

export { TelemetrySampler, SamplerStateError } from './sampler'
export type { SamplerConfig } from './sampler'
export { NvidiaSmiGpuQuery, GpuQueryError, parseNvidiaSmiLine } from './gpu-query'
export type { GpuQuery, NvidiaSmiConfig } from './gpu-query'
export { SimulatedGpuQuery, LoadSignal } from './simulated-gpu'
export type { SimulatedGpuConfig } from './simulated-gpu'
