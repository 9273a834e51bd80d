/**
 * @loopwatch/scenario-runner — Simulated Agent
 *
 * In-process stand-in for the agent servers, used by `loopwatch run --simulate`
 * and by the tests. Behaviour per request:
 *   contradictory mandate (red AND blue)  → never settles until aborted
 *   retried payment (attempt set)         → 503 after failure_latency_ms
 *   anything else                         → 200 after latency_ms
 *
 * Every call marks the shared LoadSignal busy while it is in flight, so a
 * SimulatedGpuQuery reading the same signal sees the agent's activity.
 */

import type { LoadSignal } from '@loopwatch/telemetry-sampler'
import {
  AgentInvocationError,
  type AgentInvoker,
  type AgentPayload,
  type AgentReply,
} from './agent'
import { pause, untilAborted } from './pause'

const CONTRADICTION = /red\b.*\bblue|blue\b.*\bred/i

export interface SimulatedAgentConfig {
  latency_ms: number
  failure_latency_ms: number
}

export class SimulatedAgent implements AgentInvoker {
  readonly name = 'simulated'
  private readonly config: SimulatedAgentConfig

  constructor(private readonly load: LoadSignal, config?: Partial<SimulatedAgentConfig>) {
    this.config = {
      latency_ms:         config?.latency_ms         ?? 50,
      failure_latency_ms: config?.failure_latency_ms ?? 20,
    }
  }

  async invoke(payload: AgentPayload, signal: AbortSignal): Promise<AgentReply> {
    const done = this.load.begin()
    try {
      if (CONTRADICTION.test(payload.text)) {
        await untilAborted(signal)
        throw new AgentInvocationError('Agent request aborted')
      }

      if (payload.role === 'payment_processor' && payload.attempt !== undefined) {
        await pause(this.config.failure_latency_ms, signal)
        return { ok: false, status_code: 503, text: 'Payment processor unavailable' }
      }

      await pause(this.config.latency_ms, signal)
      if (signal.aborted) throw new AgentInvocationError('Agent request aborted')
      return { ok: true, status_code: 200, text: `${payload.role}: ${payload.text}` }
    } finally {
      done()
    }
  }
}
