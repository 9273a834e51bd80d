/**
 * @loopwatch/scenario-runner — Scenario Drivers
 *
 * One driver per scenario. A driver decides what to send to the agent and
 * when to stop; it reports the raw outcome but knows nothing about timeouts
 * or telemetry. The runner owns both.
 *
 *   NORMAL         browse → list payment methods → pay, stop at first non-OK
 *   INFINITE_LOOP  ask for a mug that is red AND blue until the agent gives up
 *   RETRY_STORM    browse once, then hammer the payment processor with retries
 */

import { ScenarioKind, type AgentOutcome } from '@loopwatch/types'
import { ROLE_LABELS, type AgentInvoker, type AgentPayload } from './agent'
import { pause } from './pause'

export interface ScenarioDriver {
  readonly scenario: ScenarioKind
  drive(agent: AgentInvoker, signal: AbortSignal): Promise<AgentOutcome>
}

export interface DriverConfig {
  think_time_ms: number        // NORMAL: pause between purchase steps
  loop_pause_ms: number        // INFINITE_LOOP: pause between attempts
  loop_max_attempts: number
  browse_pause_ms: number      // RETRY_STORM: pause after the browse call
  retry_backoff_ms: number
  retry_max: number
}

export const DEFAULT_DRIVER_CONFIG: DriverConfig = {
  think_time_ms:     500,
  loop_pause_ms:     300,
  loop_max_attempts: 20,
  browse_pause_ms:   300,
  retry_backoff_ms:  200,
  retry_max:         15,
}

export const CONTRADICTORY_MANDATE =
  'Find me a coffee mug that is simultaneously bright red and deep blue'

const GIVE_UP = /cannot find|impossible/i

function message(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

// ─── Normal ───────────────────────────────────────────────────────────────────

export class NormalPurchaseDriver implements ScenarioDriver {
  readonly scenario = ScenarioKind.NORMAL

  constructor(private readonly config: DriverConfig) {}

  async drive(agent: AgentInvoker, signal: AbortSignal): Promise<AgentOutcome> {
    const plan: AgentPayload[] = [
      { role: 'merchant',             text: 'Show me coffee mugs under $15' },
      { role: 'credentials_provider', text: 'List my available payment methods' },
      { role: 'payment_processor',    text: 'Process payment for $12.99 using saved card' },
    ]

    let steps = 0
    for (const payload of plan) {
      if (steps > 0) await pause(this.config.think_time_ms, signal)
      if (signal.aborted) {
        return { agent_succeeded: false, steps, error_message: 'Aborted' }
      }

      // A rejection here is an invocation error; the runner decides FAILED vs COMPLETED
      const reply = await agent.invoke(payload, signal)
      steps++

      if (!reply.ok) {
        return {
          agent_succeeded: false,
          steps,
          error_message: `${ROLE_LABELS[payload.role]} failed: ${reply.status_code}`,
        }
      }
    }

    return { agent_succeeded: true, steps }
  }
}

// ─── Infinite Loop ────────────────────────────────────────────────────────────

export class ContradictoryMandateDriver implements ScenarioDriver {
  readonly scenario = ScenarioKind.INFINITE_LOOP

  constructor(private readonly config: DriverConfig) {}

  async drive(agent: AgentInvoker, signal: AbortSignal): Promise<AgentOutcome> {
    let attempts = 0

    while (!signal.aborted && attempts < this.config.loop_max_attempts) {
      try {
        const reply = await agent.invoke(
          { role: 'merchant', text: CONTRADICTORY_MANDATE, attempt: attempts },
          signal
        )
        attempts++
        // The agent recognising the contradiction is the only clean exit
        if (reply.status_code === 404 || GIVE_UP.test(reply.text)) {
          return { agent_succeeded: true, steps: attempts }
        }
      } catch (err) {
        attempts++
        if (!signal.aborted) {
          console.log(`[scenario] contradictory mandate attempt ${attempts} failed: ${message(err)}`)
        }
      }
      await pause(this.config.loop_pause_ms, signal)
    }

    return {
      agent_succeeded: false,
      steps: attempts,
      error_message: `Gave up after ${attempts} attempt(s) (contradictory mandate)`,
    }
  }
}

// ─── Retry Storm ──────────────────────────────────────────────────────────────

export class PaymentRetryStormDriver implements ScenarioDriver {
  readonly scenario = ScenarioKind.RETRY_STORM

  constructor(private readonly config: DriverConfig) {}

  async drive(agent: AgentInvoker, signal: AbortSignal): Promise<AgentOutcome> {
    try {
      await agent.invoke({ role: 'merchant', text: 'Show me coffee mugs' }, signal)
    } catch (err) {
      // The storm is about payments; a failed browse does not stop it
      console.log(`[scenario] browse call before retry storm failed: ${message(err)}`)
    }
    await pause(this.config.browse_pause_ms, signal)

    let retries = 0
    while (!signal.aborted && retries < this.config.retry_max) {
      try {
        // The reply is not inspected: every attempt is retried until the limit
        await agent.invoke(
          {
            role: 'payment_processor',
            text: `Process payment for $12.99 (attempt ${retries})`,
            attempt: retries,
          },
          signal
        )
      } catch (err) {
        if (!signal.aborted) {
          console.log(`[scenario] payment attempt ${retries} failed: ${message(err)}`)
        }
      }
      retries++
      await pause(this.config.retry_backoff_ms, signal)
    }

    return {
      agent_succeeded: false,
      steps: retries + 1,
      error_message: `Payment retry limit exceeded (${retries} retries)`,
    }
  }
}

// ─── Factory ──────────────────────────────────────────────────────────────────

export function createDrivers(config?: Partial<DriverConfig>): Record<ScenarioKind, ScenarioDriver> {
  const resolved: DriverConfig = { ...DEFAULT_DRIVER_CONFIG, ...config }
  return {
    [ScenarioKind.NORMAL]:        new NormalPurchaseDriver(resolved),
    [ScenarioKind.INFINITE_LOOP]: new ContradictoryMandateDriver(resolved),
    [ScenarioKind.RETRY_STORM]:   new PaymentRetryStormDriver(resolved),
  }
}
