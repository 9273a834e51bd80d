/**
 * @loopwatch/scenario-runner — Agent Boundary
 *
 * The third-party agent stack is an opaque callable: given a payload it
 * either replies, rejects, or never settles. The harness only ever talks
 * to it through AgentInvoker so that tests can swap in a fake.
 *
 * Three agent roles take part in a purchase:
 *   merchant              — product search
 *   credentials_provider  — stored payment methods
 *   payment_processor     — charges the selected method
 */

export type AgentRole = 'merchant' | 'credentials_provider' | 'payment_processor'

export interface AgentPayload {
  role: AgentRole
  text: string
  attempt?: number          // set on retried calls
}

export interface AgentReply {
  ok: boolean
  status_code: number
  text: string
}

export interface AgentInvoker {
  readonly name: string
  /** Must honour `signal`: once it aborts, settle (or reject) as soon as possible. */
  invoke(payload: AgentPayload, signal: AbortSignal): Promise<AgentReply>
}

export class AgentInvocationError extends Error {
  constructor(message: string, readonly status_code?: number) {
    super(message)
    this.name = 'AgentInvocationError'
  }
}

export const ROLE_LABELS: Record<AgentRole, string> = {
  merchant:             'Merchant query',
  credentials_provider: 'Payment methods',
  payment_processor:    'Payment',
}
