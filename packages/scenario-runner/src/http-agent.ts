/**
 * @loopwatch/scenario-runner — HTTP Agent Invoker
 *
 * Thin wrapper around axios for talking to the running agent servers.
 * Each call posts one A2A-style user message:
 *   { message_id, context_id, role: 'user', parts: [{ kind: 'text', text }] }
 *
 * Every HTTP status comes back as an AgentReply; only transport failures
 * (refused, timed out, aborted) reject, surfaced as readable messages.
 *
 * An API key, when one is needed, is supplied at runtime from the
 * environment. It is never written to the config store.
 */

import axios, { type AxiosAdapter, type AxiosInstance } from 'axios'
import { v4 as uuidv4 } from 'uuid'
import {
  AgentInvocationError,
  type AgentInvoker,
  type AgentPayload,
  type AgentReply,
  type AgentRole,
} from './agent'

export interface HttpAgentConfig {
  endpoints: Record<AgentRole, string>
  request_timeout_ms: number
  api_key?: string
  /** Transport override; the default is axios' own http adapter. */
  adapter?: AxiosAdapter
}

/** The default three-server layout: one port per agent role. */
export function defaultEndpoints(host = 'http://localhost'): Record<AgentRole, string> {
  const base = host.replace(/\/$/, '')
  return {
    merchant:             `${base}:8001/a2a/merchant_agent`,
    credentials_provider: `${base}:8002/a2a/credentials_provider_agent`,
    payment_processor:    `${base}:8003/a2a/merchant_payment_processor_agent`,
  }
}

export interface A2AMessage {
  message_id: string
  context_id: string
  role: 'user'
  parts: Array<{ kind: 'text'; text: string }>
}

export function buildA2AMessage(text: string, context_id: string): A2AMessage {
  return {
    message_id: uuidv4().replace(/-/g, ''),
    context_id,
    role: 'user',
    parts: [{ kind: 'text', text }],
  }
}

function buildClient(config: HttpAgentConfig): AxiosInstance {
  const client = axios.create({
    timeout: config.request_timeout_ms,
    adapter: config.adapter,
    headers: {
      'X-Client': 'loopwatch/0.1.0',
    },
    // Every status is a reply; the scenario driver decides what it means
    validateStatus: () => true,
  })

  client.interceptors.request.use(req => {
    if (config.api_key) req.headers['Authorization'] = `Bearer ${config.api_key}`
    return req
  })

  // Transform transport errors into readable messages
  client.interceptors.response.use(
    res => res,
    (err: unknown) => {
      if (axios.isCancel(err)) throw new AgentInvocationError('Agent request aborted')
      if (axios.isAxiosError(err)) {
        if (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT') {
          throw new AgentInvocationError(`Agent did not answer within ${config.request_timeout_ms}ms`)
        }
        if (err.code === 'ECONNREFUSED') {
          throw new AgentInvocationError(`Agent not reachable at ${err.config?.url ?? 'unknown url'}`)
        }
        throw new AgentInvocationError(err.message, err.response?.status)
      }
      throw new AgentInvocationError(err instanceof Error ? err.message : String(err))
    }
  )

  return client
}

export class HttpAgentInvoker implements AgentInvoker {
  readonly name = 'http'
  private readonly client: AxiosInstance
  private readonly context_id = uuidv4().replace(/-/g, '')

  constructor(private readonly config: HttpAgentConfig) {
    this.client = buildClient(config)
  }

  async invoke(payload: AgentPayload, signal: AbortSignal): Promise<AgentReply> {
    const url = this.config.endpoints[payload.role]
    const res = await this.client.post<unknown>(
      url,
      buildA2AMessage(payload.text, this.context_id),
      { signal }
    )
    return {
      ok:          res.status >= 200 && res.status < 300,
      status_code: res.status,
      text:        typeof res.data === 'string' ? res.data : JSON.stringify(res.data ?? ''),
    }
  }
}
