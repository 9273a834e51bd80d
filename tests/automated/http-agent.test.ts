/**
 * AUTOMATED TEST SUITE: HTTP Agent Invoker
 * Request shape, credentials, status handling and transport error mapping.
 * Requests are served by an in-process axios adapter.
 */
import { describe, it, expect } from 'vitest'
import { AxiosError, type AxiosAdapter, type InternalAxiosRequestConfig } from 'axios'
import {
  AgentInvocationError,
  HttpAgentInvoker,
  defaultEndpoints,
} from '@loopwatch/scenario-runner'

const live = () => new AbortController().signal

function replying(status: number, data: unknown) {
  const seen: InternalAxiosRequestConfig[] = []
  const adapter: AxiosAdapter = async config => {
    seen.push(config)
    return { data, status, statusText: String(status), headers: {}, config }
  }
  return { adapter, seen }
}

function failing(code: string, message: string): AxiosAdapter {
  return async config => {
    throw new AxiosError(message, code, config)
  }
}

function invoker(adapter: AxiosAdapter, api_key?: string): HttpAgentInvoker {
  return new HttpAgentInvoker({
    endpoints: defaultEndpoints('http://agents.test'),
    request_timeout_ms: 50,
    api_key,
    adapter,
  })
}

describe('HttpAgentInvoker', () => {
  it('posts one A2A user message to the endpoint of the role', async () => {
    const { adapter, seen } = replying(200, { result: 'mugs' })
    const agent = invoker(adapter)

    const reply = await agent.invoke({ role: 'merchant', text: 'Show me coffee mugs' }, live())
    await agent.invoke({ role: 'payment_processor', text: 'Process payment for $12.99' }, live())

    expect(reply).toEqual({ ok: true, status_code: 200, text: '{"result":"mugs"}' })
    expect(seen.map(c => c.url)).toEqual([
      'http://agents.test:8001/a2a/merchant_agent',
      'http://agents.test:8003/a2a/merchant_payment_processor_agent',
    ])
    expect(seen[0].method).toBe('post')
    expect(seen[0].headers.get('X-Client')).toBe('loopwatch/0.1.0')

    const first  = JSON.parse(String(seen[0].data))
    const second = JSON.parse(String(seen[1].data))
    expect(first).toMatchObject({ role: 'user', parts: [{ kind: 'text', text: 'Show me coffee mugs' }] })
    expect(first.message_id).toMatch(/^[0-9a-f]{32}$/)
    expect(second.context_id).toBe(first.context_id)
    expect(second.message_id).not.toBe(first.message_id)
  })

  it('sends a bearer token only when an API key is supplied', async () => {
    const withKey    = replying(200, 'ok')
    const withoutKey = replying(200, 'ok')

    await invoker(withKey.adapter, 'test-secret').invoke({ role: 'merchant', text: 'hi' }, live())
    await invoker(withoutKey.adapter).invoke({ role: 'merchant', text: 'hi' }, live())

    expect(withKey.seen[0].headers.get('Authorization')).toBe('Bearer test-secret')
    expect(withoutKey.seen[0].headers.has('Authorization')).toBe(false)
  })

  it('returns non-2xx statuses as replies', async () => {
    const { adapter } = replying(503, 'Payment processor unavailable')
    const reply = await invoker(adapter).invoke({ role: 'payment_processor', text: 'pay', attempt: 0 }, live())
    expect(reply).toEqual({ ok: false, status_code: 503, text: 'Payment processor unavailable' })
  })

  it('forwards the abort signal and rejects once it has fired', async () => {
    const { adapter, seen } = replying(200, 'ok')
    const controller = new AbortController()

    await invoker(adapter).invoke({ role: 'merchant', text: 'hi' }, controller.signal)
    expect(seen[0].signal).toBe(controller.signal)

    controller.abort()
    await expect(invoker(adapter).invoke({ role: 'merchant', text: 'hi' }, controller.signal))
      .rejects.toThrow('Agent request aborted')
    expect(seen).toHaveLength(1)
  })

  it('maps transport failures to readable invocation errors', async () => {
    const call = (adapter: AxiosAdapter) => invoker(adapter).invoke({ role: 'merchant', text: 'hi' }, live())

    await expect(call(failing('ECONNABORTED', 'timeout of 50ms exceeded')))
      .rejects.toThrow('Agent did not answer within 50ms')
    await expect(call(failing('ETIMEDOUT', 'connect ETIMEDOUT')))
      .rejects.toThrow('Agent did not answer within 50ms')
    await expect(call(failing('ECONNREFUSED', 'connect ECONNREFUSED 127.0.0.1:8001')))
      .rejects.toThrow('Agent not reachable at http://agents.test:8001/a2a/merchant_agent')

    const other = await call(failing('ERR_NETWORK', 'socket hang up')).catch((e: unknown) => e)
    expect(other).toBeInstanceOf(AgentInvocationError)
    expect(other instanceof Error && other.message).toBe('socket hang up')
  })
})
