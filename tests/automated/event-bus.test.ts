/**
 * AUTOMATED TEST SUITE: Event Bus & Run Log
 * Bulkhead delivery, type filtering and the run-log line format
 */
import { describe, it, expect, vi, afterEach } from 'vitest'
import { ScenarioKind, type HarnessEvent } from '@loopwatch/types'
import { HarnessEventBus, createPublisher } from '@loopwatch/event-bus'
import { describeEvent, startRunLogSubscriber, type LogLevel } from '@loopwatch/harness-core'

const RUN_ID = '0123abcd-0000-4000-8000-000000000000'

describe('HarnessEventBus', () => {
  afterEach(() => { vi.restoreAllMocks() })

  it('keeps delivering when one handler throws', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
    const bus  = new HarnessEventBus()
    const good = vi.fn()
    bus.subscribeAll('broken', () => { throw new Error('sink offline') })
    bus.subscribeAll('good', good)

    await createPublisher(bus, 'test').runFailed({ run_id: RUN_ID, scenario: ScenarioKind.NORMAL, error: 'down' })

    expect(good).toHaveBeenCalledTimes(1)
    expect(bus.getStats()).toMatchObject({
      events_published: 1,
      events_delivered: 1,
      events_dropped: 1,
      active_subscriptions: 2,
      subscriber_ids: ['broken', 'good'],
    })
  })

  it('delivers only the subscribed event types', async () => {
    const bus  = new HarnessEventBus()
    const seen: string[] = []
    bus.subscribe('timeouts', ['run.timed_out'], event => { seen.push(`${event.scenario}:${event.steps}`) })
    const publish = createPublisher(bus, 'test')

    await publish.runStarted({ run_id: RUN_ID, scenario: ScenarioKind.INFINITE_LOOP, sample_interval_ms: 100, timeout_ms: 30_000 })
    await publish.runTimedOut({ run_id: RUN_ID, scenario: ScenarioKind.INFINITE_LOOP, duration_ms: 30_000, sample_count: 300, steps: 1 })

    expect(seen).toEqual(['INFINITE_LOOP:1'])
  })

  it('stops delivering after unsubscribe', async () => {
    const bus     = new HarnessEventBus()
    const handler = vi.fn()
    const sub     = bus.subscribeAll('once', handler)
    const publish = createPublisher(bus, 'test')

    await publish.runPersisted({ run_id: RUN_ID, status: 'COMPLETED', location: 'memory://x' })
    sub.unsubscribe()
    await publish.runPersisted({ run_id: RUN_ID, status: 'COMPLETED', location: 'memory://y' })

    expect(handler).toHaveBeenCalledTimes(1)
    expect(bus.getStats().active_subscriptions).toBe(0)
  })

  it('stamps the run id as correlation id', async () => {
    const bus = new HarnessEventBus()
    const events: HarnessEvent[] = []
    bus.subscribeAll('capture', e => { events.push(e) })

    await createPublisher(bus, 'loopwatch.test').sampleFailed({ run_id: RUN_ID, failed_ticks: 2, error: 'GPU is lost' })

    expect(events[0]).toMatchObject({
      type: 'run.sample_failed',
      correlation_id: RUN_ID,
      source: 'loopwatch.test',
      failed_ticks: 2,
    })
    expect(typeof events[0].event_id).toBe('string')
  })
})

describe('run-log subscriber', () => {
  it('writes one prefixed line per event with its level', async () => {
    const bus   = new HarnessEventBus()
    const lines: Array<[LogLevel, string]> = []
    startRunLogSubscriber({ bus, sink: (level, line) => { lines.push([level, line]) } })

    await createPublisher(bus, 'test').runClassified({
      run_id: RUN_ID,
      scenario: ScenarioKind.RETRY_STORM,
      predicted: ScenarioKind.RETRY_STORM,
      score: 0.875,
      verdict: 'TRUE_POSITIVE',
      detection_latency_ms: 1_200,
    })

    expect(lines).toHaveLength(1)
    const [level, line] = lines[0]
    expect(level).toBe('INFO')
    expect(line).toMatch(
      /^\[run-log\] \S+ INFO run\.classified 0123abcd RETRY_STORM classified as RETRY_STORM \(TRUE_POSITIVE, score 0\.88\)$/
    )
  })

  it('describes failures and timeouts', () => {
    const base = { event_id: 'e', correlation_id: RUN_ID, timestamp: 't', source: 's', run_id: RUN_ID }
    expect(describeEvent({ ...base, type: 'run.failed', scenario: ScenarioKind.NORMAL, error: 'Agent not reachable' }))
      .toBe('0123abcd NORMAL failed: Agent not reachable')
    expect(describeEvent({
      ...base, type: 'run.timed_out', scenario: ScenarioKind.INFINITE_LOOP, duration_ms: 30_000, sample_count: 300, steps: 1,
    })).toBe('0123abcd INFINITE_LOOP timed out after 30000ms, 300 sample(s)')
  })

  it('survives a sink that throws', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
    const bus = new HarnessEventBus()
    startRunLogSubscriber({ bus, sink: () => { throw new Error('disk full') } })

    await createPublisher(bus, 'test').runPersisted({ run_id: RUN_ID, status: 'FAILED', location: '/tmp/x.json' })

    expect(bus.getStats().events_dropped).toBe(0)
    vi.restoreAllMocks()
  })
})
