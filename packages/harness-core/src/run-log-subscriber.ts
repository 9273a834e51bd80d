/**
 * @loopwatch/harness-core — Run Log Subscriber
 *
 * Subscribes to every lifecycle event on the bus and writes one line per
 * event. A failing sink is caught here; the bus keeps delivering to
 * everyone else.
 */

import type { HarnessEventBus, Subscription } from '@loopwatch/event-bus'
import type { HarnessEvent } from '@loopwatch/types'

export type LogLevel = 'INFO' | 'WARN' | 'ERROR'

const LEVELS: Record<HarnessEvent['type'], LogLevel> = {
  'run.started':       'INFO',
  'run.sample_failed': 'WARN',
  'run.completed':     'INFO',
  'run.timed_out':     'WARN',
  'run.failed':        'ERROR',
  'run.classified':    'INFO',
  'run.persisted':     'INFO',
}

export function describeEvent(event: HarnessEvent): string {
  const run = event.run_id.slice(0, 8)
  switch (event.type) {
    case 'run.started':
      return `${run} ${event.scenario} started (every ${event.sample_interval_ms}ms, timeout ${event.timeout_ms}ms)`
    case 'run.sample_failed':
      return `${run} sample failed (${event.failed_ticks} so far): ${event.error}`
    case 'run.completed':
      return `${run} ${event.scenario} completed in ${event.duration_ms}ms, ${event.sample_count} sample(s), agent ${event.agent_succeeded ? 'succeeded' : 'failed'}`
    case 'run.timed_out':
      return `${run} ${event.scenario} timed out after ${event.duration_ms}ms, ${event.sample_count} sample(s)`
    case 'run.failed':
      return `${run} ${event.scenario} failed: ${event.error}`
    case 'run.classified':
      return `${run} ${event.scenario} classified as ${event.predicted} (${event.verdict}, score ${event.score.toFixed(2)})`
    case 'run.persisted':
      return `${run} ${event.status} saved to ${event.location}`
  }
}

export interface RunLogSubscriberOptions {
  bus: HarnessEventBus
  /** Defaults to console.log / console.error by level. */
  sink?: (level: LogLevel, line: string) => void
}

function consoleSink(level: LogLevel, line: string): void {
  if (level === 'ERROR') console.error(line)
  else console.log(line)
}

export function startRunLogSubscriber(opts: RunLogSubscriberOptions): Subscription {
  const sink = opts.sink ?? consoleSink

  return opts.bus.subscribeAll('loopwatch.run-log', event => {
    const level = LEVELS[event.type]
    try {
      sink(level, `[run-log] ${event.timestamp} ${level} ${event.type} ${describeEvent(event)}`)
    } catch (err) {
      console.error('[run-log] Failed to write log line:', err)
    }
  })
}
