/**
 * @loopwatch/event-bus — Publisher Helpers
 *
 * Typed publish functions for each lifecycle event.
 * Every publish auto-injects: event_id, timestamp, source.
 * The run_id doubles as the correlation_id.
 */

import { v4 as uuidv4 } from 'uuid'
import type {
  RunStartedEvent,
  SampleFailedEvent,
  RunCompletedEvent,
  RunTimedOutEvent,
  RunFailedEvent,
  RunClassifiedEvent,
  RunPersistedEvent,
} from '@loopwatch/types'
import type { HarnessEventBus } from './event-bus'

type Payload<T> = Omit<T, 'event_id' | 'correlation_id' | 'timestamp' | 'source' | 'type'>

function base(source: string, run_id: string) {
  return {
    event_id: uuidv4(),
    correlation_id: run_id,
    timestamp: new Date().toISOString(),
    source,
  }
}

export interface RunPublisher {
  runStarted(payload: Payload<RunStartedEvent>): Promise<void>
  sampleFailed(payload: Payload<SampleFailedEvent>): Promise<void>
  runCompleted(payload: Payload<RunCompletedEvent>): Promise<void>
  runTimedOut(payload: Payload<RunTimedOutEvent>): Promise<void>
  runFailed(payload: Payload<RunFailedEvent>): Promise<void>
  runClassified(payload: Payload<RunClassifiedEvent>): Promise<void>
  runPersisted(payload: Payload<RunPersistedEvent>): Promise<void>
}

/** Bind the publish helpers to a bus and a source name. */
export function createPublisher(bus: HarnessEventBus, source: string): RunPublisher {
  return {
    runStarted: payload => bus.publish({
      ...base(source, payload.run_id),
      type: 'run.started',
      ...payload,
    }),
    sampleFailed: payload => bus.publish({
      ...base(source, payload.run_id),
      type: 'run.sample_failed',
      ...payload,
    }),
    runCompleted: payload => bus.publish({
      ...base(source, payload.run_id),
      type: 'run.completed',
      ...payload,
    }),
    runTimedOut: payload => bus.publish({
      ...base(source, payload.run_id),
      type: 'run.timed_out',
      ...payload,
    }),
    runFailed: payload => bus.publish({
      ...base(source, payload.run_id),
      type: 'run.failed',
      ...payload,
    }),
    runClassified: payload => bus.publish({
      ...base(source, payload.run_id),
      type: 'run.classified',
      ...payload,
    }),
    runPersisted: payload => bus.publish({
      ...base(source, payload.run_id),
      type: 'run.persisted',
      ...payload,
    }),
  }
}
