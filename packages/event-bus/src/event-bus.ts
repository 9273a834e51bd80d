/**
 * @loopwatch/event-bus — Run Lifecycle Event Bus
 *
 * Every component publishes here: the runner announces starts, timeouts
 * and failures; the harness announces classification and persistence.
 * The CLI and the run-log subscriber listen.
 *
 * Bulkhead design:
 *   - Publishers never know who is subscribed. A throwing handler is
 *     caught and counted; it never propagates into the run.
 *   - Subscribers attach and detach at any time.
 */

import { v4 as uuidv4 } from 'uuid'
import type { HarnessEvent, HarnessEventType } from '@loopwatch/types'

// ─── Subscription Handle ──────────────────────────────────────────────────────

export interface Subscription {
  id: string
  subscriber_id: string
  event_types: HarnessEventType[] | '*'
  unsubscribe(): void
}

// ─── Bus Stats ────────────────────────────────────────────────────────────────

export interface BusStats {
  events_published: number
  events_delivered: number
  events_dropped: number      // Handler errors caught by bulkhead
  active_subscriptions: number
  subscriber_ids: string[]
}

// ─── Handler types ────────────────────────────────────────────────────────────

export type EventOfType<K extends HarnessEventType> = Extract<HarnessEvent, { type: K }>

export type EventHandler<T extends HarnessEvent = HarnessEvent> = (
  event: T
) => Promise<void> | void

interface SubscriptionRecord {
  subscriber_id: string
  deliver: (event: HarnessEvent) => Promise<void> | void
}

function isOfType<K extends HarnessEventType>(
  event: HarnessEvent,
  types: readonly K[]
): event is EventOfType<K> {
  return types.some(t => t === event.type)
}

// ─── Event Bus ────────────────────────────────────────────────────────────────

export class HarnessEventBus {
  private subscriptions = new Map<string, SubscriptionRecord>()
  private stats: BusStats = {
    events_published: 0,
    events_delivered: 0,
    events_dropped: 0,
    active_subscriptions: 0,
    subscriber_ids: [],
  }

  /**
   * Publish an event to every matching handler.
   * Each handler runs independently; a failing handler is caught.
   */
  async publish(event: HarnessEvent): Promise<void> {
    this.stats.events_published++

    await Promise.allSettled(
      [...this.subscriptions.values()].map(async ({ subscriber_id, deliver }) => {
        try {
          await deliver(event)
          this.stats.events_delivered++
        } catch (err) {
          this.stats.events_dropped++
          console.error(
            `[event-bus] Handler for ${event.type} from ${subscriber_id} threw:`,
            err instanceof Error ? err.message : err
          )
        }
      })
    )
  }

  /**
   * Subscribe to one or more event types.
   * Returns a handle with an unsubscribe() method.
   */
  subscribe<K extends HarnessEventType>(
    subscriber_id: string,
    event_types: K[],
    handler: EventHandler<EventOfType<K>>
  ): Subscription {
    return this.register(subscriber_id, event_types, event => {
      if (isOfType(event, event_types)) return handler(event)
    })
  }

  /** Subscribe to every lifecycle event. Used by the run-log subscriber. */
  subscribeAll(subscriber_id: string, handler: EventHandler<HarnessEvent>): Subscription {
    return this.register(subscriber_id, '*', handler)
  }

  getStats(): BusStats {
    return { ...this.stats, subscriber_ids: [...this.stats.subscriber_ids] }
  }

  private register(
    subscriber_id: string,
    event_types: HarnessEventType[] | '*',
    deliver: SubscriptionRecord['deliver']
  ): Subscription {
    const sub_id = uuidv4()
    this.subscriptions.set(sub_id, { subscriber_id, deliver })

    this.stats.active_subscriptions++
    if (!this.stats.subscriber_ids.includes(subscriber_id)) {
      this.stats.subscriber_ids.push(subscriber_id)
    }

    return {
      id: sub_id,
      subscriber_id,
      event_types,
      unsubscribe: () => {
        if (this.subscriptions.delete(sub_id)) this.stats.active_subscriptions--
      },
    }
  }
}
