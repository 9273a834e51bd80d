/**
 * @loopwatch/event-bus — Public API
 */

export { HarnessEventBus } from './event-bus'
export type { Subscription, BusStats, EventHandler, EventOfType } from './event-bus'
export { createPublisher } from './publisher'
export type { RunPublisher } from './publisher'
