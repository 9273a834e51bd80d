/**
 * @loopwatch/types — Main Export
 *
 * The shared language for the whole harness.
 * Every package and the CLI import from here.
 */

export * from './telemetry'
export * from './runs'
export * from './events'
