/**
 * @loopwatch/scenario-runner — Run Lifecycle
 *
 *   IDLE → SAMPLING → COMPLETED | TIMED_OUT | FAILED
 *   COMPLETED | TIMED_OUT → CLASSIFIED
 *
 * FAILED and CLASSIFIED are terminal.
 */

import type { RunRecord, RunState } from '@loopwatch/types'

const TRANSITIONS: Record<RunState, readonly RunState[]> = {
  IDLE:       ['SAMPLING'],
  SAMPLING:   ['COMPLETED', 'TIMED_OUT', 'FAILED'],
  COMPLETED:  ['CLASSIFIED'],
  TIMED_OUT:  ['CLASSIFIED'],
  FAILED:     [],
  CLASSIFIED: [],
}

export class IllegalTransitionError extends Error {
  constructor(readonly run_id: string, readonly from: RunState, readonly to: RunState) {
    super(`Run ${run_id}: illegal transition ${from} → ${to}`)
    this.name = 'IllegalTransitionError'
  }
}

export class RunLifecycle {
  private current: RunState
  private readonly trail: Array<{ state: RunState; at: number }>

  constructor(readonly run_id: string, initial: RunState = 'IDLE', private readonly clock: () => number = Date.now) {
    this.current = initial
    this.trail = [{ state: initial, at: clock() }]
  }

  /** Pick a finished run back up, e.g. to classify a record loaded from disk. */
  static fromRecord(record: RunRecord, clock?: () => number): RunLifecycle {
    return new RunLifecycle(record.run_id, record.status, clock)
  }

  get state(): RunState {
    return this.current
  }

  get history(): ReadonlyArray<{ state: RunState; at: number }> {
    return this.trail
  }

  get isTerminal(): boolean {
    return TRANSITIONS[this.current].length === 0
  }

  canTransition(to: RunState): boolean {
    return TRANSITIONS[this.current].includes(to)
  }

  transition(to: RunState): void {
    if (!this.canTransition(to)) {
      throw new IllegalTransitionError(this.run_id, this.current, to)
    }
    this.current = to
    this.trail.push({ state: to, at: this.clock() })
  }
}
