/**
 * @loopwatch/run-store — In-Memory Run Store
 *
 * Implements RunStore without touching disk. Used for dry runs and tests.
 * Records go through the same encode/decode path as the file store, so
 * anything that would not survive a JSON round-trip fails here too.
 */

import type { DetectionResult, RunRecord } from '@loopwatch/types'
import {
  decodeRunFile,
  PersistenceError,
  RUN_FILE_FORMAT_VERSION,
  type RunStore,
  type StoredRun,
} from './file-run-store'

export class MemoryRunStore implements RunStore {
  private files = new Map<string, string>()

  async save(run: RunRecord, detection: DetectionResult | null = null): Promise<string> {
    const location = `memory://${run.run_id}`
    this.files.set(location, JSON.stringify({ format_version: RUN_FILE_FORMAT_VERSION, run, detection }))
    return location
  }

  async load(location: string): Promise<StoredRun> {
    const text = this.files.get(location)
    if (text === undefined) throw new PersistenceError(`No run stored at ${location}`, location)
    return decodeRunFile(JSON.parse(text), location)
  }

  async list(): Promise<StoredRun[]> {
    return Promise.all([...this.files.keys()].map(location => this.load(location)))
  }

  get size(): number {
    return this.files.size
  }
}
