/**
 * @loopwatch/run-store — File Run Store
 *
 * One JSON file per run under the results directory:
 *   <results_dir>/<scenario>_<yyyyMMdd_HHmmss>_<run_id[0..8]>.json
 *
 * File body:
 *   { "format_version": 1, "run": RunRecord, "detection": DetectionResult | null }
 *
 * Writes go to a temp file first and are renamed into place.
 * A write that fails is fatal for that run and says how much telemetry
 * was not saved.
 */

import { mkdir, readdir, readFile, rename, writeFile } from 'fs/promises'
import { join } from 'path'
import type { DetectionResult, RunRecord } from '@loopwatch/types'
import { isRecord, parseDetection, parseRunRecord, ValidationError } from './validate'

export const RUN_FILE_FORMAT_VERSION = 1

export interface StoredRun {
  location: string
  run: RunRecord
  detection: DetectionResult | null
}

export interface RunStore {
  /** Persist a run (and its detection, if classified). Returns where it went. */
  save(run: RunRecord, detection?: DetectionResult | null): Promise<string>
  load(location: string): Promise<StoredRun>
  /** Every persisted run, oldest file name first. */
  list(): Promise<StoredRun[]>
}

export class PersistenceError extends Error {
  constructor(message: string, readonly location: string, cause?: unknown) {
    super(message, { cause })
    this.name = 'PersistenceError'
  }
}

export class RunFileFormatError extends Error {
  constructor(readonly location: string, reason: string) {
    super(`Malformed run file ${location}: ${reason}`)
    this.name = 'RunFileFormatError'
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

export function runFileName(run: RunRecord): string {
  const stamp = new Date(run.started_at).toISOString()   // 2026-10-18T09:15:02.123Z
  const date  = stamp.slice(0, 10).replace(/-/g, '')
  const time  = stamp.slice(11, 19).replace(/:/g, '')
  return `${run.scenario.toLowerCase()}_${date}_${time}_${run.run_id.slice(0, 8)}.json`
}

export function decodeRunFile(raw: unknown, location: string): StoredRun {
  try {
    if (!isRecord(raw)) throw new ValidationError('file must contain a JSON object')
    if (raw['format_version'] !== RUN_FILE_FORMAT_VERSION) {
      throw new ValidationError(`unsupported format_version ${String(raw['format_version'])}`)
    }
    const run = parseRunRecord(raw['run'])
    const detection = raw['detection'] === null || raw['detection'] === undefined
      ? null
      : parseDetection(raw['detection'])
    if (detection && detection.run_id !== run.run_id) {
      throw new ValidationError(`detection.run_id ${detection.run_id} does not match run.run_id ${run.run_id}`)
    }
    return { location, run, detection }
  } catch (err) {
    throw new RunFileFormatError(location, describe(err))
  }
}

export class FileRunStore implements RunStore {
  constructor(readonly results_dir: string) {}

  async save(run: RunRecord, detection: DetectionResult | null = null): Promise<string> {
    const location = join(this.results_dir, runFileName(run))
    const body = JSON.stringify(
      { format_version: RUN_FILE_FORMAT_VERSION, run, detection },
      null,
      2
    )

    try {
      await mkdir(this.results_dir, { recursive: true })
      const tmp = `${location}.tmp`
      await writeFile(tmp, body, 'utf8')
      await rename(tmp, location)
    } catch (err) {
      throw new PersistenceError(
        `Could not write results for run ${run.run_id} to ${location}: ${describe(err)} ` +
        `(${run.samples.length} sample(s) not persisted)`,
        location,
        err
      )
    }

    console.log(`[run-store] Saved ${run.scenario} run ${run.run_id} → ${location}`)
    return location
  }

  async load(location: string): Promise<StoredRun> {
    let text: string
    try {
      text = await readFile(location, 'utf8')
    } catch (err) {
      throw new PersistenceError(`Could not read run file ${location}: ${describe(err)}`, location, err)
    }

    let raw: unknown
    try {
      raw = JSON.parse(text)
    } catch (err) {
      throw new RunFileFormatError(location, `invalid JSON (${describe(err)})`)
    }
    return decodeRunFile(raw, location)
  }

  async list(): Promise<StoredRun[]> {
    let names: string[]
    try {
      names = await readdir(this.results_dir)
    } catch (err) {
      if (isRecord(err) && err['code'] === 'ENOENT') return []
      throw new PersistenceError(`Could not list ${this.results_dir}: ${describe(err)}`, this.results_dir, err)
    }

    const files = names.filter(n => n.endsWith('.json')).sort()
    const runs: StoredRun[] = []
    for (const name of files) {
      runs.push(await this.load(join(this.results_dir, name)))
    }
    return runs
  }
}
