/**
 * AUTOMATED TEST SUITE: Run Store
 * File persistence round-trips, malformed files and write failures
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { ScenarioKind } from '@loopwatch/types'
import {
  FileRunStore,
  MemoryRunStore,
  PersistenceError,
  RunFileFormatError,
  parseRunRecord,
  runFileName,
} from '@loopwatch/run-store'
import { Analyzer } from '@loopwatch/analyzer'
import { makeRecord, makeSamples, T0 } from '../helpers'

describe('runFileName', () => {
  it('encodes scenario, UTC start time and the run id prefix', () => {
    const record = makeRecord({ scenario: ScenarioKind.RETRY_STORM })
    expect(runFileName(record)).toBe('retry_storm_20261018_091502_abcdef12.json')
  })
})

describe('FileRunStore', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'loopwatch-store-'))
    vi.spyOn(console, 'log').mockImplementation(() => {})
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await rm(dir, { recursive: true, force: true })
  })

  it('round-trips a run and its detection', async () => {
    const store     = new FileRunStore(join(dir, 'results'))
    const record    = makeRecord({ samples: makeSamples([5, 90, 10, 85]) })
    const detection = new Analyzer({ clock: () => T0 }).classify(record)

    const location = await store.save(record, detection)
    expect(location).toBe(join(dir, 'results', 'normal_20261018_091502_abcdef12.json'))

    const loaded = await store.load(location)
    expect(loaded.run).toEqual(record)
    expect(loaded.detection).toEqual(detection)

    const body = JSON.parse(await readFile(location, 'utf8'))
    expect(body.format_version).toBe(1)
  })

  it('stores unclassified runs with a null detection', async () => {
    const store    = new FileRunStore(dir)
    const failed   = makeRecord({ status: 'FAILED', samples: [] })
    const location = await store.save(failed)
    expect((await store.load(location)).detection).toBeNull()
  })

  it('lists every run file sorted by name and ignores other files', async () => {
    const store = new FileRunStore(dir)
    await store.save(makeRecord({ scenario: ScenarioKind.RETRY_STORM }))
    await store.save(makeRecord({ scenario: ScenarioKind.INFINITE_LOOP, run_id: 'ffff0000-aaaa' }))
    await writeFile(join(dir, 'notes.txt'), 'not a run')

    const runs = await store.list()
    expect(runs.map(r => r.run.scenario)).toEqual([ScenarioKind.INFINITE_LOOP, ScenarioKind.RETRY_STORM])
  })

  it('lists nothing when the directory does not exist yet', async () => {
    expect(await new FileRunStore(join(dir, 'missing')).list()).toEqual([])
  })

  it('names the file when it is not valid JSON', async () => {
    const path = join(dir, 'broken.json')
    await writeFile(path, '{ "format_version": 1, "run": ')
    await expect(new FileRunStore(dir).load(path)).rejects.toBeInstanceOf(RunFileFormatError)
    await expect(new FileRunStore(dir).load(path)).rejects.toThrow(`Malformed run file ${path}: invalid JSON`)
  })

  it('rejects an unknown format version and a bad field', async () => {
    const store = new FileRunStore(dir)
    const v2 = join(dir, 'v2.json')
    await writeFile(v2, JSON.stringify({ format_version: 2, run: makeRecord(), detection: null }))
    await expect(store.load(v2)).rejects.toThrow(`Malformed run file ${v2}: unsupported format_version 2`)

    const bad = join(dir, 'bad.json')
    await writeFile(bad, JSON.stringify({
      format_version: 1,
      run: { ...makeRecord(), samples: makeSamples([10, 150]) },
      detection: null,
    }))
    await expect(store.load(bad)).rejects.toThrow(
      `Malformed run file ${bad}: run.samples[1].gpu_utilization_pct must be between 0 and 100`
    )
  })

  it('fails loudly, naming the path and the unsaved sample count', async () => {
    const blocker = join(dir, 'blocker')
    await writeFile(blocker, 'a file where the results directory should be')
    const store  = new FileRunStore(blocker)
    const record = makeRecord({ samples: makeSamples([10, 20]) })

    const err = await store.save(record).catch((e: unknown) => e)
    expect(err).toBeInstanceOf(PersistenceError)
    expect(err instanceof PersistenceError && err.location).toBe(join(blocker, runFileName(record)))
    expect(err instanceof Error && err.message).toMatch(/\(2 sample\(s\) not persisted\)$/)
  })
})

describe('MemoryRunStore', () => {
  it('keeps the same contract in memory', async () => {
    const store    = new MemoryRunStore()
    const record   = makeRecord()
    const location = await store.save(record)

    expect(location).toBe('memory://abcdef12-3456-4789-8abc-def012345678')
    expect((await store.load(location)).run).toEqual(record)
    expect(store.size).toBe(1)
    await expect(store.load('memory://nope')).rejects.toBeInstanceOf(PersistenceError)
  })
})

describe('parseRunRecord', () => {
  it('rejects samples that go back in time', () => {
    const samples = makeSamples([10, 20, 30])
    const shuffled = [samples[0], samples[2], samples[1]]
    expect(() => parseRunRecord({ ...makeRecord(), samples: shuffled }))
      .toThrow('run.samples must be strictly increasing in timestamp (index 2)')
  })
})
