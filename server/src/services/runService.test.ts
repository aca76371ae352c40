import { afterEach, describe, expect, it, vi } from 'vitest'
import { ConflictError, NotFoundError } from '../errors.js'
import { StubResultFetcher } from '../scraper/stubFetcher.js'
import type { ResultRow } from '../scraper/types.js'
import { RunRegistry } from './runService.js'

const row: ResultRow = {
  registerNumber: '1001',
  studentName: 'A STUDENT',
  subjectCode: 'UEN11',
  subjectName: 'Mathematics',
  marks: '70',
  result: 'P',
  status: 'PASS',
}

const stubFetcher = () =>
  new StubResultFetcher({ '1001': [{ subjectName: 'Math', result: 'P' }] })

afterEach(() => {
  vi.restoreAllMocks()
})

describe('RunRegistry', () => {
  it('drops the oldest finished runs beyond the history limit', () => {
    const registry = new RunRegistry({
      createFetcher: stubFetcher,
      delayMs: 0,
      historyLimit: 2,
    })

    const first = registry.importRows([row])
    const second = registry.importRows([row])
    const third = registry.importRows([row])

    expect(registry.list().map((run) => run.id)).toEqual([second.id, third.id])
    expect(() => registry.get(first.id)).toThrow(NotFoundError)
  })

  it('never evicts a scrape that is still running', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined)
    const registry = new RunRegistry({
      createFetcher: stubFetcher,
      delayMs: 0,
      historyLimit: 1,
    })

    const scrape = registry.start([{ registerNumber: '1001', dateOfBirth: '01/01/2000' }])
    registry.importRows([row])
    const latest = registry.importRows([row])

    expect(registry.list().map((run) => run.id)).toEqual([scrape.id, latest.id])
    expect(() => registry.start([])).toThrow(ConflictError)

    await scrape.done
    expect(registry.get(scrape.id).status).toBe('COMPLETED')
    expect(registry.get(scrape.id).table.size).toBe(1)
  })
})
