import { randomUUID } from 'crypto'
import { ConflictError, NotFoundError, errorMessage } from '../errors.js'
import type {
  FailedLookup,
  ResultFetcher,
  ResultRow,
  ScrapeProgress,
  StudentQuery,
} from '../scraper/types.js'
import { ResultTable } from './resultTable.js'
import { createScrapeContext, runScrape } from './scrapeService.js'

export const DEFAULT_HISTORY_LIMIT = 10

export type RunStatus = 'RUNNING' | 'COMPLETED' | 'FAILED'

export type ScrapeRun = {
  id: string
  source: 'scrape' | 'import'
  status: RunStatus
  total: number
  completed: number
  currentRegisterNumber: string | null
  startedAt: Date
  finishedAt: Date | null
  statusMessage: string | null
  table: ResultTable
  failures: FailedLookup[]
  done: Promise<void>
}

export const serializeRun = (run: ScrapeRun) => ({
  id: run.id,
  source: run.source,
  status: run.status,
  total: run.total,
  completed: run.completed,
  currentRegisterNumber: run.currentRegisterNumber,
  startedAt: run.startedAt,
  finishedAt: run.finishedAt,
  statusMessage: run.statusMessage,
  rowCount: run.table.size,
  students: run.table.registerNumbers().length,
  failures: run.failures,
})

// Only one scrape may run at a time; it owns the browser session.
export class RunRegistry {
  private runs = new Map<string, ScrapeRun>()

  constructor(
    private readonly options: {
      createFetcher: () => ResultFetcher
      delayMs: number
      historyLimit?: number
      wait?: (ms: number) => Promise<unknown>
    },
  ) {}

  // Finished runs beyond the history limit are dropped oldest first.
  private remember(run: ScrapeRun) {
    this.runs.set(run.id, run)
    const limit = Math.max(1, this.options.historyLimit ?? DEFAULT_HISTORY_LIMIT)
    const finished = this.list().filter((entry) => entry.status !== 'RUNNING')
    for (const stale of finished.slice(0, Math.max(0, finished.length - limit))) {
      this.runs.delete(stale.id)
    }
  }

  start(queries: readonly StudentQuery[]) {
    const active = Array.from(this.runs.values()).find((run) => run.status === 'RUNNING')
    if (active) {
      throw new ConflictError('A scrape run is already in progress.')
    }

    const context = createScrapeContext({
      queries,
      fetcher: this.options.createFetcher(),
      delayMs: this.options.delayMs,
      wait: this.options.wait,
      onProgress: (progress: ScrapeProgress) => {
        run.total = progress.total
        run.completed = progress.completed
        run.currentRegisterNumber = progress.currentRegisterNumber ?? null
      },
    })

    const run: ScrapeRun = {
      id: randomUUID(),
      source: 'scrape',
      status: 'RUNNING',
      total: queries.length,
      completed: 0,
      currentRegisterNumber: null,
      startedAt: new Date(),
      finishedAt: null,
      statusMessage: null,
      table: context.table,
      failures: context.failures,
      done: Promise.resolve(),
    }
    this.remember(run)

    run.done = runScrape(context).then(
      () => {
        run.status = 'COMPLETED'
        run.finishedAt = new Date()
        console.log(
          `Run ${run.id} finished: ${run.table.size} rows, ${run.failures.length} failed lookups`,
        )
      },
      (error: unknown) => {
        run.status = 'FAILED'
        run.finishedAt = new Date()
        run.statusMessage = errorMessage(error, 'Scrape failed. Check logs.')
        console.error(`Run ${run.id} failed`, error)
      },
    )

    return run
  }

  importRows(rows: ResultRow[]) {
    const now = new Date()
    const table = new ResultTable(rows).seal()
    const run: ScrapeRun = {
      id: randomUUID(),
      source: 'import',
      status: 'COMPLETED',
      total: table.registerNumbers().length,
      completed: table.registerNumbers().length,
      currentRegisterNumber: null,
      startedAt: now,
      finishedAt: now,
      statusMessage: null,
      table,
      failures: [],
      done: Promise.resolve(),
    }
    this.remember(run)
    return run
  }

  get(id: string) {
    const run = this.runs.get(id)
    if (!run) {
      throw new NotFoundError('Run not found.')
    }
    return run
  }

  list() {
    return Array.from(this.runs.values())
  }
}
