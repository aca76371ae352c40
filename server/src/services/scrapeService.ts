import { setTimeout as sleep } from 'timers/promises'
import { FetchError, ParseError, errorMessage } from '../errors.js'
import type {
  FailedLookup,
  ResultFetcher,
  ScrapeProgress,
  StudentQuery,
} from '../scraper/types.js'
import { ResultTable } from './resultTable.js'

export type ScrapeContext = {
  queries: readonly StudentQuery[]
  fetcher: ResultFetcher
  table: ResultTable
  failures: FailedLookup[]
  delayMs: number
  wait: (ms: number) => Promise<unknown>
  onProgress?: (progress: ScrapeProgress) => Promise<void> | void
}

export type ScrapeOutcome = {
  table: ResultTable
  failures: FailedLookup[]
}

export const createScrapeContext = (payload: {
  queries: readonly StudentQuery[]
  fetcher: ResultFetcher
  delayMs?: number
  wait?: (ms: number) => Promise<unknown>
  onProgress?: (progress: ScrapeProgress) => Promise<void> | void
}): ScrapeContext => ({
  queries: payload.queries,
  fetcher: payload.fetcher,
  table: new ResultTable(),
  failures: [],
  delayMs: payload.delayMs ?? 0,
  wait: payload.wait ?? ((ms) => sleep(ms)),
  onProgress: payload.onProgress,
})

const toFailure = (query: StudentQuery, error: FetchError | ParseError): FailedLookup => ({
  registerNumber: query.registerNumber,
  dateOfBirth: query.dateOfBirth,
  kind: error instanceof ParseError ? 'parse' : 'fetch',
  message: error.message,
})

export const runScrape = async (context: ScrapeContext): Promise<ScrapeOutcome> => {
  const { queries, fetcher, table, failures } = context
  const total = queries.length
  let completed = 0

  try {
    await context.onProgress?.({ completed, total })

    for (const query of queries) {
      if (completed > 0 && context.delayMs > 0) {
        await context.wait(context.delayMs)
      }

      try {
        const rows = await fetcher.fetchResults(query)
        table.append(rows.map((row) => ({ ...row, registerNumber: query.registerNumber })))
        console.log(`Fetched ${rows.length} result rows for ${query.registerNumber}`)
      } catch (error) {
        if (!(error instanceof FetchError) && !(error instanceof ParseError)) {
          throw error
        }
        failures.push(toFailure(query, error))
        console.warn(`Skipping ${query.registerNumber}: ${error.message}`)
      }

      completed += 1
      await context.onProgress?.({
        completed,
        total,
        currentRegisterNumber: query.registerNumber,
      })
    }

    return { table, failures }
  } finally {
    table.seal()
    try {
      await fetcher.close()
    } catch (error) {
      console.warn(`Could not close the result fetcher: ${errorMessage(error)}`)
    }
  }
}
