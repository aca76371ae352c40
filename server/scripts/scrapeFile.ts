import { readFile, writeFile } from 'fs/promises'
import { resolve } from 'path'
import { env } from '../src/config.js'
import { createUnomFetcher } from '../src/scraper/unomScraper.js'
import { EXPORT_FILE_NAME, writeResultWorkbook } from '../src/services/exportService.js'
import { loadStudentQueries } from '../src/services/inputService.js'
import { createScrapeContext, runScrape } from '../src/services/scrapeService.js'

const inputPath = process.argv[2]
const outputPath = resolve(process.argv[3] ?? EXPORT_FILE_NAME)

const run = async () => {
  if (!inputPath) {
    throw new Error('Usage: tsx scripts/scrapeFile.ts <students.xlsx|csv> [output.xlsx]')
  }

  const queries = loadStudentQueries(await readFile(inputPath))
  console.log(`Loaded ${queries.length} students from ${inputPath}`)

  const context = createScrapeContext({
    queries,
    fetcher: createUnomFetcher(),
    delayMs: env.scraperDelayMs,
    onProgress: (progress) => {
      if (progress.currentRegisterNumber) {
        console.log(
          `[${progress.completed}/${progress.total}] ${progress.currentRegisterNumber}`,
        )
      }
    },
  })
  const { table, failures } = await runScrape(context)

  await writeFile(outputPath, writeResultWorkbook(table.rows, failures))
  console.log(
    `Saved ${table.size} result rows for ${table.registerNumbers().length} students to ${outputPath}`,
  )
  if (failures.length > 0) {
    console.warn(`${failures.length} students could not be fetched; see the Failed Results sheet.`)
  }
}

run().catch((error) => {
  console.error(error)
  process.exit(1)
})
