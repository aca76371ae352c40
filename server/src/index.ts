import { createApp } from './app.js'
import { env } from './config.js'
import { createUnomFetcher } from './scraper/unomScraper.js'
import { RunRegistry } from './services/runService.js'

const registry = new RunRegistry({
  createFetcher: () => createUnomFetcher(),
  delayMs: env.scraperDelayMs,
  historyLimit: env.runHistoryLimit,
})

const app = createApp({
  registry,
  corsOrigins: env.corsOrigins,
  uploadLimit: env.uploadLimit,
  qa: {
    model: env.qaModel,
    sampleRows: env.qaSampleRows,
    defaultApiKey: env.geminiApiKey || undefined,
  },
})

app.listen(env.port, env.serverHost, () => {
  console.log(`Server listening on http://${env.serverHost}:${env.port}`)
})
