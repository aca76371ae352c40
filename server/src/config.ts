import { config } from 'dotenv'

config()

const parseNumber = (value: string, fallback: number) => {
  const parsed = Number.parseInt(value, 10)
  return Number.isNaN(parsed) ? fallback : parsed
}

const parseCorsOrigins = (value: string | undefined) => {
  const fallback = ['http://localhost:5173']
  if (!value) {
    return fallback
  }
  const origins = value
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean)
  return origins.length > 0 ? origins : fallback
}

export type BrowserName = 'chromium' | 'firefox'

const parseBrowser = (value: string | undefined): BrowserName =>
  value?.trim().toLowerCase() === 'firefox' ? 'firefox' : 'chromium'

export const env = {
  port: parseNumber(process.env.PORT ?? '', 4000),
  serverHost: process.env.SERVER_HOST ?? '0.0.0.0',
  corsOrigins: parseCorsOrigins(process.env.CORS_ORIGIN),
  uploadLimit: process.env.UPLOAD_LIMIT ?? '5mb',
  runHistoryLimit: parseNumber(process.env.RUN_HISTORY_LIMIT ?? '', 10),
  scraperBaseUrl:
    process.env.SCRAPER_BASE_URL ?? 'https://egovernance.unom.ac.in/results/ugresult.asp',
  scraperBrowser: parseBrowser(process.env.SCRAPER_BROWSER),
  scraperChannel: process.env.SCRAPER_CHANNEL ?? '',
  scraperHeadless: (process.env.SCRAPER_HEADLESS ?? 'true') === 'true',
  scraperTimeoutMs: parseNumber(process.env.SCRAPER_TIMEOUT_MS ?? '', 30000),
  scraperDelayMs: parseNumber(process.env.SCRAPER_DELAY_MS ?? '', 1000),
  scraperDobSeparator: process.env.SCRAPER_DOB_SEPARATOR ?? '/',
  scraperDebugDir: process.env.SCRAPER_DEBUG_DIR ?? '',
  geminiApiKey: process.env.GEMINI_API_KEY ?? '',
  qaModel: process.env.QA_MODEL ?? 'gemini-2.5-flash',
  qaSampleRows: parseNumber(process.env.QA_SAMPLE_ROWS ?? '', 20),
}
