import { mkdir, writeFile } from 'fs/promises'
import { join } from 'path'
import {
  chromium,
  errors,
  firefox,
  type Browser,
  type BrowserContext,
  type Locator,
  type Page,
} from 'playwright-core'
import { env, type BrowserName } from '../config.js'
import { FetchError, errorMessage } from '../errors.js'
import { parseResultPage } from './resultPage.js'
import type { ResultFetcher, ResultRow, StudentQuery } from './types.js'

export type LookupFormProfile = {
  version: string
  registerInput: string[]
  dobInput: string[]
  submit: string[]
}

// Selectors belong to the external site and change without notice; keep each
// known layout as its own profile.
export const UNOM_FORM_V1: LookupFormProfile = {
  version: 'v1',
  registerInput: [
    'input[name="regno"]',
    '#regno',
    'input[name*="reg"], input[id*="reg"]',
    'input[type="text"]',
  ],
  dobInput: [
    'input[name="dob"]',
    '#dob',
    'input[placeholder*="date" i], input[placeholder*="birth" i], input[placeholder*="dob" i]',
    'form input[type="text"] >> nth=1',
  ],
  submit: [
    'input[type="submit"]',
    'button[type="submit"]',
    'input[value="Submit"]',
    'button:has-text("Submit")',
    'input[value="Get"]',
    'input[type="button"]',
    'input[type="image"]',
    'form button',
  ],
}

export type UnomFetcherOptions = {
  url: string
  browser: BrowserName
  channel?: string
  headless: boolean
  timeoutMs: number
  dobSeparator: string
  debugDir?: string
  form?: LookupFormProfile
}

export const unomFetcherOptionsFromEnv = (): UnomFetcherOptions => ({
  url: env.scraperBaseUrl,
  browser: env.scraperBrowser,
  channel: env.scraperChannel || undefined,
  headless: env.scraperHeadless,
  timeoutMs: env.scraperTimeoutMs,
  dobSeparator: env.scraperDobSeparator,
  debugDir: env.scraperDebugDir || undefined,
})

const findFirst = async (page: Page, selectors: string[]): Promise<Locator | null> => {
  for (const selector of selectors) {
    const locator = page.locator(selector).first()
    if ((await locator.count()) > 0) {
      return locator
    }
  }
  return null
}

const safeFilePart = (value: string) => value.replace(/[^A-Za-z0-9_-]/g, '_')

export class UnomResultFetcher implements ResultFetcher {
  private browser: Browser | null = null
  private context: BrowserContext | null = null
  private page: Page | null = null
  private readonly form: LookupFormProfile

  constructor(private readonly options: UnomFetcherOptions) {
    this.form = options.form ?? UNOM_FORM_V1
  }

  async fetchResults(query: StudentQuery): Promise<ResultRow[]> {
    const page = await this.ensurePage()
    let html: string

    try {
      html = await this.submitLookup(page, query)
    } catch (error) {
      await this.saveDebug(page, query, 'fetch')
      if (error instanceof FetchError) {
        throw error
      }
      if (error instanceof errors.TimeoutError) {
        throw new FetchError(
          `Timed out after ${this.options.timeoutMs} ms waiting for the result site.`,
          { cause: error },
        )
      }
      throw new FetchError(`Browser error: ${errorMessage(error)}`, { cause: error })
    }

    try {
      return parseResultPage(html, query)
    } catch (error) {
      await this.saveDebug(page, query, 'parse')
      throw error
    }
  }

  async close() {
    const { context, browser } = this
    this.page = null
    this.context = null
    this.browser = null
    await context?.close()
    await browser?.close()
  }

  private async ensurePage() {
    if (this.page) {
      return this.page
    }
    const launcher = this.options.browser === 'firefox' ? firefox : chromium
    try {
      this.browser = await launcher.launch({
        headless: this.options.headless,
        channel: this.options.channel,
      })
      this.context = await this.browser.newContext({
        viewport: { width: 1920, height: 1080 },
      })
      this.page = await this.context.newPage()
      this.page.setDefaultTimeout(this.options.timeoutMs)
      return this.page
    } catch (error) {
      await this.close()
      throw new FetchError(
        `Failed to start ${this.options.browser}: ${errorMessage(error)}`,
        { cause: error },
      )
    }
  }

  private async submitLookup(page: Page, query: StudentQuery) {
    const timeout = this.options.timeoutMs
    await page.goto(this.options.url, { waitUntil: 'domcontentloaded', timeout })

    const registerInput = await findFirst(page, this.form.registerInput)
    if (!registerInput) {
      throw new FetchError('Could not find registration number input field.')
    }
    await registerInput.fill(query.registerNumber)

    const dobInput = await findFirst(page, this.form.dobInput)
    if (!dobInput) {
      throw new FetchError('Could not find date of birth input field.')
    }
    await dobInput.fill(query.dateOfBirth.replace(/\//g, this.options.dobSeparator))

    const submit = await findFirst(page, this.form.submit)
    if (!submit) {
      throw new FetchError('Could not find submit button.')
    }
    await submit.click({ timeout })
    await page.waitForLoadState('load', { timeout })

    return page.content()
  }

  private async saveDebug(page: Page, query: StudentQuery, stage: 'fetch' | 'parse') {
    const dir = this.options.debugDir
    if (!dir) {
      return
    }
    const base = join(dir, `${safeFilePart(query.registerNumber)}-${stage}`)
    try {
      await mkdir(dir, { recursive: true })
      await writeFile(`${base}.html`, await page.content(), 'utf8')
      await page.screenshot({ path: `${base}.png`, fullPage: true })
    } catch (error) {
      console.warn(`Could not save debug capture for ${query.registerNumber}: ${errorMessage(error)}`)
    }
  }
}

export const createUnomFetcher = (options: UnomFetcherOptions = unomFetcherOptionsFromEnv()) =>
  new UnomResultFetcher(options)
