/**
 * Headless browser boundary. The crawler only depends on BrowserLauncher and
 * BrowserSession; the Playwright implementation below is the production one.
 */

import { chromium, errors, type Browser, type BrowserContext, type Page } from 'playwright-core'
import { FetchTimeout, FetchTransportError, errorMessage } from './errors.js'

export type LoadState = 'domcontentloaded' | 'load' | 'networkidle'

/** Readiness condition: a load state, or a selector that must appear */
export type WaitCondition = LoadState | { selector: string }

export interface NavigationResult {
  markup: string
  status: number
}

export interface BrowserSession {
  navigate(
    url: string,
    waitFor: WaitCondition,
    timeoutMs: number,
    settleMs: number
  ): Promise<NavigationResult>
  close(): Promise<void>
}

export interface BrowserLauncher {
  launch(): Promise<BrowserSession>
}

export interface PlaywrightLauncherOptions {
  headless: boolean
  userAgent?: string
  acceptLanguage?: string
}

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 ' +
  '(KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36'

export class PlaywrightLauncher implements BrowserLauncher {
  constructor(private readonly options: PlaywrightLauncherOptions) {}

  async launch(): Promise<BrowserSession> {
    const browser = await chromium.launch({
      headless: this.options.headless,
      args: [
        '--disable-blink-features=AutomationControlled',
        '--no-sandbox',
        '--disable-dev-shm-usage',
      ],
    })

    try {
      const context = await browser.newContext({
        userAgent: this.options.userAgent ?? DEFAULT_USER_AGENT,
        viewport: { width: 1920, height: 1080 },
        extraHTTPHeaders: {
          'Accept-Language': this.options.acceptLanguage ?? 'ko-KR,ko;q=0.9,en-US;q=0.8,en;q=0.7',
        },
      })
      const page = await context.newPage()
      return new PlaywrightSession(browser, context, page)
    } catch (err) {
      await browser.close()
      throw err
    }
  }
}

class PlaywrightSession implements BrowserSession {
  constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext,
    private readonly page: Page
  ) {}

  async navigate(
    url: string,
    waitFor: WaitCondition,
    timeoutMs: number,
    settleMs: number
  ): Promise<NavigationResult> {
    try {
      const response = await this.page.goto(url, {
        waitUntil: typeof waitFor === 'string' ? waitFor : 'domcontentloaded',
        timeout: timeoutMs,
      })
      const status = response?.status() ?? 0

      if (status < 400) {
        if (typeof waitFor !== 'string') {
          await this.page.waitForSelector(waitFor.selector, { timeout: timeoutMs })
        }
        if (settleMs > 0) await this.page.waitForTimeout(settleMs)
      }

      return { markup: await this.page.content(), status }
    } catch (err) {
      if (err instanceof errors.TimeoutError) throw new FetchTimeout(url, timeoutMs)
      throw new FetchTransportError(url, errorMessage(err))
    }
  }

  async close(): Promise<void> {
    try {
      await this.context.close()
    } finally {
      await this.browser.close()
    }
  }
}
