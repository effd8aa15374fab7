import type { Browser, BrowserContext, Page } from 'playwright'
import { chromium } from 'playwright'
import { z } from 'zod'
import { NetworkError } from './exceptions'
import { PlaywrightPageHandle } from './page/playwright-page'
import type { PageHandle, PageSource } from './page/types'
import { log } from './utils/logger'

const ViewportSchema = z.object({
  width: z.number(),
  height: z.number(),
})

const ProxySchema = z.object({
  server: z.string(),
  username: z.string().optional(),
  password: z.string().optional(),
})

export const BrowserOptionsSchema = z.object({
  headless: z.boolean().optional().default(true),
  slowMo: z.number().optional().default(0),
  viewport: ViewportSchema.optional().default({ width: 1280, height: 800 }),
  userAgent: z.string().optional(),
  locale: z.string().optional().default('en-US'),
  proxy: ProxySchema.optional(),
  args: z.array(z.string()).optional().default([]),
  extraHTTPHeaders: z
    .record(z.string(), z.string())
    .optional()
    .default({ 'accept-language': 'en-US,en;q=0.9' }),
  overlayCloseSelectors: z.array(z.string()).optional(),
})

export type BrowserOptions = z.input<typeof BrowserOptionsSchema>

/**
 * Owns one Chromium browser and context. Pages handed out through
 * {@link acquirePage} share the context and are closed by {@link release}.
 */
export class BrowserManager implements PageSource {
  private _browser: Browser | null = null
  private _context: BrowserContext | null = null
  private readonly _pages: Page[] = []
  private readonly _options: z.infer<typeof BrowserOptionsSchema>

  constructor(options: BrowserOptions = {}) {
    this._options = BrowserOptionsSchema.parse(options)
  }

  async start(): Promise<void> {
    try {
      this._browser = await chromium.launch({
        headless: this._options.headless,
        slowMo: this._options.slowMo,
        proxy: this._options.proxy,
        args: this._options.args,
      })

      log.info(`Browser launched (headless=${this._options.headless})`)

      this._context = await this._browser.newContext({
        viewport: this._options.viewport,
        userAgent: this._options.userAgent,
        locale: this._options.locale,
      })
    } catch (e) {
      await this.close()
      throw new NetworkError(`Failed to start browser: ${e}`)
    }

    await this.applyExtraHeaders(this._context)
  }

  /**
   * Extra headers are a nicety; a driver that refuses them still scrapes.
   */
  private async applyExtraHeaders(context: BrowserContext): Promise<void> {
    try {
      await context.setExtraHTTPHeaders(this._options.extraHTTPHeaders)
    } catch (e) {
      log.debug(`Could not set extra HTTP headers: ${e}`)
    }
  }

  async newPage(): Promise<Page> {
    if (!this._context)
      throw new Error('Browser context not initialized. Call start() first.')
    const page = await this._context.newPage()
    this._pages.push(page)
    return page
  }

  async acquirePage(): Promise<PageHandle> {
    if (!this._context) await this.start()
    return new PlaywrightPageHandle(await this.newPage(), {
      overlayCloseSelectors: this._options.overlayCloseSelectors,
    })
  }

  async release(): Promise<void> {
    await this.close()
  }

  async close(): Promise<void> {
    try {
      for (const page of this._pages.splice(0)) await page.close()

      if (this._context) await this._context.close()
      this._context = null

      if (this._browser) await this._browser.close()
      this._browser = null

      log.info('Browser closed')
    } catch (e) {
      log.error(`Error closing browser: ${e}`)
    }
  }

  get context(): BrowserContext {
    if (!this._context) throw new Error('Browser context not initialized.')
    return this._context
  }

  get browser(): Browser {
    if (!this._browser) throw new Error('Browser not started.')
    return this._browser
  }
}
