import { errors } from 'playwright'
import { errorMessage } from '../exceptions'
import { log } from '../utils/logger'
import type {
  ElementHandle,
  ElementState,
  NavigateOptions,
  NavigationResult,
  PageHandle,
  WaitForSelectorOptions,
  WaitUntil,
} from './types'

const READ_TIMEOUT_MS = 2_000

export const DEFAULT_OVERLAY_CLOSE_SELECTORS = [
  '[data-testid="app-bar-close"]',
  'div[role="dialog"] button[aria-label="Close"]',
  '[data-testid="xMigrationBottomBar"] button',
  'button[aria-label="Dismiss"]',
]

/**
 * The part of Playwright's `Locator` the handle drives. A real `Locator`
 * satisfies it.
 */
export interface LocatorDriver {
  first(): LocatorDriver
  locator(selector: string): LocatorDriver
  all(): Promise<LocatorDriver[]>
  waitFor(options: { state: ElementState; timeout: number }): Promise<void>
  textContent(options: { timeout: number }): Promise<string | null>
  getAttribute(
    name: string,
    options: { timeout: number },
  ): Promise<string | null>
  isVisible(): Promise<boolean>
  click(options: { timeout: number }): Promise<void>
  evaluateAll(
    read: (elements: (HTMLElement | SVGElement)[]) => string[],
  ): Promise<string[]>
}

/**
 * The part of Playwright's `Page` the handle drives. A real `Page` satisfies
 * it.
 */
export interface PageDriver {
  goto(
    url: string,
    options: { waitUntil: WaitUntil; timeout: number },
  ): Promise<unknown>
  waitForLoadState(
    state: 'networkidle',
    options: { timeout: number },
  ): Promise<void>
  locator(selector: string): LocatorDriver
  viewportSize(): { width: number; height: number } | null
  evaluate(script: () => void): Promise<unknown>
  readonly mouse: {
    move(x: number, y: number): Promise<void>
    wheel(deltaX: number, deltaY: number): Promise<void>
  }
  url(): string
}

export class LocatorElement implements ElementHandle {
  constructor(private readonly locator: LocatorDriver) {}

  async readText(): Promise<string> {
    return (await this.locator.textContent({ timeout: READ_TIMEOUT_MS })) ?? ''
  }

  async getAttribute(name: string): Promise<string | null> {
    return await this.locator.getAttribute(name, { timeout: READ_TIMEOUT_MS })
  }

  async queryAll(selector: string): Promise<ElementHandle[]> {
    const matches = await this.locator.locator(selector).all()
    return matches.map((match) => new LocatorElement(match))
  }
}

export interface PlaywrightPageHandleOptions {
  overlayCloseSelectors?: string[]
}

/**
 * {@link PageHandle} over a Playwright page. Navigation timeouts are reported
 * as a result rather than thrown.
 */
export class PlaywrightPageHandle implements PageHandle {
  private readonly overlayCloseSelectors: string[]

  constructor(
    readonly page: PageDriver,
    options: PlaywrightPageHandleOptions = {},
  ) {
    this.overlayCloseSelectors =
      options.overlayCloseSelectors ?? DEFAULT_OVERLAY_CLOSE_SELECTORS
  }

  async navigate(
    url: string,
    { timeoutMs, waitUntil = 'domcontentloaded' }: NavigateOptions,
  ): Promise<NavigationResult> {
    try {
      await this.page.goto(url, { waitUntil, timeout: timeoutMs })
      return { kind: 'ok' }
    } catch (e) {
      if (e instanceof errors.TimeoutError) return { kind: 'timeout' }
      return { kind: 'error', message: errorMessage(e) }
    }
  }

  async waitForNetworkIdle(timeoutMs: number): Promise<void> {
    await this.page.waitForLoadState('networkidle', { timeout: timeoutMs })
  }

  async waitForSelector(
    selector: string,
    { timeoutMs, state = 'attached' }: WaitForSelectorOptions,
  ): Promise<ElementHandle | null> {
    const locator = this.page.locator(selector).first()
    try {
      await locator.waitFor({ state, timeout: timeoutMs })
    } catch (e) {
      if (e instanceof errors.TimeoutError) return null
      throw e
    }
    return new LocatorElement(locator)
  }

  async queryAll(selector: string): Promise<ElementHandle[]> {
    const matches = await this.page.locator(selector).all()
    return matches.map((match) => new LocatorElement(match))
  }

  async queryAllLinks(): Promise<string[]> {
    return await this.page
      .locator('a[href]')
      .evaluateAll((anchors) =>
        anchors.map((anchor) => anchor.getAttribute('href') ?? ''),
      )
  }

  async scrollToBottom(): Promise<void> {
    const viewport = this.page.viewportSize()
    if (viewport) {
      await this.page.mouse.move(viewport.width / 2, viewport.height / 2)
    }
    await this.page.evaluate(() =>
      window.scrollTo(0, document.documentElement.scrollHeight),
    )
    await this.page.mouse.wheel(0, 3000)
  }

  async dismissOverlay(timeoutMs: number): Promise<boolean> {
    const closeButton = this.page
      .locator(this.overlayCloseSelectors.join(', '))
      .first()

    if (!(await closeButton.isVisible())) return false

    await closeButton.click({ timeout: timeoutMs })
    log.debug('Closed overlay')
    return true
  }

  currentUrl(): string {
    return this.page.url()
  }
}
