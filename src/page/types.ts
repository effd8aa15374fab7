export type ElementState = 'attached' | 'visible'

export type WaitUntil = 'domcontentloaded' | 'load' | 'networkidle'

export type NavigationResult =
  | { kind: 'ok' }
  | { kind: 'timeout' }
  | { kind: 'error'; message: string }

export interface NavigateOptions {
  timeoutMs: number
  waitUntil?: WaitUntil
}

export interface WaitForSelectorOptions {
  timeoutMs: number
  state?: ElementState
}

/**
 * A node found on the page. Reading from a detached node rejects.
 */
export interface ElementHandle {
  readText(): Promise<string>
  getAttribute(name: string): Promise<string | null>
  queryAll(selector: string): Promise<ElementHandle[]>
}

/**
 * What the strategies and the batch runner need from a browser page. One
 * handle is driven by exactly one batch at a time.
 */
export interface PageHandle {
  navigate(url: string, options: NavigateOptions): Promise<NavigationResult>
  /** Rejects when the network does not settle within the timeout. */
  waitForNetworkIdle(timeoutMs: number): Promise<void>
  /** Resolves null when nothing matches within the timeout. */
  waitForSelector(
    selector: string,
    options: WaitForSelectorOptions,
  ): Promise<ElementHandle | null>
  queryAll(selector: string): Promise<ElementHandle[]>
  /** Raw `href` values of every anchor, relative ones included. */
  queryAllLinks(): Promise<string[]>
  scrollToBottom(): Promise<void>
  /** Closes a blocking dialog if one is showing; true when one was closed. */
  dismissOverlay(timeoutMs: number): Promise<boolean>
  currentUrl(): string
}

/**
 * Hands out pages from a browser session the caller owns.
 */
export interface PageSource {
  acquirePage(): Promise<PageHandle>
  release(): Promise<void>
}
