import type { ElementState, PageHandle } from '../../page/types'
import { firstMatch } from '../../utils'
import { normalizeWhitespace } from '../text/entities'

export interface SelectorWait {
  timeoutMs: number
  state: ElementState
}

/**
 * Normalized text of the first element matching `selector`, or null when
 * nothing attaches within the wait or the text is blank.
 */
export async function readSelectorText(
  page: PageHandle,
  selector: string,
  wait: SelectorWait,
): Promise<string | null> {
  const element = await page.waitForSelector(selector, wait)
  if (!element) return null

  const text = normalizeWhitespace(await element.readText())
  return text || null
}

/**
 * Tries selector candidates in order and returns the first non-empty text.
 */
export async function firstText(
  page: PageHandle,
  selectors: string[],
  wait: SelectorWait,
): Promise<string | null> {
  return await firstMatch(
    selectors.map((selector) => () => readSelectorText(page, selector, wait)),
  )
}

export function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? text.slice(0, maxLength) : text
}
