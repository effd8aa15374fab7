import { log } from './utils/logger'

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve()
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * A source tried by {@link firstMatch}: resolves to a value, or null when it
 * has nothing. A source that throws counts as null.
 */
export type MatchSource<T> = () => Promise<T | null>

/**
 * Tries each source in order and returns the first non-null value, without
 * calling the remaining sources.
 *
 * @example
 * ```typescript
 * const name = await firstMatch(
 *   selectors.map((selector) => () => readFirstText(page, selector)),
 * )
 * ```
 */
export async function firstMatch<T>(
  sources: Iterable<MatchSource<T>>,
): Promise<T | null> {
  let index = 0
  for (const source of sources) {
    try {
      const value = await source()
      if (value !== null) return value
    } catch (e) {
      log.debug(`Match source ${index} failed: ${e}`)
    }
    index++
  }
  return null
}
