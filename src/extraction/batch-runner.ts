import { z } from 'zod'
import type { ProgressCallback } from '../callbacks'
import { createSilentCallback } from '../callbacks'
import { RECORD_ERRORS, SCRAPING_CONSTANTS } from '../config/constants'
import { NavigationTimeoutError, errorMessage } from '../exceptions'
import type { ExtractionRecord } from '../models/record'
import { createErrorRecord, isErrorRecord } from '../models/record'
import type { PageHandle } from '../page/types'
import { isPlatformUrl } from '../platforms'
import type { PlatformDefinition } from '../platforms/types'
import { type Logger, createLogger } from '../utils/logger'
import { dedupeStrings } from './text/entities'
import type { ExtractionStrategy } from './types'

export const BatchOptionsSchema = z.object({
  navigationTimeoutMs: z
    .number()
    .int()
    .positive()
    .default(SCRAPING_CONSTANTS.NAVIGATION_TIMEOUT_MS),
  /** 0 skips the network-idle wait */
  networkIdleTimeoutMs: z
    .number()
    .int()
    .nonnegative()
    .default(SCRAPING_CONSTANTS.NETWORK_IDLE_TIMEOUT_MS),
})

export interface RunBatchOptions extends z.input<typeof BatchOptionsSchema> {
  callback?: ProgressCallback
}

type BatchSettings = z.infer<typeof BatchOptionsSchema>

/**
 * Trims, drops empty and off-platform URLs, and removes repeats keeping the
 * first occurrence. Every batch schedules exactly this list.
 */
export function prepareTargets(
  urls: string[],
  platform: PlatformDefinition,
): string[] {
  return dedupeStrings(
    urls
      .map((url) => url.trim())
      .filter((url) => url.length > 0 && isPlatformUrl(url, platform)),
  )
}

/**
 * Runs one strategy over the URL list on a single page, one URL at a time.
 * Returns one record per prepared target, in order; failures become
 * error-tagged records and never stop the batch.
 */
export async function runBatch(
  strategy: ExtractionStrategy,
  urls: string[],
  page: PageHandle,
  options: RunBatchOptions = {},
): Promise<ExtractionRecord[]> {
  const { callback = createSilentCallback(), ...rest } = options
  const settings = BatchOptionsSchema.parse(rest)
  const logger = createLogger(strategy.name)
  const targets = prepareTargets(urls, strategy.platform)
  const results: ExtractionRecord[] = []

  const notify = (event: () => Promise<void> | void) => observe(event, logger)

  await notify(() => callback.onStart(strategy.name, targets.length))

  for (const [index, url] of targets.entries()) {
    const position = `${index + 1}/${targets.length}`
    logger.info(`${position} → Starting: ${url}`)

    const record = await processUrl(strategy, page, url, settings, logger)
    results.push(record)

    if (isErrorRecord(record)) {
      logger.warning(`${position} → Failed: ${url} (${record.error})`)
      await notify(() =>
        callback.onWarning(`${strategy.name}: ${url} failed: ${record.error}`),
      )
    } else {
      logger.success(`${position} → Completed: ${url}`)
    }

    await notify(() =>
      callback.onProgress(
        `${strategy.name} ${position}`,
        Math.round(((index + 1) / targets.length) * 100),
      ),
    )
  }

  await notify(() => callback.onComplete(strategy.name, results))
  return results
}

/** A throwing observer is logged and never costs the batch its records. */
async function observe(
  event: () => Promise<void> | void,
  logger: Logger,
): Promise<void> {
  try {
    await event()
  } catch (e) {
    logger.warning(`Progress callback failed: ${errorMessage(e)}`)
  }
}

async function processUrl(
  strategy: ExtractionStrategy,
  page: PageHandle,
  url: string,
  settings: BatchSettings,
  logger: Logger,
): Promise<ExtractionRecord> {
  const { name: platform, linkField } = strategy.platform
  const failure = (message: string) =>
    createErrorRecord(platform, url, message, { [linkField]: url })

  try {
    const navigation = await page.navigate(url, {
      timeoutMs: settings.navigationTimeoutMs,
      waitUntil: 'domcontentloaded',
    })

    switch (navigation.kind) {
      case 'timeout':
        return failure(RECORD_ERRORS.NAVIGATION_TIMEOUT)
      case 'error':
        return failure(navigation.message)
      case 'ok':
        break
    }

    await settleNetwork(page, settings.networkIdleTimeoutMs, logger)
    return await strategy.extract(page, url)
  } catch (e) {
    if (e instanceof NavigationTimeoutError) {
      return failure(RECORD_ERRORS.NAVIGATION_TIMEOUT)
    }
    return failure(errorMessage(e))
  }
}

/**
 * Pages with persistent polling never go idle; the DOM is already loaded, so
 * a missed idle is not a navigation failure.
 */
async function settleNetwork(
  page: PageHandle,
  timeoutMs: number,
  logger: Logger,
): Promise<void> {
  if (timeoutMs <= 0) return
  try {
    await page.waitForNetworkIdle(timeoutMs)
  } catch (e) {
    logger.debug(`Network did not idle within ${timeoutMs}ms: ${e}`)
  }
}
