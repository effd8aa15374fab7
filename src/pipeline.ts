import fs from 'node:fs/promises'
import { type BrowserOptions, BrowserManager } from './browser'
import { createSilentCallback } from './callbacks'
import { loadSchemaTemplate } from './config/schema-loader'
import { ConfigurationError, StorageError } from './exceptions'
import { buildHealthReport } from './extraction/health'
import { type ReconcileOptions, reconcileDetailed } from './extraction/reconcile'
import { mapToSchema, validateAliasTable } from './extraction/schema-mapper'
import type { HealthReport } from './extraction/types'
import type { AliasTable, SchemaRecord, SchemaTemplate } from './models/schema'
import type { PageHandle, PageSource } from './page/types'
import { getPlatform } from './platforms'
import type { PlatformDefinition } from './platforms/types'
import type { RecordSink, SinkResult } from './storage/types'
import { log } from './utils/logger'

export interface ScrapeProfilesOptions
  extends Omit<ReconcileOptions, 'platform'> {
  /** Registered platform name or a full definition. Defaults to twitter */
  platform?: string | PlatformDefinition
  /** Used as-is instead of loading one from disk */
  template?: SchemaTemplate
  templatePath?: string
  /** Overrides the platform's alias table */
  aliasTable?: AliasTable
  /** Where pages come from. Defaults to a new BrowserManager */
  session?: PageSource
  browserOptions?: BrowserOptions
  sinks?: RecordSink[]
}

export interface ScrapeProfilesResult {
  records: SchemaRecord[]
  health: HealthReport[]
  sinks: Record<string, SinkResult>
}

function resolvePlatform(
  platform: string | PlatformDefinition | undefined,
): PlatformDefinition {
  if (platform === undefined) return getPlatform('twitter')
  return typeof platform === 'string' ? getPlatform(platform) : platform
}

/**
 * Full run: scrape every URL with both strategies, reconcile, project onto
 * the schema template, and hand the result to each sink. Configuration
 * problems surface before a browser is started.
 */
export async function scrapeProfiles(
  urls: string[],
  options: ScrapeProfilesOptions = {},
): Promise<ScrapeProfilesResult> {
  const {
    platform: platformOption,
    template: templateOption,
    templatePath,
    aliasTable,
    session: sessionOption,
    browserOptions,
    sinks = [],
    callback = createSilentCallback(),
    ...reconcileOptions
  } = options

  const platform = resolvePlatform(platformOption)
  const template = templateOption ?? (await loadSchemaTemplate(templatePath))
  const alias = aliasTable ?? platform.aliasTable
  validateAliasTable(template, alias)

  const session =
    sessionOption ??
    new BrowserManager({
      overlayCloseSelectors: platform.overlayCloseSelectors,
      ...browserOptions,
    })

  const outcome = await withPages(session, (structuredPage, visibleTextPage) =>
    reconcileDetailed(urls, structuredPage, visibleTextPage, {
      ...reconcileOptions,
      platform,
      callback,
    }),
  )

  const health = [
    buildHealthReport(
      reconcileOptions.structuredStrategy?.name ?? 'structured',
      outcome.structured,
    ),
    buildHealthReport(
      reconcileOptions.visibleTextStrategy?.name ?? 'visible-text',
      outcome.visibleText,
    ),
  ]
  for (const report of health) {
    if (report.status === 'healthy') log.success(report.message)
    else log.warning(report.message)
  }

  const records = outcome.records.map((record) =>
    mapToSchema(record, template, alias),
  )

  const sinkResults: Record<string, SinkResult> = {}
  for (const sink of sinks) {
    try {
      sinkResults[sink.name] = await sink.write(records)
    } catch (e) {
      if (!(e instanceof StorageError)) throw e
      log.error(`Sink ${sink.name} failed: ${e.message}`)
      await callback.onError(`Sink ${sink.name} failed`, e)
    }
  }

  log.info(`Scraped ${records.length} profiles`)
  return { records, health, sinks: sinkResults }
}

/**
 * Hands two pages from the session to `run`. The session is released
 * whatever the outcome.
 */
async function withPages<T>(
  session: PageSource,
  run: (first: PageHandle, second: PageHandle) => Promise<T>,
): Promise<T> {
  try {
    const first = await session.acquirePage()
    const second = await session.acquirePage()
    return await run(first, second)
  } finally {
    await session.release()
  }
}

/**
 * Reads a newline-delimited URL file. Blank lines and lines starting with
 * `#` are skipped.
 */
export async function readUrlList(filePath: string): Promise<string[]> {
  let content: string
  try {
    content = await fs.readFile(filePath, 'utf8')
  } catch (e) {
    throw new ConfigurationError(`URL list not readable: ${filePath} (${e})`)
  }

  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'))
}
