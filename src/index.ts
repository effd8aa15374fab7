// Pipeline
export type { ScrapeProfilesOptions, ScrapeProfilesResult } from './pipeline'
export { readUrlList, scrapeProfiles } from './pipeline'

// Browser session and page handles
export type { BrowserOptions } from './browser'
export { BrowserManager, BrowserOptionsSchema } from './browser'
export type {
  ElementHandle,
  NavigateOptions,
  NavigationResult,
  PageHandle,
  PageSource,
  WaitForSelectorOptions,
} from './page/types'
export type {
  LocatorDriver,
  PageDriver,
  PlaywrightPageHandleOptions,
} from './page/playwright-page'
export {
  DEFAULT_OVERLAY_CLOSE_SELECTORS,
  PlaywrightPageHandle,
} from './page/playwright-page'

// Extraction
export type { RunBatchOptions } from './extraction/batch-runner'
export { BatchOptionsSchema, prepareTargets, runBatch } from './extraction/batch-runner'
export type { ReconcileOptions, ReconcileOutcome } from './extraction/reconcile'
export {
  enrichEntities,
  joinKey,
  mergeRecords,
  reconcile,
  reconcileDetailed,
} from './extraction/reconcile'
export { mapToSchema, validateAliasTable } from './extraction/schema-mapper'
export { buildHealthReport } from './extraction/health'
export type {
  ExtractionStrategy,
  HealthReport,
  HealthStatus,
} from './extraction/types'
export type { StructuredOptions } from './extraction/strategies/structured-strategy'
export {
  StructuredFieldsStrategy,
  StructuredOptionsSchema,
} from './extraction/strategies/structured-strategy'
export type { VisibleTextOptions } from './extraction/strategies/visible-text-strategy'
export {
  VisibleTextOptionsSchema,
  VisibleTextStrategy,
} from './extraction/strategies/visible-text-strategy'
export type { ExtractedEntities } from './extraction/text/entities'
export {
  compactToInt,
  dedupeStrings,
  extractEntities,
  normalizeWhitespace,
} from './extraction/text/entities'
export { classifyLinks } from './extraction/text/links'

// Platforms
export type { PlatformDefinition } from './platforms'
export {
  TWITTER_PLATFORM,
  getPlatform,
  isPlatformUrl,
  registerPlatform,
} from './platforms'

// Models and configuration
export * from './models/record'
export * from './models/schema'
export { RECORD_ERRORS, SCRAPING_CONSTANTS } from './config/constants'
export {
  DEFAULT_SCHEMA_TEMPLATE_PATH,
  loadSchemaTemplate,
  parseSchemaTemplate,
} from './config/schema-loader'

// Storage
export type { RecordSink, SinkResult } from './storage/types'
export { JsonFileSink } from './storage/json-file-sink'
export { MemoryRecordStore } from './storage/memory-store'

// Callbacks, errors, logging
export * from './callbacks'
export * from './exceptions'
export type { Logger } from './utils/logger'
export { createLogger, log } from './utils/logger'
