import { RECORD_ERRORS } from '../config/constants'
import {
  ENTITY_LIST_FIELDS,
  type ExtractionRecord,
  type FieldValue,
  type MergedRecord,
  ExtractionRecordSchema,
  createErrorRecord,
  readString,
  readStringList,
} from '../models/record'
import type { PageHandle } from '../page/types'
import { TWITTER_PLATFORM } from '../platforms'
import type { PlatformDefinition } from '../platforms/types'
import { log } from '../utils/logger'
import { type RunBatchOptions, prepareTargets, runBatch } from './batch-runner'
import {
  type StructuredOptions,
  StructuredFieldsStrategy,
} from './strategies/structured-strategy'
import {
  type VisibleTextOptions,
  VisibleTextStrategy,
} from './strategies/visible-text-strategy'
import { dedupeStrings, extractEntities } from './text/entities'
import type { ExtractionStrategy } from './types'

export interface ReconcileOptions extends RunBatchOptions {
  platform?: PlatformDefinition
  structuredOptions?: StructuredOptions
  visibleTextOptions?: VisibleTextOptions
  /** Replaces the default structured-fields strategy */
  structuredStrategy?: ExtractionStrategy
  /** Replaces the default visible-text strategy */
  visibleTextStrategy?: ExtractionStrategy
}

export interface ReconcileOutcome {
  records: MergedRecord[]
  structured: ExtractionRecord[]
  visibleText: ExtractionRecord[]
}

const isEntityListField = (field: string): boolean =>
  (ENTITY_LIST_FIELDS as readonly string[]).includes(field)

export function joinKey(
  record: ExtractionRecord,
  platform: PlatformDefinition,
): string | null {
  const key =
    readString(record, platform.linkField) ??
    readString(record, 'source_url') ??
    readString(record, 'url')
  return key?.trim() || null
}

function mergeInto(
  existing: MergedRecord,
  incoming: ExtractionRecord,
): MergedRecord {
  const merged: Record<string, FieldValue | undefined> = { ...existing }

  for (const [field, value] of Object.entries(incoming)) {
    if (value === undefined || value === null) continue

    if (isEntityListField(field)) {
      merged[field] = dedupeStrings([
        ...readStringList(existing, field),
        ...(Array.isArray(value) ? value : []),
      ])
      continue
    }

    merged[field] = Array.isArray(value) ? [...value] : value
  }

  return ExtractionRecordSchema.parse(merged)
}

/**
 * Joins the two strategies' records by URL: structured first, then visible
 * text, so visible-text values win on collision. Emails and phones are
 * unioned. Every target gets exactly one record, in target order. Inputs are
 * not mutated.
 */
export function mergeRecords(
  targets: string[],
  structured: ExtractionRecord[],
  visibleText: ExtractionRecord[],
  platform: PlatformDefinition,
): MergedRecord[] {
  const accumulator = new Map<string, MergedRecord>()

  for (const record of [...structured, ...visibleText]) {
    const key = joinKey(record, platform)
    if (!key) {
      log.debug('Skipping record without a join key')
      continue
    }

    const existing = accumulator.get(key)
    accumulator.set(
      key,
      existing
        ? mergeInto(existing, record)
        : ExtractionRecordSchema.parse(record),
    )
  }

  return targets.map((url) => {
    const key = url.trim()
    return (
      accumulator.get(key) ??
      createErrorRecord(platform.name, key, RECORD_ERRORS.NO_RESULT, {
        [platform.linkField]: key,
      })
    )
  })
}

/**
 * Re-scans the merged free text for contacts either strategy may have read
 * without parsing, and unions them into the record's lists.
 */
export function enrichEntities(
  record: MergedRecord,
  platform: PlatformDefinition,
): MergedRecord {
  const blob = platform.entityTextFields
    .map((field) => readString(record, field) ?? '')
    .join(' ')
  const found = extractEntities(blob)

  return ExtractionRecordSchema.parse({
    ...record,
    emails: dedupeStrings([...readStringList(record, 'emails'), ...found.emails]),
    phones: dedupeStrings([...readStringList(record, 'phones'), ...found.phones]),
  })
}

function settledOrEmpty(
  result: PromiseSettledResult<ExtractionRecord[]>,
  strategy: string,
): ExtractionRecord[] {
  if (result.status === 'fulfilled') return result.value
  log.error(
    `${strategy} batch failed outright, merging without it: ${result.reason}`,
  )
  return []
}

/**
 * Runs both strategies concurrently, each on its own page, waits for both,
 * then merges and enriches. A batch that rejects counts as an empty result.
 */
export async function reconcileDetailed(
  urls: string[],
  structuredPage: PageHandle,
  visibleTextPage: PageHandle,
  options: ReconcileOptions = {},
): Promise<ReconcileOutcome> {
  const {
    platform = TWITTER_PLATFORM,
    structuredOptions,
    visibleTextOptions,
    structuredStrategy,
    visibleTextStrategy,
    ...batchOptions
  } = options

  const structuredRunner =
    structuredStrategy ??
    new StructuredFieldsStrategy(platform, structuredOptions)
  const visibleRunner =
    visibleTextStrategy ?? new VisibleTextStrategy(platform, visibleTextOptions)

  const targets = prepareTargets(urls, platform)

  const [structuredResult, visibleResult] = await Promise.allSettled([
    runBatch(structuredRunner, targets, structuredPage, batchOptions),
    runBatch(visibleRunner, targets, visibleTextPage, batchOptions),
  ])

  const structured = settledOrEmpty(structuredResult, structuredRunner.name)
  const visibleText = settledOrEmpty(visibleResult, visibleRunner.name)

  const records = mergeRecords(targets, structured, visibleText, platform).map(
    (record) => enrichEntities(record, platform),
  )

  return { records, structured, visibleText }
}

export async function reconcile(
  urls: string[],
  structuredPage: PageHandle,
  visibleTextPage: PageHandle,
  options: ReconcileOptions = {},
): Promise<MergedRecord[]> {
  const { records } = await reconcileDetailed(
    urls,
    structuredPage,
    visibleTextPage,
    options,
  )
  return records
}
