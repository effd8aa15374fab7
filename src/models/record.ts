import { z } from 'zod'

export const FieldValueSchema = z.union([
  z.string(),
  z.number(),
  z.array(z.string()),
  z.null(),
])

export type FieldValue = z.infer<typeof FieldValueSchema>

/**
 * One strategy's result for one URL. Free-form fields sit beside the three
 * fields every record carries; `error` may accompany partial data.
 */
export const ExtractionRecordSchema = z
  .object({
    platform: z.string(),
    source_url: z.string(),
    scraped_at: z.number().int(),
    error: z.string().optional(),
  })
  .catchall(FieldValueSchema.optional())

export type ExtractionRecord = z.infer<typeof ExtractionRecordSchema>

/**
 * Result of joining both strategies' records for one URL.
 */
export type MergedRecord = ExtractionRecord

export const ENTITY_LIST_FIELDS = ['emails', 'phones'] as const

export function nowEpochSeconds(): number {
  return Math.floor(Date.now() / 1000)
}

export function createRecord(
  platform: string,
  sourceUrl: string,
  fields: Record<string, FieldValue | undefined> = {},
): ExtractionRecord {
  return ExtractionRecordSchema.parse({
    ...fields,
    platform,
    source_url: sourceUrl,
    scraped_at: nowEpochSeconds(),
  })
}

export function createErrorRecord(
  platform: string,
  sourceUrl: string,
  error: string,
  fields: Record<string, FieldValue | undefined> = {},
): ExtractionRecord {
  return { ...createRecord(platform, sourceUrl, fields), error }
}

export function isErrorRecord(record: ExtractionRecord): boolean {
  return typeof record.error === 'string' && record.error.length > 0
}

export function readString(
  record: ExtractionRecord,
  field: string,
): string | null {
  const value = record[field]
  return typeof value === 'string' && value.length > 0 ? value : null
}

export function readStringList(
  record: ExtractionRecord,
  field: string,
): string[] {
  const value = record[field]
  return Array.isArray(value) ? value : []
}
