import type { SchemaRecord } from '../models/schema'

export interface SinkResult {
  total: number
  written: number
  skipped: number
  errors: string[]
}

/**
 * Destination for mapped records. Writes are upserts keyed by `url`, so
 * writing the same run twice leaves the same state.
 */
export interface RecordSink {
  readonly name: string
  write(records: SchemaRecord[]): Promise<SinkResult>
}

export function recordUrl(record: SchemaRecord): string | null {
  const url = record.url
  return typeof url === 'string' && url.trim().length > 0 ? url.trim() : null
}
