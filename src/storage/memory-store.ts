import type { SchemaRecord } from '../models/schema'
import type { RecordSink, SinkResult } from './types'
import { recordUrl } from './types'

/**
 * In-process store with document-store upsert semantics: top-level fields of
 * a new write replace the stored ones for the same `url`.
 */
export class MemoryRecordStore implements RecordSink {
  readonly name = 'memory'
  private readonly documents = new Map<string, SchemaRecord>()

  async write(records: SchemaRecord[]): Promise<SinkResult> {
    const errors: string[] = []
    let written = 0

    records.forEach((record, index) => {
      const url = recordUrl(record)
      if (!url) {
        errors.push(`Item ${index}: missing 'url'`)
        return
      }

      const existing = this.documents.get(url)
      this.documents.set(url, { ...existing, ...structuredClone(record) })
      written++
    })

    return {
      total: records.length,
      written,
      skipped: records.length - written,
      errors,
    }
  }

  get(url: string): SchemaRecord | undefined {
    return this.documents.get(url.trim())
  }

  all(): SchemaRecord[] {
    return [...this.documents.values()]
  }

  get size(): number {
    return this.documents.size
  }
}
