import fs from 'node:fs/promises'
import path from 'node:path'
import { StorageError } from '../exceptions'
import type { SchemaRecord } from '../models/schema'
import { log } from '../utils/logger'
import type { RecordSink, SinkResult } from './types'

export interface JsonRunFile {
  saved_at: string
  records: SchemaRecord[]
}

/**
 * Writes one run as pretty-printed JSON wrapped with its timestamp. The file
 * is replaced on every write.
 */
export class JsonFileSink implements RecordSink {
  readonly name = 'json-file'

  constructor(
    readonly filePath: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async write(records: SchemaRecord[]): Promise<SinkResult> {
    if (records.length === 0) {
      log.warning(`No records to write to ${this.filePath}`)
      return { total: 0, written: 0, skipped: 0, errors: [] }
    }

    const payload: JsonRunFile = {
      saved_at: this.now().toISOString(),
      records,
    }

    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true })
      await fs.writeFile(this.filePath, JSON.stringify(payload, null, 2), 'utf8')
    } catch (e) {
      throw new StorageError(`Failed writing ${this.filePath}: ${e}`)
    }

    log.success(`Wrote ${records.length} records to ${this.filePath}`)
    return { total: records.length, written: records.length, skipped: 0, errors: [] }
  }
}
