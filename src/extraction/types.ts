import type { ExtractionRecord } from '../models/record'
import type { PageHandle } from '../page/types'
import type { PlatformDefinition } from '../platforms/types'

/**
 * One way of reading a profile page. The page has already been navigated to
 * `url` when `extract` is called; the batch runner turns a rejection into an
 * error-tagged record.
 */
export interface ExtractionStrategy {
  readonly name: string
  readonly platform: PlatformDefinition
  extract(page: PageHandle, url: string): Promise<ExtractionRecord>
}

/** A post container; media-only posts carry an author but no text. */
export interface PostBlock {
  text: string | null
  author: string | null
}

export interface ClassifiedLinks {
  internal: string[]
  external: string[]
}

export type HealthStatus = 'healthy' | 'degraded' | 'broken'

export interface HealthReport {
  strategy: string
  status: HealthStatus
  total: number
  succeeded: number
  failed: number
  message: string
}
