import { z } from 'zod'
import { RECORD_ERRORS, SCRAPING_CONSTANTS } from '../../config/constants'
import type { ExtractionRecord } from '../../models/record'
import { createErrorRecord, createRecord } from '../../models/record'
import type { PageHandle } from '../../page/types'
import type { PlatformDefinition, StructuredField } from '../../platforms/types'
import { createLogger } from '../../utils/logger'
import { compactToInt } from '../text/entities'
import { ensureHandlePrefix, handleFromUrl } from '../text/links'
import type { ExtractionStrategy } from '../types'
import { type SelectorWait, firstText } from './shared'

const STRUCTURED_FIELDS = [
  'name',
  'handle',
  'bio',
  'followers',
  'following',
] as const satisfies readonly StructuredField[]

export const StructuredOptionsSchema = z.object({
  selectorTimeoutMs: z
    .number()
    .int()
    .nonnegative()
    .default(SCRAPING_CONSTANTS.SELECTOR_TIMEOUT_MS),
  selectorState: z.enum(['attached', 'visible']).default('attached'),
  /** Overrides the platform's total-failure trigger fields */
  totalFailureFields: z.array(z.enum(STRUCTURED_FIELDS)).min(1).optional(),
})

export type StructuredOptions = z.input<typeof StructuredOptionsSchema>

type CapturedFields = Record<StructuredField, string | null>

/**
 * Reads the profile header field by field from ordered selector candidates.
 * Fields are independent; a record whose trigger fields all came back empty
 * is tagged "Failed to extract" but keeps whatever else was captured.
 */
export class StructuredFieldsStrategy implements ExtractionStrategy {
  readonly name = 'structured'
  private readonly wait: SelectorWait
  private readonly totalFailureFields: StructuredField[]
  private readonly logger = createLogger(this.name)

  constructor(
    readonly platform: PlatformDefinition,
    options: StructuredOptions = {},
  ) {
    const parsed = StructuredOptionsSchema.parse(options)
    this.wait = {
      timeoutMs: parsed.selectorTimeoutMs,
      state: parsed.selectorState,
    }
    this.totalFailureFields =
      parsed.totalFailureFields ?? platform.totalFailureFields
  }

  async extract(page: PageHandle, url: string): Promise<ExtractionRecord> {
    const captured = await this.captureFields(page)

    const handle = captured.handle
      ? ensureHandlePrefix(captured.handle)
      : handleFromUrl(url)

    const fields = {
      [this.platform.linkField]: url,
      name: captured.name,
      handle,
      bio: captured.bio,
      followers: captured.followers,
      followers_num: compactToInt(captured.followers),
      following: captured.following,
      following_num: compactToInt(captured.following),
    }

    if (this.isTotalFailure(captured)) {
      this.logger.warning(
        `No ${this.totalFailureFields.join('/')} found on ${url}; page may be gated`,
      )
      return createErrorRecord(
        this.platform.name,
        url,
        RECORD_ERRORS.TOTAL_FAILURE,
        fields,
      )
    }

    return createRecord(this.platform.name, url, fields)
  }

  private async captureFields(page: PageHandle): Promise<CapturedFields> {
    const captured: CapturedFields = {
      name: null,
      handle: null,
      bio: null,
      followers: null,
      following: null,
    }

    // Sequential: the page handle is driven by one caller at a time.
    for (const field of STRUCTURED_FIELDS) {
      captured[field] = await firstText(
        page,
        this.platform.fieldSelectors[field],
        this.wait,
      )
      if (!captured[field]) {
        this.logger.debug(`No ${field} matched`)
      }
    }

    return captured
  }

  private isTotalFailure(captured: CapturedFields): boolean {
    return this.totalFailureFields.every((field) => !captured[field])
  }
}
