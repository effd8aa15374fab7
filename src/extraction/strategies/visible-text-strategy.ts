import { z } from 'zod'
import { SCRAPING_CONSTANTS } from '../../config/constants'
import { ExtractionError, errorMessage } from '../../exceptions'
import type { ExtractionRecord } from '../../models/record'
import { createRecord } from '../../models/record'
import type { ElementHandle, PageHandle } from '../../page/types'
import type { PlatformDefinition } from '../../platforms/types'
import { sleep } from '../../utils'
import { createLogger } from '../../utils/logger'
import {
  dedupeStrings,
  extractEntities,
  normalizeWhitespace,
} from '../text/entities'
import { classifyLinks, handleFromAuthorHref } from '../text/links'
import type { ExtractionStrategy, PostBlock } from '../types'
import { type SelectorWait, firstText, truncate } from './shared'

export const VisibleTextOptionsSchema = z.object({
  scrollCycles: z
    .number()
    .int()
    .nonnegative()
    .default(SCRAPING_CONSTANTS.SCROLL_CYCLES),
  scrollPauseMs: z
    .number()
    .int()
    .nonnegative()
    .default(SCRAPING_CONSTANTS.SCROLL_PAUSE_MS),
  overlayTimeoutMs: z
    .number()
    .int()
    .positive()
    .default(SCRAPING_CONSTANTS.OVERLAY_DISMISS_TIMEOUT_MS),
  selectorTimeoutMs: z
    .number()
    .int()
    .nonnegative()
    .default(SCRAPING_CONSTANTS.SELECTOR_TIMEOUT_MS),
  maxTextLength: z
    .number()
    .int()
    .positive()
    .default(SCRAPING_CONSTANTS.MAX_TEXT_BLOCK_LENGTH),
})

export type VisibleTextOptions = z.input<typeof VisibleTextOptionsSchema>

/**
 * Reads whatever the page shows after lazy loading: post texts with their
 * authors, every outbound link, and the entities found in the text.
 */
export class VisibleTextStrategy implements ExtractionStrategy {
  readonly name = 'visible-text'
  private readonly options: z.infer<typeof VisibleTextOptionsSchema>
  private readonly wait: SelectorWait
  private readonly logger = createLogger(this.name)

  constructor(
    readonly platform: PlatformDefinition,
    options: VisibleTextOptions = {},
  ) {
    this.options = VisibleTextOptionsSchema.parse(options)
    this.wait = { timeoutMs: this.options.selectorTimeoutMs, state: 'attached' }
  }

  async extract(page: PageHandle, url: string): Promise<ExtractionRecord> {
    await this.dismissOverlay(page)
    await this.triggerLazyLoad(page)

    const bio = await firstText(page, this.platform.visibleText.bio, this.wait)
    const posts = await this.collectPosts(page)

    const texts = dedupeStrings(
      posts.flatMap((post) => (post.text ? [post.text] : [])),
    )
    const authors = dedupeStrings(
      posts.flatMap((post) => (post.author ? [post.author] : [])),
    )

    const links = classifyLinks(
      await this.readLinks(page),
      page.currentUrl() || url,
      this.platform,
    )

    const entities = extractEntities([bio ?? '', ...texts].join(' '))

    this.logger.debug(
      `${url}: ${texts.length} posts, ${authors.length} authors, ${links.external.length} external links`,
    )

    return createRecord(this.platform.name, url, {
      [this.platform.linkField]: url,
      bio,
      main_tweet_text: texts[0] ?? null,
      post_texts: texts,
      primary_author: authors[0] ?? null,
      reply_authors: authors.slice(1),
      internal_links: links.internal,
      external_links: links.external,
      hashtags: entities.hashtags,
      emails: entities.emails,
      phones: entities.phones,
    })
  }

  /**
   * Login prompts and cookie banners cover the timeline. Closing one is
   * optional, so a failure here is logged and ignored.
   */
  private async dismissOverlay(page: PageHandle): Promise<void> {
    try {
      if (await page.dismissOverlay(this.options.overlayTimeoutMs)) {
        this.logger.debug('Dismissed overlay')
      }
    } catch (e) {
      this.logger.debug(`Overlay dismissal failed: ${e}`)
    }
  }

  private async triggerLazyLoad(page: PageHandle): Promise<void> {
    for (let i = 0; i < this.options.scrollCycles; i++) {
      await page.scrollToBottom()
      await sleep(this.options.scrollPauseMs)
    }
  }

  private async collectPosts(page: PageHandle): Promise<PostBlock[]> {
    const { post, postText, authorLink } = this.platform.visibleText
    const containers = await page.queryAll(post)
    const posts: PostBlock[] = []

    for (let idx = 0; idx < containers.length; idx++) {
      const container = containers[idx]
      if (!container) continue

      try {
        const anchors = await container.queryAll(authorLink)
        const href = anchors[0] ? await anchors[0].getAttribute('href') : null
        const author = handleFromAuthorHref(href)
        const text = await this.readPostText(container, postText)

        if (text || author) posts.push({ text: text || null, author })
      } catch (e) {
        this.logger.debug(`Error reading post at index ${idx}: ${e}`)
      }
    }

    return posts
  }

  private async readLinks(page: PageHandle): Promise<string[]> {
    try {
      return await page.queryAllLinks()
    } catch (e) {
      throw new ExtractionError(`Failed to read links: ${errorMessage(e)}`)
    }
  }

  private async readPostText(
    container: ElementHandle,
    selector: string,
  ): Promise<string> {
    const blocks = await container.queryAll(selector)
    const parts: string[] = []
    for (const block of blocks) {
      parts.push(normalizeWhitespace(await block.readText()))
    }
    return truncate(
      normalizeWhitespace(parts.join(' ')),
      this.options.maxTextLength,
    )
  }
}
