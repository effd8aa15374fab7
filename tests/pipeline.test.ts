import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { afterAll, beforeAll, describe, expect, test, vi } from 'vitest'
import type { ProgressCallback } from '../src/callbacks'
import { ConfigurationError, StorageError } from '../src/exceptions'
import { readUrlList, scrapeProfiles } from '../src/pipeline'
import { MemoryRecordStore } from '../src/storage/memory-store'
import type { RecordSink } from '../src/storage/types'
import { FakePage, FakePageSource } from './helpers/fake-page'

const ALICE = 'https://x.com/alice'

const NAME = "div[data-testid='UserName'] span"
const BIO = "div[data-testid='UserDescription']"
const FOLLOWERS = "a[href$='/followers'] span"
const POST = "article[data-testid='tweet']"
const POST_TEXT = "div[data-testid='tweetText']"

const fastOptions = {
  networkIdleTimeoutMs: 0,
  structuredOptions: { selectorTimeoutMs: 0 },
  visibleTextOptions: { scrollCycles: 0, selectorTimeoutMs: 0 },
}

function aliceSession(): FakePageSource {
  return new FakePageSource([
    new FakePage({
      [ALICE]: {
        selectors: {
          [NAME]: [{ text: 'Alice' }],
          [BIO]: [{ text: 'Structured bio' }],
          [FOLLOWERS]: [{ text: '1.5K' }],
        },
      },
    }),
    new FakePage({
      [ALICE]: {
        selectors: {
          [BIO]: [{ text: 'Visible bio mail a@x.com' }],
          [POST]: [{ children: { [POST_TEXT]: [{ text: 'Hi #ts' }] } }],
        },
      },
    }),
  ])
}

function mockCallback(): ProgressCallback {
  return {
    onStart: vi.fn(),
    onProgress: vi.fn(),
    onComplete: vi.fn(),
    onInfo: vi.fn(),
    onWarning: vi.fn(),
    onError: vi.fn(),
  }
}

describe('scrapeProfiles', () => {
  test('maps reconciled records onto the bundled template and stores them', async () => {
    const session = aliceSession()
    const store = new MemoryRecordStore()

    const result = await scrapeProfiles([ALICE, ' ', 'https://example.com/z'], {
      ...fastOptions,
      session,
      sinks: [store],
    })

    expect(result.records).toHaveLength(1)
    expect(result.records[0]).toMatchObject({
      url: ALICE,
      platform: 'twitter',
      content_type: 'profile',
      profile: {
        username: '@alice',
        full_name: 'Alice',
        bio: 'Visible bio mail a@x.com',
        followers_count: 1500,
        following_count: '',
      },
      contact: {
        emails: ['a@x.com'],
        phone_numbers: [],
        social_media_handles: { twitter: '@alice' },
      },
      content: { caption: 'Hi #ts', author_name: '', hashtags: ['#ts'] },
      metadata: { error: '' },
    })

    expect(result.sinks).toEqual({
      memory: { total: 1, written: 1, skipped: 0, errors: [] },
    })
    expect(store.get(ALICE)).toEqual(result.records[0])
    expect(result.health.map((h) => [h.strategy, h.status])).toEqual([
      ['structured', 'healthy'],
      ['visible-text', 'healthy'],
    ])
    expect(session.acquired).toBe(2)
    expect(session.released).toBe(true)
  })

  test('rejects a bad alias table before acquiring pages', async () => {
    const session = aliceSession()

    await expect(
      scrapeProfiles([ALICE], {
        session,
        aliasTable: { 'profile.nickname': ['name'] },
      }),
    ).rejects.toBeInstanceOf(ConfigurationError)
    expect(session.acquired).toBe(0)
    expect(session.released).toBe(false)
  })

  test('rejects an unknown platform', async () => {
    await expect(
      scrapeProfiles([ALICE], { session: aliceSession(), platform: 'myspace' }),
    ).rejects.toThrow(/Unknown platform 'myspace'/)
  })

  test('releases the session when pages cannot be acquired', async () => {
    const session = new FakePageSource([])

    await expect(scrapeProfiles([ALICE], { session })).rejects.toThrow('No more pages')
    expect(session.released).toBe(true)
  })

  test('a failing sink is reported and the others still write', async () => {
    const callback = mockCallback()
    const failure = new StorageError('disk full')
    const broken: RecordSink = {
      name: 'broken',
      write: async () => {
        throw failure
      },
    }
    const store = new MemoryRecordStore()

    const result = await scrapeProfiles([ALICE], {
      ...fastOptions,
      session: aliceSession(),
      sinks: [broken, store],
      callback,
    })

    expect(callback.onError).toHaveBeenCalledWith('Sink broken failed', failure)
    expect(Object.keys(result.sinks)).toEqual(['memory'])
    expect(store.size).toBe(1)
  })

  test('sink errors other than storage failures propagate', async () => {
    const broken: RecordSink = {
      name: 'broken',
      write: async () => {
        throw new TypeError('bug in sink')
      },
    }

    await expect(
      scrapeProfiles([ALICE], {
        ...fastOptions,
        session: aliceSession(),
        sinks: [broken],
      }),
    ).rejects.toThrow('bug in sink')
  })
})

describe('readUrlList', () => {
  let dir: string

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'url-list-'))
  })

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  test('skips blank lines and comments', async () => {
    const file = path.join(dir, 'urls.txt')
    await fs.writeFile(
      file,
      '# profiles\n\nhttps://x.com/a\r\n  https://x.com/b  \n   # indented comment\n',
      'utf8',
    )

    expect(await readUrlList(file)).toEqual(['https://x.com/a', 'https://x.com/b'])
  })

  test('a missing file is a configuration error', async () => {
    await expect(readUrlList(path.join(dir, 'absent.txt'))).rejects.toBeInstanceOf(
      ConfigurationError,
    )
  })
})
