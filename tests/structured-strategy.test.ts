import { describe, expect, test } from 'vitest'
import {
  type StructuredOptions,
  StructuredFieldsStrategy,
} from '../src/extraction/strategies/structured-strategy'
import { TWITTER_PLATFORM } from '../src/platforms'
import { FakePage, type FakeProfile } from './helpers/fake-page'

const PROFILE_URL = 'https://x.com/alice'

const NAME = "div[data-testid='UserName'] span"
const NAME_FALLBACK = "h2[role='heading'] span"
const HANDLE = "div[data-testid='UserName'] div span:has-text('@')"
const BIO = "div[data-testid='UserDescription']"
const BIO_FALLBACK = "div[data-testid='UserDescription'] span"
const FOLLOWERS = "a[href$='/followers'] span"
const FOLLOWING = "a[href$='/following'] span"

const fullProfile: FakeProfile = {
  selectors: {
    [NAME]: [{ text: '  Alice   Example ' }],
    [HANDLE]: [{ text: 'alice' }],
    [BIO]: [{ text: 'Builder. Mail a@x.com' }],
    [FOLLOWERS]: [{ text: '12.3K' }],
    [FOLLOWING]: [{ text: '1,234' }],
  },
}

function strategy(options: StructuredOptions = {}) {
  return new StructuredFieldsStrategy(TWITTER_PLATFORM, {
    selectorTimeoutMs: 0,
    ...options,
  })
}

describe('StructuredFieldsStrategy', () => {
  test('reads every header field', async () => {
    const record = await strategy().extract(FakePage.at(PROFILE_URL, fullProfile), PROFILE_URL)

    expect(record).toMatchObject({
      platform: 'twitter',
      source_url: PROFILE_URL,
      twitter_link: PROFILE_URL,
      name: 'Alice Example',
      handle: '@alice',
      bio: 'Builder. Mail a@x.com',
      followers: '12.3K',
      followers_num: 12300,
      following: '1,234',
      following_num: 1234,
    })
    expect(record.error).toBeUndefined()
    expect(Number.isInteger(record.scraped_at)).toBe(true)
  })

  test('derives the handle from the url when no selector matches', async () => {
    const page = FakePage.at('https://x.com/bob', {
      selectors: { [NAME]: [{ text: 'Bob' }], [BIO]: [{ text: 'hi' }] },
    })

    const record = await strategy().extract(page, 'https://x.com/bob')

    expect(record.handle).toBe('@bob')
    expect(record.followers).toBeNull()
    expect(record.followers_num).toBeNull()
  })

  test('moves to the next candidate on blank text or a failed read', async () => {
    const page = FakePage.at(PROFILE_URL, {
      selectors: {
        [NAME]: [{ text: '   ' }],
        [NAME_FALLBACK]: [{ text: 'Alice' }],
        [BIO]: [{ detached: true }],
        [BIO_FALLBACK]: [{ text: 'Second try' }],
      },
    })

    const record = await strategy().extract(page, PROFILE_URL)

    expect(record.name).toBe('Alice')
    expect(record.bio).toBe('Second try')
  })

  test('tags a total failure but keeps captured fields', async () => {
    const page = FakePage.at(PROFILE_URL, {
      selectors: { [FOLLOWERS]: [{ text: '2M' }] },
    })

    const record = await strategy().extract(page, PROFILE_URL)

    expect(record.error).toBe('Failed to extract')
    expect(record.followers_num).toBe(2000000)
    expect(record.handle).toBe('@alice')
    expect(record.twitter_link).toBe(PROFILE_URL)
  })

  test('a name without a bio is not a failure by default', async () => {
    const page = FakePage.at(PROFILE_URL, { selectors: { [NAME]: [{ text: 'Alice' }] } })
    const record = await strategy().extract(page, PROFILE_URL)
    expect(record.error).toBeUndefined()
  })

  test('honours configured failure trigger fields', async () => {
    const page = FakePage.at(PROFILE_URL, { selectors: { [BIO]: [{ text: 'Bio only' }] } })

    const record = await strategy({ totalFailureFields: ['name'] }).extract(
      page,
      PROFILE_URL,
    )

    expect(record.error).toBe('Failed to extract')
    expect(record.bio).toBe('Bio only')
  })
})
