import { describe, expect, test } from 'vitest'
import {
  classifyLinks,
  ensureHandlePrefix,
  handleFromAuthorHref,
  handleFromUrl,
} from '../src/extraction/text/links'
import { TWITTER_PLATFORM } from '../src/platforms'

describe('classifyLinks', () => {
  test('splits same-site and external links, dropping excluded paths', () => {
    const hrefs = [
      '/alice',
      'https://x.com/alice#top',
      '/hashtag/ts',
      '/alice/analytics',
      '/search',
      'https://example.com/shop',
      'https://t.co/abc',
      'https://example.com/shop',
      'https://mobile.twitter.com/carol',
      'mailto:a@x.com',
      'javascript:void(0)',
      '',
    ]

    const links = classifyLinks(hrefs, 'https://x.com/bob', TWITTER_PLATFORM)

    expect(links.internal).toEqual([
      'https://x.com/alice',
      'https://mobile.twitter.com/carol',
    ])
    expect(links.external).toEqual(['https://example.com/shop', 'https://t.co/abc'])
  })

  test('returns empty lists when nothing is linked', () => {
    expect(classifyLinks([], 'https://x.com/bob', TWITTER_PLATFORM)).toEqual({
      internal: [],
      external: [],
    })
  })
})

describe('handles', () => {
  test('handleFromUrl uses the final path segment', () => {
    expect(handleFromUrl('https://x.com/alice')).toBe('@alice')
    expect(handleFromUrl('https://x.com/alice/')).toBe('@alice')
    expect(handleFromUrl('https://x.com/')).toBeNull()
  })

  test('handleFromAuthorHref uses the first path segment', () => {
    expect(handleFromAuthorHref('/bob/status/2')).toBe('@bob')
    expect(handleFromAuthorHref('https://x.com/carol')).toBe('@carol')
    expect(handleFromAuthorHref(null)).toBeNull()
  })

  test('ensureHandlePrefix adds @ once', () => {
    expect(ensureHandlePrefix('alice')).toBe('@alice')
    expect(ensureHandlePrefix('@alice')).toBe('@alice')
  })
})
