import { isPlatformHost } from '../../platforms'
import type { PlatformDefinition } from '../../platforms/types'
import type { ClassifiedLinks } from '../types'
import { dedupeStrings } from './entities'

function resolveHref(href: string, baseUrl: string): URL | null {
  try {
    const url = new URL(href, baseUrl)
    if (url.protocol !== 'http:' && url.protocol !== 'https:') return null
    url.hash = ''
    return url
  } catch {
    return null
  }
}

/**
 * Splits raw hrefs into same-site and external absolute URLs. Same-site links
 * on excluded paths (analytics, hashtag listings, search) are dropped.
 */
export function classifyLinks(
  hrefs: string[],
  baseUrl: string,
  platform: PlatformDefinition,
): ClassifiedLinks {
  const internal: string[] = []
  const external: string[] = []

  for (const raw of hrefs) {
    const href = raw.trim()
    if (!href) continue

    const url = resolveHref(href, baseUrl)
    if (!url) continue

    if (isPlatformHost(url.hostname.toLowerCase(), platform)) {
      if (platform.excludedLinkPaths.some((re) => re.test(url.pathname))) {
        continue
      }
      internal.push(url.toString())
    } else {
      external.push(url.toString())
    }
  }

  return { internal: dedupeStrings(internal), external: dedupeStrings(external) }
}

function lastPathSegment(pathname: string): string | null {
  const segments = pathname.split('/').filter(Boolean)
  return segments[segments.length - 1] ?? null
}

/**
 * `@name` from a profile URL's final path segment.
 */
export function handleFromUrl(profileUrl: string): string | null {
  let segment: string | null
  try {
    segment = lastPathSegment(new URL(profileUrl).pathname)
  } catch {
    segment = lastPathSegment(profileUrl)
  }
  return segment ? `@${segment.replace(/^@/, '')}` : null
}

/**
 * `@name` from an author link such as `/name` or `/name/status/1`.
 */
export function handleFromAuthorHref(href: string | null): string | null {
  if (!href) return null

  let pathname: string
  try {
    pathname = new URL(href, 'https://placeholder.invalid').pathname
  } catch {
    return null
  }

  const first = pathname.split('/').filter(Boolean)[0]
  return first ? `@${first.replace(/^@/, '')}` : null
}

export function ensureHandlePrefix(handle: string): string {
  return handle.startsWith('@') ? handle : `@${handle}`
}
