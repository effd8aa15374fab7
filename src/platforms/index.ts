import { ConfigurationError } from '../exceptions'
import { TWITTER_PLATFORM } from './twitter'
import type { PlatformDefinition } from './types'

export type { PlatformDefinition, StructuredField, VisibleTextSelectors } from './types'
export { TWITTER_PLATFORM } from './twitter'

const platforms = new Map<string, PlatformDefinition>([
  [TWITTER_PLATFORM.name, TWITTER_PLATFORM],
])

export function getPlatform(name: string): PlatformDefinition {
  const platform = platforms.get(name.trim().toLowerCase())
  if (!platform) {
    throw new ConfigurationError(
      `Unknown platform '${name}'. Supported: ${[...platforms.keys()].join(', ')}`,
    )
  }
  return platform
}

export function registerPlatform(platform: PlatformDefinition): void {
  platforms.set(platform.name.toLowerCase(), platform)
}

export function isPlatformUrl(url: string, platform: PlatformDefinition): boolean {
  let host: string
  try {
    const parsed = new URL(url)
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') return false
    host = parsed.hostname.toLowerCase()
  } catch {
    return false
  }
  return isPlatformHost(host, platform)
}

export function isPlatformHost(host: string, platform: PlatformDefinition): boolean {
  return platform.domains.some(
    (domain) => host === domain || host.endsWith(`.${domain}`),
  )
}
