export interface ExtractedEntities {
  emails: string[]
  phones: string[]
  hashtags: string[]
}

const EMAIL_PATTERN = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/g
const PHONE_PATTERN = /\+?\d[\d\s().-]{8,}\d/g
// A tag needs at least one non-digit, and must not continue a word or URL.
const HASHTAG_PATTERN =
  /(?<![\p{L}\p{N}_&#/])#([\p{L}\p{N}_]*[\p{L}_][\p{L}\p{N}_]*)/gu

const COMPACT_PATTERN = /^(\d[\d,]*(?:\.\d+)?)\s*([kmb])?(?=\s|$)/
const COMPACT_MULTIPLIERS: Record<string, number> = {
  k: 1_000,
  m: 1_000_000,
  b: 1_000_000_000,
}

/**
 * Collapses runs of whitespace (including non-breaking spaces) to one space
 * and trims both ends.
 */
export function normalizeWhitespace(text: string | null | undefined): string {
  if (!text) return ''
  // \s already covers U+00A0 and the other Unicode space separators.
  return text.replace(/\s+/g, ' ').trim()
}

/**
 * Drops empty values and repeats, keeping the first occurrence order.
 */
export function dedupeStrings(values: Iterable<string>): string[] {
  const seen = new Set<string>()
  const out: string[] = []

  for (const value of values) {
    if (!value || seen.has(value)) continue
    seen.add(value)
    out.push(value)
  }

  return out
}

export function extractEntities(
  text: string | null | undefined,
): ExtractedEntities {
  if (!text) return { emails: [], phones: [], hashtags: [] }

  const emails = dedupeStrings(
    Array.from(text.matchAll(EMAIL_PATTERN), (m) => m[0]),
  )
  const phones = dedupeStrings(
    Array.from(text.matchAll(PHONE_PATTERN), (m) => normalizeWhitespace(m[0])),
  )
  const hashtags = dedupeStrings(
    Array.from(text.matchAll(HASHTAG_PATTERN), (m) => `#${m[1] ?? ''}`),
  ).filter((tag) => tag.length > 1)

  return { emails, phones, hashtags }
}

/**
 * Parses compact counts such as "12.3K", "1.2M" or "1,234" into an integer.
 * A trailing label ("12.3K Followers") is ignored; anything else yields null.
 */
export function compactToInt(text: string | null | undefined): number | null {
  const normalized = normalizeWhitespace(text).toLowerCase()
  if (!normalized) return null

  const match = COMPACT_PATTERN.exec(normalized)
  if (!match?.[1]) return null

  const value = Number(match[1].replace(/,/g, ''))
  if (!Number.isFinite(value)) return null

  const multiplier = match[2] ? (COMPACT_MULTIPLIERS[match[2]] ?? 1) : 1
  return Math.round(value * multiplier)
}
