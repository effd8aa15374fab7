import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { afterAll, beforeAll, describe, expect, test } from 'vitest'
import { loadSchemaTemplate, parseSchemaTemplate } from '../src/config/schema-loader'
import { ConfigurationError } from '../src/exceptions'
import { mapToSchema, validateAliasTable } from '../src/extraction/schema-mapper'
import type { ExtractionRecord } from '../src/models/record'
import type { AliasTable } from '../src/models/schema'
import { TWITTER_PLATFORM } from '../src/platforms'

const template = parseSchemaTemplate({
  url: '',
  profile: { username: '', full_name: '', bio: '', followers_count: '' },
  contact: { emails: [], social: { twitter: '' } },
  metadata: { scraped_at: '', error: '' },
})

const alias: AliasTable = {
  url: ['twitter_link', 'source_url'],
  'profile.username': ['handle', 'username'],
  'profile.full_name': ['name'],
  'profile.bio': ['bio'],
  'profile.followers_count': ['followers_num'],
  'contact.emails': ['emails'],
  'contact.social.twitter': ['handle'],
  'metadata.scraped_at': ['scraped_at'],
  'metadata.error': ['error'],
}

const baseRecord: ExtractionRecord = {
  platform: 'twitter',
  source_url: 'https://x.com/alice',
  scraped_at: 1700000000,
  twitter_link: 'https://x.com/alice',
}

describe('mapToSchema', () => {
  test('leaves a missing field at the template default', () => {
    const mapped = mapToSchema({ ...baseRecord, name: 'Alice' }, template, alias)

    expect(mapped).toHaveProperty('profile.bio', '')
    expect(mapped).toHaveProperty('profile.full_name', 'Alice')
    expect(mapped).toHaveProperty('metadata.error', '')
  })

  test('takes the first candidate holding a present value', () => {
    const mapped = mapToSchema(
      { ...baseRecord, handle: '  ', username: 'alice' },
      template,
      alias,
    )

    expect(mapped.url).toBe('https://x.com/alice')
    expect(mapped).toHaveProperty('profile.username', 'alice')
  })

  test('falls back to a later candidate for the url', () => {
    const { twitter_link: _unused, ...withoutLink } = baseRecord
    const mapped = mapToSchema(withoutLink, template, alias)
    expect(mapped.url).toBe('https://x.com/alice')
  })

  test('writes numbers including zero and copies lists', () => {
    const emails = ['a@x.com']
    const mapped = mapToSchema(
      { ...baseRecord, followers_num: 0, emails, error: 'Navigation timeout' },
      template,
      alias,
    )

    expect(mapped).toHaveProperty('profile.followers_count', 0)
    expect(mapped).toHaveProperty('contact.emails', ['a@x.com'])
    expect(mapped).toHaveProperty('metadata.error', 'Navigation timeout')
    expect(mapped).toHaveProperty('metadata.scraped_at', 1700000000)

    emails.push('b@y.com')
    expect(mapped).toHaveProperty('contact.emails', ['a@x.com'])
  })

  test('skips empty lists and nulls', () => {
    const mapped = mapToSchema(
      { ...baseRecord, emails: [], bio: null },
      template,
      alias,
    )
    expect(mapped).toHaveProperty('contact.emails', [])
    expect(mapped).toHaveProperty('profile.bio', '')
  })

  test('never mutates the template', () => {
    mapToSchema({ ...baseRecord, bio: 'hello', handle: '@alice' }, template, alias)
    mapToSchema({ ...baseRecord, bio: 'other' }, template, alias)

    expect(template).toHaveProperty('profile.bio', '')
    expect(template).toHaveProperty('contact.social.twitter', '')
  })

  test('rejects an alias path missing from the template', () => {
    expect(() =>
      mapToSchema(baseRecord, template, { 'profile.nope': ['bio'] }),
    ).toThrow(ConfigurationError)
  })
})

describe('validateAliasTable', () => {
  test('accepts paths that end on leaves', () => {
    expect(() => validateAliasTable(template, alias)).not.toThrow()
  })

  test.each([
    ['profile.nope'],
    ['contact.social'],
    ['url.host'],
    ['missing.bio'],
  ])('rejects %s', (schemaPath) => {
    try {
      validateAliasTable(template, { [schemaPath]: ['bio'] })
      expect.unreachable()
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigurationError)
      expect(e).toHaveProperty('path', schemaPath)
    }
  })
})

describe('schema template loading', () => {
  let dir: string

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'schema-template-'))
  })

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  test('the bundled template resolves every twitter alias path', async () => {
    const bundled = await loadSchemaTemplate()
    expect(() => validateAliasTable(bundled, TWITTER_PLATFORM.aliasTable)).not.toThrow()
    expect(bundled.content_type).toBe('profile')
  })

  test('parsed templates are frozen', () => {
    expect(Object.isFrozen(template)).toBe(true)
    expect(Object.isFrozen(template.profile)).toBe(true)
  })

  test('rejects a template that is not an object', () => {
    expect(() => parseSchemaTemplate(['url'])).toThrow(ConfigurationError)
  })

  test('reports unreadable and malformed files', async () => {
    const broken = path.join(dir, 'broken.json')
    await fs.writeFile(broken, '{ "url": ', 'utf8')

    await expect(loadSchemaTemplate(broken)).rejects.toThrow(/not valid JSON/)
    await expect(loadSchemaTemplate(path.join(dir, 'absent.json'))).rejects.toThrow(
      ConfigurationError,
    )
  })

  test('loads a template from disk', async () => {
    const file = path.join(dir, 'template.json')
    await fs.writeFile(file, JSON.stringify({ url: '', profile: { bio: '' } }), 'utf8')

    const loaded = await loadSchemaTemplate(file)
    expect(loaded).toEqual({ url: '', profile: { bio: '' } })
  })
})
