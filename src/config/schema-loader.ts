import fs from 'node:fs/promises'
import path from 'node:path'
import { ConfigurationError } from '../exceptions'
import type { SchemaTemplate, SchemaValue } from '../models/schema'
import { SchemaTemplateSchema, isSchemaObject } from '../models/schema'

export const DEFAULT_SCHEMA_TEMPLATE_PATH = path.resolve(
  __dirname,
  '..',
  '..',
  'config',
  'schema-template.json',
)

function deepFreeze<T extends SchemaValue>(value: T): T {
  if (Array.isArray(value)) {
    for (const item of value) deepFreeze(item)
  } else if (isSchemaObject(value)) {
    for (const child of Object.values(value)) deepFreeze(child)
  }
  Object.freeze(value)
  return value
}

/**
 * Parses and freezes a template object. Mapping always works on a copy.
 */
export function parseSchemaTemplate(raw: unknown, source = 'template'): SchemaTemplate {
  const result = SchemaTemplateSchema.safeParse(raw)
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid schema template in ${source}: ${result.error.issues[0]?.message ?? 'unknown issue'}`,
    )
  }
  return deepFreeze(result.data)
}

export async function loadSchemaTemplate(
  filePath: string = DEFAULT_SCHEMA_TEMPLATE_PATH,
): Promise<SchemaTemplate> {
  let content: string
  try {
    content = await fs.readFile(filePath, 'utf8')
  } catch (e) {
    throw new ConfigurationError(`Schema template not readable: ${filePath} (${e})`)
  }

  let raw: unknown
  try {
    raw = JSON.parse(content)
  } catch (e) {
    throw new ConfigurationError(`Schema template is not valid JSON: ${filePath} (${e})`)
  }

  return parseSchemaTemplate(raw, filePath)
}
