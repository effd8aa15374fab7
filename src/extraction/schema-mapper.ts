import { ConfigurationError } from '../exceptions'
import type { FieldValue, MergedRecord } from '../models/record'
import type {
  AliasTable,
  SchemaRecord,
  SchemaTemplate,
  SchemaValue,
} from '../models/schema'
import { isSchemaObject } from '../models/schema'

interface ResolvedPath {
  parent: SchemaTemplate
  key: string
}

/**
 * Walks a dot path through the template without creating keys. Throws
 * ConfigurationError when a segment is missing or the path does not end on a
 * leaf (a scalar, a list, or an empty object).
 */
function resolvePath(root: SchemaTemplate, schemaPath: string): ResolvedPath {
  const parts = schemaPath.split('.')
  const key = parts.pop()
  if (!key) {
    throw new ConfigurationError(`Empty schema path`, schemaPath)
  }

  let parent = root
  for (const part of parts) {
    const next = parent[part]
    if (!isSchemaObject(next)) {
      throw new ConfigurationError(
        `Schema path '${schemaPath}' does not resolve: '${part}' is not an object in the template`,
        schemaPath,
      )
    }
    parent = next
  }

  if (!Object.prototype.hasOwnProperty.call(parent, key)) {
    throw new ConfigurationError(
      `Schema path '${schemaPath}' does not resolve: '${key}' is missing from the template`,
      schemaPath,
    )
  }

  const leaf = parent[key]
  if (isSchemaObject(leaf) && Object.keys(leaf).length > 0) {
    throw new ConfigurationError(
      `Schema path '${schemaPath}' ends on a nested object, not a leaf`,
      schemaPath,
    )
  }

  return { parent, key }
}

/**
 * Checks every alias path against the template. Run once at startup.
 */
export function validateAliasTable(
  template: SchemaTemplate,
  alias: AliasTable,
): void {
  for (const schemaPath of Object.keys(alias)) {
    resolvePath(template, schemaPath)
  }
}

export function isPresentValue(
  value: FieldValue | undefined,
): value is string | number | string[] {
  if (value === undefined || value === null) return false
  if (typeof value === 'string') return value.trim().length > 0
  if (Array.isArray(value)) return value.length > 0
  return Number.isFinite(value)
}

function toSchemaValue(value: FieldValue): SchemaValue {
  return Array.isArray(value) ? [...value] : value
}

/**
 * Projects a merged record onto a fresh copy of the template. For each path
 * the first alias candidate holding a present value wins; paths without one
 * keep the template default.
 */
export function mapToSchema(
  record: MergedRecord,
  template: SchemaTemplate,
  alias: AliasTable,
): SchemaRecord {
  const mapped = structuredClone(template)

  for (const [schemaPath, candidates] of Object.entries(alias)) {
    const { parent, key } = resolvePath(mapped, schemaPath)

    for (const candidate of candidates) {
      const value = record[candidate]
      if (isPresentValue(value)) {
        parent[key] = toSchemaValue(value)
        break
      }
    }
  }

  return mapped
}
