import { z } from 'zod'

export type SchemaValue =
  | string
  | number
  | boolean
  | null
  | SchemaValue[]
  | SchemaTemplate

export interface SchemaTemplate {
  [key: string]: SchemaValue
}

/** Schema-shaped output record; same shape as the template it came from. */
export type SchemaRecord = SchemaTemplate

export const SchemaValueSchema: z.ZodType<SchemaValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(SchemaValueSchema),
    SchemaTemplateSchema,
  ]),
)

export const SchemaTemplateSchema: z.ZodType<SchemaTemplate> = z.lazy(() =>
  z.record(z.string(), SchemaValueSchema),
)

/**
 * Dot-delimited schema path (e.g. `profile.bio`) to the source fields that
 * may fill it, in order of preference.
 */
export const AliasTableSchema = z.record(
  z.string().regex(/^[^.]+(\.[^.]+)*$/, 'Schema path must be dot-delimited'),
  z.array(z.string().min(1)).min(1),
)

export type AliasTable = z.infer<typeof AliasTableSchema>

export function isSchemaObject(value: SchemaValue | undefined): value is SchemaTemplate {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
