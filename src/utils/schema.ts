import { z } from 'zod'
import type { JsonValue } from '../rpc/index'

/**
 * A zod schema whose input side is left open. Schemas with defaults or
 * transforms have an input type different from their output, so descriptors
 * accept any of them through this alias.
 */
export type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>

/** Any JSON value (everything JSON.parse can produce). */
export const JsonSchema: Schema<JsonValue> = z.custom<JsonValue>((v) => v !== undefined, {
  message: 'expected a JSON value'
})

/** Pretty zod error formatter (one-line per issue) */
export function formatZodError(e: z.ZodError): string {
  return e.issues
    .map((i) => {
      const path = i.path.length ? i.path.join('.') : '(root)'
      return `${path}: ${i.message}`
    })
    .join('; ')
}

/** Wrap parse to throw compact messages */
export function parseOrThrow<T>(schema: Schema<T>, data: unknown, label?: string): T {
  const r = schema.safeParse(data)
  if (!r.success) {
    const msg = formatZodError(r.error)
    throw new TypeError(label ? `${label} invalid: ${msg}` : msg)
  }
  return r.data
}
