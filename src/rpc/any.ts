/**
 * Escape hatch for methods the catalog does not know about (experimental or
 * unstable server methods). The caller owns the name/shape pairing.
 *
 *   // whatever the server returns, as JSON
 *   const raw = await client.call(anyMethod('EXPERIMENTAL_genesis_config'))
 *
 *   // only the fields we care about
 *   const partial = await client.call(
 *     anyMethod('EXPERIMENTAL_genesis_config', null, {
 *       result: z.object({ chain_id: z.string(), genesis_height: z.number() })
 *     })
 *   )
 */

import type { JsonValue } from './index'
import { SchemaMethod } from './method'
import { JsonSchema, type Schema } from '../utils/schema'

export class AnyMethod<R, E = never> extends SchemaMethod<R, E> {
  readonly kind = 'any'
}

export interface AnySchemas<R, E> {
  result: Schema<R>
  error?: Schema<E>
}

/** Result is any JSON value and always decodes; handler errors never match. */
export function anyMethod(method: string, params?: JsonValue): AnyMethod<JsonValue>
export function anyMethod<R, E = never>(method: string, params: JsonValue, schemas: AnySchemas<R, E>): AnyMethod<R, E>
export function anyMethod<R, E>(
  method: string,
  params: JsonValue = null,
  schemas?: AnySchemas<R, E>
): AnyMethod<R, E> | AnyMethod<JsonValue> {
  if (!schemas) return new AnyMethod<JsonValue>(method, params, { result: JsonSchema, resultName: 'JSON value' })
  return new AnyMethod<R, E>(method, params, { result: schemas.result, error: schemas.error })
}
