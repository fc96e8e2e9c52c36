// packages/client/src/core/error-decoder.ts
import { DecodeError, RemoteApiError } from './errors.js'
import { isPlainObject, type JsonObject } from './json.js'

/**
 * Inspect an already-parsed body for the error envelope.
 * Returns null when there is no `error` key.
 */
export function decodeErrorEnvelope(parsed: JsonObject): RemoteApiError | null {
  if (!Object.prototype.hasOwnProperty.call(parsed, 'error')) return null

  const env = parsed.error
  if (!isPlainObject(env)) {
    throw new DecodeError('error envelope is not an object')
  }

  const code = typeof env.code === 'number' ? env.code : 0
  const status = typeof env.status === 'string' ? env.status : 'UNKNOWN'
  const message = typeof env.message === 'string' ? env.message : ''
  return new RemoteApiError(code, status, message)
}

/**
 * Parse a raw response body.
 *
 * - malformed JSON or a non-object body -> DecodeError
 * - `{ error: {...} }` -> RemoteApiError
 * - anything else is the success payload
 */
export function decodeResponse(body: string): JsonObject {
  let parsed: unknown
  try {
    parsed = JSON.parse(body)
  } catch (err) {
    throw new DecodeError('response body is not valid JSON', { body, cause: err })
  }

  if (!isPlainObject(parsed)) {
    throw new DecodeError('response body is not a JSON object', { body })
  }

  const remote = decodeErrorEnvelope(parsed)
  if (remote) throw remote
  return parsed
}
