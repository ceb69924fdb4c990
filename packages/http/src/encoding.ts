import { RestError } from '@insight-kit/errors'

// In a `u` regex a surrogate range only matches unpaired halves.
const LONE_SURROGATE = /[\uD800-\uDFFF]/u

/**
 * encodeText(text, what)
 *
 * UTF-8 bytes of `text`. Strings holding an unpaired surrogate have no UTF-8
 * form and fail with a 'badData' error naming `what`.
 *
 * @example
 *   encodeText('héllo', 'Text') // → Uint8Array [104, 195, 169, 108, 108, 111]
 */
export function encodeText(text: string, what: string): Uint8Array {
  if (LONE_SURROGATE.test(text)) {
    throw RestError.badData(`${what} could not be encoded as UTF-8.`)
  }
  return new TextEncoder().encode(text)
}

/** UTF-8 bytes of `JSON.stringify(value)`. */
export function encodeJson(value: unknown, what: string): Uint8Array {
  let json: string | undefined
  try {
    json = JSON.stringify(value)
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e)
    throw RestError.badData(`${what} could not be serialized to JSON: ${reason}`)
  }
  if (json === undefined) {
    throw RestError.badData(`${what} could not be serialized to JSON.`)
  }
  return encodeText(json, what)
}
