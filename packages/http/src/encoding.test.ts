import { describe, it, expect } from 'vitest'
import { RestError } from '@insight-kit/errors'
import { encodeJson, encodeText } from './encoding'

describe('encodeText()', () => {
  it('returns the UTF-8 bytes of any well-formed string', () => {
    const samples = ['', 'plain ascii', 'héllo wörld', '日本語のテキスト', 'emoji 🎉 and 𝄞', 'tab\tnew\nline']
    for (const text of samples) {
      expect(encodeText(text, 'Text')).toEqual(new TextEncoder().encode(text))
    }
  })

  it('encodes multi-byte characters', () => {
    expect(Array.from(encodeText('é', 'Text'))).toEqual([0xc3, 0xa9])
  })

  it('rejects an unpaired surrogate as badData', () => {
    expect(() => encodeText('broken \uD83D text', 'HTML')).toThrowError('HTML could not be encoded as UTF-8.')
    try {
      encodeText('\uDC00', 'Text')
    } catch (e) {
      expect(e).toBeInstanceOf(RestError)
      expect((e as RestError).kind).toBe('badData')
    }
  })
})

describe('encodeJson()', () => {
  it('encodes compact JSON', () => {
    expect(new TextDecoder().decode(encodeJson({ text: 'How hot is it?' }, 'Body'))).toBe(
      '{"text":"How hot is it?"}',
    )
  })

  it('rejects values JSON cannot represent', () => {
    expect(() => encodeJson(undefined, 'Body')).toThrowError('Body could not be serialized to JSON.')
    expect(() => encodeJson({ n: BigInt(1) }, 'Body')).toThrowError(/^Body could not be serialized to JSON: /)
  })
})
