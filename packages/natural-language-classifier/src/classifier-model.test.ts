import { describe, it, expect } from 'vitest'
import { decodeValue } from '@insight-kit/http'
import fixture from './__fixtures__/classifier.json'
import { classifierDetailsSchema, classifierListSchema, decodeClassifierModel } from './classifier-model'

describe('decodeClassifierModel()', () => {
  it('copies the fixture fields exactly', () => {
    expect(decodeClassifierModel(fixture)).toEqual({
      classifierId: fixture.classifier_id,
      url: fixture.url,
      name: fixture.name,
      language: fixture.language,
      created: fixture.created,
    })
  })

  it('defaults missing strings and leaves a missing name undefined', () => {
    const model = decodeClassifierModel({ classifier_id: 'abc' })
    expect(model.classifierId).toBe('abc')
    expect(model.url).toBe('')
    expect(model.language).toBe('')
    expect(model.created).toBe('')
    expect(model.name).toBeUndefined()
  })

  it('rejects a body that is not an object', () => {
    expect(() => decodeClassifierModel([fixture])).toThrowError(/^Response did not match the expected shape/)
  })
})

describe('classifierDetailsSchema', () => {
  it('adds status and its description', () => {
    const details = decodeValue(
      { ...fixture, status: 'Training', status_description: 'The classifier instance is in its training state.' },
      classifierDetailsSchema,
    )
    expect(details.classifierId).toBe('10D41B-nlc-1')
    expect(details.status).toBe('Training')
    expect(details.statusDescription).toBe('The classifier instance is in its training state.')
  })
})

describe('classifierListSchema', () => {
  it('reads the classifiers array in order', () => {
    const list = decodeValue(
      { classifiers: [fixture, { ...fixture, classifier_id: 'second', name: undefined }] },
      classifierListSchema,
    )
    expect(list.map((c) => c.classifierId)).toEqual(['10D41B-nlc-1', 'second'])
    expect(list[1].name).toBeUndefined()
  })

  it('treats a missing array as empty', () => {
    expect(decodeValue({}, classifierListSchema)).toEqual([])
  })
})
