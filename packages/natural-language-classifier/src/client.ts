import { Observable } from 'rxjs'
import { map } from 'rxjs/operators'
import { RestError } from '@insight-kit/errors'
import { createServiceClient, encodeJson } from '@insight-kit/http'
import type { ServiceConfig } from '@insight-kit/http'
import { classificationSchema } from './classification'
import type { Classification } from './classification'
import { classifierDetailsSchema, classifierListSchema } from './classifier-model'
import type { ClassifierDetails, ClassifierModel } from './classifier-model'

export const NATURAL_LANGUAGE_CLASSIFIER_URL =
  'https://gateway.watsonplatform.net/natural-language-classifier/api'

export interface NaturalLanguageClassifier {
  /** Every classifier owned by the credentials. */
  listClassifiers(): Observable<ClassifierModel[]>
  /** Metadata and training status of one classifier. */
  getClassifier(classifierId: string): Observable<ClassifierDetails>
  /** Classes of `text`, most confident first. */
  classify(classifierId: string, text: string): Observable<Classification>
  /** Emits once the classifier is gone. */
  deleteClassifier(classifierId: string): Observable<void>
}

/** `.` and `..` would be collapsed by URL parsing and address another resource. */
const DOT_SEGMENT = /^\.{1,2}$/

function classifierPath(classifierId: string): string {
  if (classifierId.length === 0) {
    throw RestError.badData('A classifier id is required.')
  }
  if (DOT_SEGMENT.test(classifierId)) {
    throw RestError.badData(`Invalid classifier id: ${classifierId}`)
  }
  let segment: string
  try {
    segment = encodeURIComponent(classifierId)
  } catch (e) {
    // lone surrogates
    throw new RestError('badData', 'Classifier id could not be encoded.', { cause: e })
  }
  return `/v1/classifiers/${segment}`
}

/**
 * createNaturalLanguageClassifier(config)
 *
 * Client for the Natural Language Classifier service, which matches short
 * phrases against classes learned from training data.
 *
 * @example
 *   const nlc = createNaturalLanguageClassifier({ username, password })
 *   nlc.classify('10D41B-nlc-1', 'How hot will it be today?').subscribe((c) => console.log(c.topClass))
 */
export function createNaturalLanguageClassifier(config: ServiceConfig): NaturalLanguageClassifier {
  const client = createServiceClient(config, NATURAL_LANGUAGE_CLASSIFIER_URL)

  return {
    listClassifiers(): Observable<ClassifierModel[]> {
      return client.json(
        { method: 'GET', path: '/v1/classifiers', acceptType: 'application/json' },
        classifierListSchema,
        'natural-language-classifier/listClassifiers',
      )
    },

    getClassifier(classifierId: string): Observable<ClassifierDetails> {
      return client.json(
        () => ({ method: 'GET', path: classifierPath(classifierId), acceptType: 'application/json' }),
        classifierDetailsSchema,
        'natural-language-classifier/getClassifier',
      )
    },

    classify(classifierId: string, text: string): Observable<Classification> {
      return client.json(
        () => ({
          method: 'POST',
          path: `${classifierPath(classifierId)}/classify`,
          acceptType: 'application/json',
          contentType: 'application/json',
          messageBody: encodeJson({ text }, 'Classification text'),
        }),
        classificationSchema,
        'natural-language-classifier/classify',
      )
    },

    deleteClassifier(classifierId: string): Observable<void> {
      return client
        .send(
          () => ({ method: 'DELETE', path: classifierPath(classifierId), acceptType: 'application/json' }),
          'natural-language-classifier/deleteClassifier',
        )
        .pipe(map(() => undefined))
    },
  }
}
