import { z } from 'zod'
import { decodeValue } from '@insight-kit/http'
import type { ResponseSchema } from '@insight-kit/http'

/** A classifier supported by the Natural Language Classifier service. */
export interface ClassifierModel {
  /** Unique identifier of this classifier. */
  readonly classifierId: string
  /** Link to the classifier. */
  readonly url: string
  /** User-supplied name, when one was given at training time. */
  readonly name?: string
  readonly language: string
  /** Date and time (UTC) the classifier was created. */
  readonly created: string
}

export type ClassifierStatus =
  | 'Non Existent'
  | 'Training'
  | 'Failed'
  | 'Available'
  | 'Unavailable'

export interface ClassifierDetails extends ClassifierModel {
  /** Usually one of ClassifierStatus; unknown values are passed through. */
  readonly status: ClassifierStatus | (string & {})
  /** Human-readable explanation of `status`. */
  readonly statusDescription: string
}

const classifierFields = {
  classifier_id: z.string().catch(''),
  url: z.string().catch(''),
  name: z.string().optional().catch(undefined),
  language: z.string().catch(''),
  created: z.string().catch(''),
}

export const classifierModelSchema: ResponseSchema<ClassifierModel> = z
  .object(classifierFields)
  .transform(
    (raw): ClassifierModel => ({
      classifierId: raw.classifier_id,
      url: raw.url,
      name: raw.name,
      language: raw.language,
      created: raw.created,
    }),
  )

export const classifierDetailsSchema: ResponseSchema<ClassifierDetails> = z
  .object({
    ...classifierFields,
    status: z.string().catch(''),
    status_description: z.string().catch(''),
  })
  .transform(
    (raw): ClassifierDetails => ({
      classifierId: raw.classifier_id,
      url: raw.url,
      name: raw.name,
      language: raw.language,
      created: raw.created,
      status: raw.status,
      statusDescription: raw.status_description,
    }),
  )

export const classifierListSchema: ResponseSchema<ClassifierModel[]> = z
  .object({ classifiers: z.array(classifierModelSchema).optional() })
  .transform((raw) => raw.classifiers ?? [])

/**
 * decodeClassifierModel(json)
 *
 * @example
 *   decodeClassifierModel(JSON.parse(body)).classifierId
 */
export function decodeClassifierModel(json: unknown): ClassifierModel {
  return decodeValue(json, classifierModelSchema)
}
