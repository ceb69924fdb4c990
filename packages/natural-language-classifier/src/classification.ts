import { z } from 'zod'
import type { ResponseSchema } from '@insight-kit/http'

export interface ClassifiedClass {
  readonly className: string
  /** In [0, 1]; the confidences of all classes sum to 1. */
  readonly confidence: number
}

/** The result of classifying one phrase. */
export interface Classification {
  readonly classifierId: string
  readonly url: string
  /** The phrase that was classified. */
  readonly text: string
  /** Class with the highest confidence. */
  readonly topClass: string
  /** Ordered by descending confidence, as returned by the service. */
  readonly classes: ReadonlyArray<ClassifiedClass>
}

const classifiedClassSchema = z
  .object({
    class_name: z.string().catch(''),
    confidence: z.number().catch(0),
  })
  .transform((raw): ClassifiedClass => ({ className: raw.class_name, confidence: raw.confidence }))

export const classificationSchema: ResponseSchema<Classification> = z
  .object({
    classifier_id: z.string().catch(''),
    url: z.string().catch(''),
    text: z.string().catch(''),
    top_class: z.string().catch(''),
    classes: z.array(classifiedClassSchema).optional(),
  })
  .transform(
    (raw): Classification => ({
      classifierId: raw.classifier_id,
      url: raw.url,
      text: raw.text,
      topClass: raw.top_class,
      classes: raw.classes ?? [],
    }),
  )
