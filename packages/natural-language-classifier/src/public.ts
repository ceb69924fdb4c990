export { createNaturalLanguageClassifier, NATURAL_LANGUAGE_CLASSIFIER_URL } from './client'
export type { NaturalLanguageClassifier } from './client'

export {
  classifierDetailsSchema,
  classifierListSchema,
  classifierModelSchema,
  decodeClassifierModel,
} from './classifier-model'
export type { ClassifierDetails, ClassifierModel, ClassifierStatus } from './classifier-model'

export { classificationSchema } from './classification'
export type { Classification, ClassifiedClass } from './classification'
