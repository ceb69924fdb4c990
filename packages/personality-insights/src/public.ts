export { createPersonalityInsights, PERSONALITY_INSIGHTS_URL } from './client'
export type { PersonalityInsights, ProfileInput, ProfileOptions } from './client'

export { contentItemToJson, serializeContentItems } from './content-item'
export type { ContentItem } from './content-item'

export { findTrait, profileSchema, traitTreeNodeSchema } from './profile'
export type { Profile, ProfileWarning, TraitTreeNode } from './profile'
