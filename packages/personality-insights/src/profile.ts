import { z } from 'zod'
import type { ResponseSchema } from '@insight-kit/http'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * A node of the characteristics tree. The root's children are the
 * categories (Big 5, Needs, Values); leaves carry the scores.
 */
export interface TraitTreeNode {
  readonly id: string
  readonly name: string
  /** 'personality', 'needs' or 'values'. */
  readonly category?: string
  /** Normalized score in [0, 1], compared with a sample population. */
  readonly percentage?: number
  readonly samplingError?: number
  /** Only present when the profile was requested with includeRaw. */
  readonly rawScore?: number
  readonly rawSamplingError?: number
  readonly children: ReadonlyArray<TraitTreeNode>
}

export interface ProfileWarning {
  readonly id: string
  readonly message: string
}

export interface Profile {
  readonly id: string
  readonly source: string
  /** Words found in the input. */
  readonly wordCount: number
  /** Set when the word count is too low for a precise profile. */
  readonly wordCountMessage?: string
  /** Language the input was analyzed in. */
  readonly processedLanguage: string
  readonly tree: TraitTreeNode
  readonly warnings: ReadonlyArray<ProfileWarning>
}

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

export const traitTreeNodeSchema: ResponseSchema<TraitTreeNode> = z.lazy(() =>
  z
    .object({
      id: z.string().catch(''),
      name: z.string().catch(''),
      category: z.string().optional(),
      percentage: z.number().optional(),
      sampling_error: z.number().optional(),
      raw_score: z.number().optional(),
      raw_sampling_error: z.number().optional(),
      children: z.array(traitTreeNodeSchema).optional(),
    })
    .transform(
      (raw): TraitTreeNode => ({
        id: raw.id,
        name: raw.name,
        category: raw.category,
        percentage: raw.percentage,
        samplingError: raw.sampling_error,
        rawScore: raw.raw_score,
        rawSamplingError: raw.raw_sampling_error,
        children: raw.children ?? [],
      }),
    ),
)

const warningSchema = z.object({
  id: z.string().catch(''),
  message: z.string().catch(''),
})

export const profileSchema: ResponseSchema<Profile> = z
  .object({
    id: z.string().catch(''),
    source: z.string().catch(''),
    word_count: z.number().catch(0),
    word_count_message: z.string().optional(),
    processed_lang: z.string().catch(''),
    tree: traitTreeNodeSchema,
    warnings: z.array(warningSchema).optional(),
  })
  .transform(
    (raw): Profile => ({
      id: raw.id,
      source: raw.source,
      wordCount: raw.word_count,
      wordCountMessage: raw.word_count_message,
      processedLanguage: raw.processed_lang,
      tree: raw.tree,
      warnings: raw.warnings ?? [],
    }),
  )

/** Depth-first search of the tree for the node with `id`. */
export function findTrait(tree: TraitTreeNode, id: string): TraitTreeNode | undefined {
  if (tree.id === id) return tree
  for (const child of tree.children) {
    const found = findTrait(child, id)
    if (found) return found
  }
  return undefined
}
