import { RestError } from '@insight-kit/errors'

/** One piece of authored text, e.g. a post or a tweet. */
export interface ContentItem {
  /** The text to analyze. */
  readonly content: string
  /** Unique identifier of this item. */
  readonly id?: string
  /** Identifier of the author. */
  readonly userId?: string
  /** Identifier of the source, e.g. 'twitter'. */
  readonly sourceId?: string
  /** Milliseconds since the epoch (UTC). */
  readonly created?: number
  /** Milliseconds since the epoch (UTC). */
  readonly updated?: number
  readonly contentType?: 'text/plain' | 'text/html'
  /** 'en', 'es', 'ja', … */
  readonly language?: string
  /** Identifier of the item this one replies to or forwards. */
  readonly parentId?: string
  readonly reply?: boolean
  readonly forward?: boolean
}

/** Wire form of a content item. Undefined fields vanish on stringify. */
export function contentItemToJson(item: ContentItem): Record<string, string | number | boolean | undefined> {
  return {
    id: item.id,
    userid: item.userId,
    sourceid: item.sourceId,
    created: item.created,
    updated: item.updated,
    contenttype: item.contentType,
    language: item.language,
    content: item.content,
    parentid: item.parentId,
    reply: item.reply,
    forward: item.forward,
  }
}

/**
 * serializeContentItems(items)
 *
 * @example
 *   serializeContentItems([{ content: 'first' }, { content: 'second' }])
 *   // → '{"contentItems":[{"content":"first"},{"content":"second"}]}'
 */
export function serializeContentItems(items: ReadonlyArray<ContentItem>): string {
  if (items.length === 0) {
    throw RestError.badData('At least one content item is required.')
  }
  return JSON.stringify({ contentItems: items.map(contentItemToJson) })
}
