import { Observable } from 'rxjs'
import { createServiceClient, encodeText } from '@insight-kit/http'
import type { QueryParameter, ServiceConfig } from '@insight-kit/http'
import type { ContentItem } from './content-item'
import { serializeContentItems } from './content-item'
import { profileSchema } from './profile'
import type { Profile } from './profile'

export const PERSONALITY_INSIGHTS_URL = 'https://gateway.watsonplatform.net/personality-insights/api'

/** What to analyze: plain text, a web page, or a list of content items. */
export type ProfileInput =
  | { text: string }
  | { html: string }
  | { contentItems: ReadonlyArray<ContentItem> }

export interface ProfileOptions {
  /** Language of the response, e.g. 'en'. */
  acceptLanguage?: string
  /** Language of the input, e.g. 'es'. */
  contentLanguage?: string
  /**
   * Also return raw scores and raw sampling errors, which are not compared
   * with a sample population.
   */
  includeRaw?: boolean
}

export interface PersonalityInsights {
  /**
   * Analyzes the input and emits its personality profile.
   * HTML tags are stripped by the service before analysis.
   */
  getProfile(input: ProfileInput, options?: ProfileOptions): Observable<Profile>
}

function encodeInput(input: ProfileInput): { content: Uint8Array; contentType: string } {
  if ('text' in input) {
    return { content: encodeText(input.text, 'Text'), contentType: 'text/plain' }
  }
  if ('html' in input) {
    return { content: encodeText(input.html, 'HTML'), contentType: 'text/html' }
  }
  return {
    content: encodeText(serializeContentItems(input.contentItems), 'Content items'),
    contentType: 'application/json',
  }
}

/**
 * createPersonalityInsights(config)
 *
 * Client for the Personality Insights service, which derives cognitive and
 * social characteristics from text a person has written.
 *
 * @example
 *   const insights = createPersonalityInsights({ username, password })
 *   insights.getProfile({ text: essay }, { includeRaw: true }).subscribe({
 *     next: (profile) => console.log(profile.tree.children.map((c) => c.name)),
 *     error: (err: RestError) => console.error(err.kind, err.message),
 *   })
 */
export function createPersonalityInsights(config: ServiceConfig): PersonalityInsights {
  const client = createServiceClient(config, PERSONALITY_INSIGHTS_URL)

  return {
    getProfile(input: ProfileInput, options: ProfileOptions = {}): Observable<Profile> {
      return client.json(
        () => {
          const { content, contentType } = encodeInput(input)

          const queryParameters: QueryParameter[] = []
          if (options.includeRaw !== undefined) {
            queryParameters.push({ name: 'include_raw', value: String(options.includeRaw) })
          }

          const headerParameters: Record<string, string> = {}
          if (options.acceptLanguage !== undefined) {
            headerParameters['Accept-Language'] = options.acceptLanguage
          }
          if (options.contentLanguage !== undefined) {
            headerParameters['Content-Language'] = options.contentLanguage
          }

          return {
            method: 'POST',
            path: '/v2/profile',
            acceptType: 'application/json',
            contentType,
            queryParameters,
            headerParameters,
            messageBody: content,
          }
        },
        profileSchema,
        'personality-insights/getProfile',
      )
    },
  }
}
