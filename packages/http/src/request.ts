import { RestError } from '@insight-kit/errors'

// ---------------------------------------------------------------------------
// RestRequest: the descriptor of one HTTP call
// ---------------------------------------------------------------------------

export const HTTP_METHODS = [
  'OPTIONS',
  'GET',
  'HEAD',
  'POST',
  'PUT',
  'PATCH',
  'DELETE',
  'TRACE',
  'CONNECT',
] as const

export type HttpMethod = (typeof HTTP_METHODS)[number]

export interface QueryParameter {
  readonly name: string
  readonly value: string
}

export interface BasicCredentials {
  readonly username: string
  readonly password: string
}

export interface RestRequest {
  readonly method: HttpMethod
  readonly url: string
  /** Sent as `Accept`. */
  readonly acceptType?: string
  /** Sent as `Content-Type`. */
  readonly contentType?: string
  /** When non-empty, replaces the query string of `url`. Order is kept. */
  readonly queryParameters?: ReadonlyArray<QueryParameter>
  /** Merged last; wins over acceptType / contentType. */
  readonly headerParameters?: Readonly<Record<string, string>>
  readonly messageBody?: Uint8Array
  readonly credentials?: BasicCredentials
}

/**
 * A RestRequest resolved into what the transport needs.
 * `path` already carries the percent-encoded query string.
 */
export interface PreparedRequest {
  readonly method: HttpMethod
  /** Without the colon, e.g. 'https'. */
  readonly scheme: string
  /** Hostname plus ':port' when the URL names one. */
  readonly host: string
  readonly path: string
  readonly headers: Readonly<Record<string, string>>
  readonly body?: Uint8Array
  readonly credentials?: BasicCredentials
}

export type PrepareResult =
  | { ok: true; request: PreparedRequest }
  | { ok: false; error: RestError }

// ---------------------------------------------------------------------------
// mergeHeaders
// ---------------------------------------------------------------------------

/**
 * mergeHeaders(acceptType?, contentType?, headerParameters?)
 *
 * Header names collide case-insensitively; the later value wins and keeps
 * its own spelling of the name.
 *
 * @example
 *   mergeHeaders('application/json', 'text/plain', { accept: 'text/csv' })
 *   // → { 'Content-Type': 'text/plain', accept: 'text/csv' }
 */
export function mergeHeaders(
  acceptType?: string,
  contentType?: string,
  headerParameters?: Readonly<Record<string, string>>,
): Record<string, string> {
  const headers: Record<string, string> = {}

  const set = (name: string, value: string) => {
    const lower = name.toLowerCase()
    for (const existing of Object.keys(headers)) {
      if (existing.toLowerCase() === lower) delete headers[existing]
    }
    headers[name] = value
  }

  if (acceptType !== undefined) set('Accept', acceptType)
  if (contentType !== undefined) set('Content-Type', contentType)
  for (const [name, value] of Object.entries(headerParameters ?? {})) {
    set(name, value)
  }
  return headers
}

// ---------------------------------------------------------------------------
// prepareRequest
// ---------------------------------------------------------------------------

const SCHEME_PREFIX = /^[a-zA-Z][a-zA-Z0-9+.-]*:/

function parseUrl(url: string): URL | RestError {
  if (!SCHEME_PREFIX.test(url)) {
    return RestError.invalidUrl(
      `Cannot execute request. Please add a scheme to the url (e.g. "http://"): ${url}`,
    )
  }
  try {
    return new URL(url)
  } catch {
    return RestError.invalidUrl(
      `Cannot execute request. Please add a hostname to the url (e.g. "www.example.com"): ${url}`,
    )
  }
}

/**
 * prepareRequest(request)
 *
 * Merges headers, resolves scheme / host / path / query from the URL and
 * attaches credentials. A URL without a scheme, host or path is an
 * `invalidUrl` error result.
 *
 * @example
 *   const result = prepareRequest({
 *     method: 'POST',
 *     url: 'https://api.example.com/v2/profile',
 *     queryParameters: [{ name: 'include_raw', value: 'true' }],
 *   })
 *   if (result.ok) result.request.path // → '/v2/profile?include_raw=true'
 */
export function prepareRequest(request: RestRequest): PrepareResult {
  const parsed = parseUrl(request.url)
  if (parsed instanceof RestError) return { ok: false, error: parsed }

  const scheme = parsed.protocol.replace(/:$/, '')
  if (parsed.host === '') {
    return {
      ok: false,
      error: RestError.invalidUrl(
        `Cannot execute request. Please add a hostname to the url (e.g. "www.example.com"): ${request.url}`,
      ),
    }
  }
  if (parsed.pathname === '') {
    return {
      ok: false,
      error: RestError.invalidUrl(
        `Cannot execute request. Path could not be determined from the url: ${request.url}`,
      ),
    }
  }

  const queryParameters = request.queryParameters ?? []
  let query = parsed.search
  if (queryParameters.length > 0) {
    const usp = new URLSearchParams()
    for (const { name, value } of queryParameters) usp.append(name, value)
    query = `?${usp.toString()}`
  }

  return {
    ok: true,
    request: {
      method: request.method,
      scheme,
      host: parsed.host,
      path: parsed.pathname + query,
      headers: mergeHeaders(request.acceptType, request.contentType, request.headerParameters),
      body: request.messageBody,
      credentials: request.credentials,
    },
  }
}

/** Reassembles the absolute URL of a prepared request. */
export function requestUrl(request: PreparedRequest): string {
  return `${request.scheme}://${request.host}${request.path}`
}
