import { Observable } from 'rxjs'
import { fromFetch } from 'rxjs/fetch'
import type { BasicCredentials, PreparedRequest } from './request'
import { requestUrl } from './request'

// ---------------------------------------------------------------------------
// HttpTransport: the seam between request building and the network
// ---------------------------------------------------------------------------

export interface TransportResponse {
  readonly status: number
  readonly statusText: string
  /** Lower-cased header names. */
  readonly headers: Readonly<Record<string, string>>
  readonly body: string
}

/**
 * Sends one prepared request. The returned Observable is cold: nothing is sent
 * until subscription, it emits a single response (whatever its status) and
 * completes, and unsubscribing aborts the request.
 */
export type HttpTransport = (request: PreparedRequest) => Observable<TransportResponse>

export function basicAuthorization(credentials: BasicCredentials): string {
  const token = Buffer.from(`${credentials.username}:${credentials.password}`, 'utf8').toString(
    'base64',
  )
  return `Basic ${token}`
}

/**
 * fetchTransport
 *
 * Default transport over the global `fetch`. Credentials travel as an
 * `Authorization: Basic …` header; a caller-supplied Authorization header
 * takes precedence.
 */
export const fetchTransport: HttpTransport = (request) => {
  const headers: Record<string, string> = { ...request.headers }
  const hasAuthorization = Object.keys(headers).some((h) => h.toLowerCase() === 'authorization')
  if (request.credentials && !hasAuthorization) {
    headers.Authorization = basicAuthorization(request.credentials)
  }

  return fromFetch(requestUrl(request), {
    method: request.method,
    headers,
    // fetch wants an ArrayBuffer-backed view
    body: request.body ? new Uint8Array(request.body) : undefined,
    selector: async (res): Promise<TransportResponse> => {
      const responseHeaders: Record<string, string> = {}
      res.headers.forEach((value, name) => {
        responseHeaders[name] = value
      })
      return {
        status: res.status,
        statusText: res.statusText,
        headers: responseHeaders,
        body: await res.text(),
      }
    },
  })
}
