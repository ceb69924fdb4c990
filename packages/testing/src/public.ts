import { Observable, of, throwError } from 'rxjs'
import { requestUrl } from '@insight-kit/http'
import type { HttpMethod, HttpTransport, PreparedRequest, TransportResponse } from '@insight-kit/http'

// ---------------------------------------------------------------------------
// MockTransport: in-process stand-in for fetchTransport
// ---------------------------------------------------------------------------

export interface MockResponse {
  /** Answer with a raw body. */
  respond(status: number, body: string, headers?: Record<string, string>): void
  /** Answer with `JSON.stringify(value)`. Status defaults to 200. */
  respondJson(value: unknown, status?: number): void
  /** Fail without a response, as a network error would. */
  fail(error: unknown): void
}

export interface MockTransport {
  /** Pass this as the `transport` of a client. */
  transport: HttpTransport
  /** Every request the transport received, in order. */
  requests: PreparedRequest[]
  /** Configure the answer for `method` + absolute URL (query string included). */
  when(method: HttpMethod, url: string): MockResponse
}

const STATUS_TEXT: Record<number, string> = {
  200: 'OK',
  201: 'Created',
  204: 'No Content',
  400: 'Bad Request',
  401: 'Unauthorized',
  404: 'Not Found',
  415: 'Unsupported Media Type',
  500: 'Internal Server Error',
}

/**
 * createMockTransport()
 *
 * Records every prepared request and answers from a table configured with
 * `when()`. Unconfigured requests error. Answers are synchronous.
 *
 * @example
 *   const mock = createMockTransport()
 *   mock.when('GET', 'https://nlc.test/api/v1/classifiers').respondJson({ classifiers: [] })
 *
 *   const nlc = createNaturalLanguageClassifier({ ...credentials, serviceUrl: 'https://nlc.test/api', transport: mock.transport })
 *   await firstValueFrom(nlc.listClassifiers())
 *   expect(mock.requests[0].method).toBe('GET')
 */
export function createMockTransport(): MockTransport {
  const responses = new Map<string, () => Observable<TransportResponse>>()
  const requests: PreparedRequest[] = []

  function makeKey(method: string, url: string): string {
    return `${method} ${url}`
  }

  function when(method: HttpMethod, url: string): MockResponse {
    const key = makeKey(method, url)
    return {
      respond(status, body, headers = {}) {
        responses.set(key, () =>
          of({ status, statusText: STATUS_TEXT[status] ?? '', headers, body }),
        )
      },
      respondJson(value, status = 200) {
        responses.set(key, () =>
          of({
            status,
            statusText: STATUS_TEXT[status] ?? '',
            headers: { 'content-type': 'application/json' },
            body: JSON.stringify(value),
          }),
        )
      },
      fail(error) {
        responses.set(key, () => throwError(() => error))
      },
    }
  }

  const transport: HttpTransport = (request) => {
    requests.push(request)
    const url = requestUrl(request)
    const response = responses.get(makeKey(request.method, url))
    if (!response) {
      return throwError(() => new Error(`No mock configured for ${request.method} ${url}`))
    }
    return response()
  }

  return { transport, requests, when }
}

/** Decodes a captured request body as UTF-8. */
export function bodyText(request: PreparedRequest): string | undefined {
  return request.body ? new TextDecoder().decode(request.body) : undefined
}
