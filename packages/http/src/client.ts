import { Observable, defer, throwError } from 'rxjs'
import { catchError, map, tap } from 'rxjs/operators'
import type { ZodType, ZodTypeDef } from 'zod'
import { RestError, reportErrors, toRestError } from '@insight-kit/errors'
import type { ErrorHandler } from '@insight-kit/errors'
import { prepareRequest, requestUrl } from './request'
import type { BasicCredentials, PreparedRequest, RestRequest } from './request'
import { fetchTransport } from './transport'
import type { HttpTransport, TransportResponse } from './transport'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A RestRequest addressed relative to the client's service URL. */
export interface ServiceRequest extends Omit<RestRequest, 'url' | 'credentials'> {
  /** Appended to the service URL, e.g. '/v2/profile'. */
  readonly path: string
}

/**
 * A request, or a factory for one. A factory that throws (say, because the
 * body cannot be encoded) fails the Observable on subscribe, before anything
 * reaches the transport.
 */
export type ServiceRequestInput = ServiceRequest | (() => ServiceRequest)

/** A zod schema that validates raw JSON and maps it to T. */
export type ResponseSchema<T> = ZodType<T, ZodTypeDef, unknown>

/**
 * An interceptor can rewrite the prepared request and/or wrap the response
 * Observable.
 *
 * - `request(prepared)`: called before the transport. Return a modified request.
 * - `response(source$, prepared)`: called after the transport Observable is
 *   created. Return a transformed Observable (logging, error mapping).
 *
 * Both methods are optional.
 */
export interface RestInterceptor {
  request?(request: PreparedRequest): PreparedRequest
  response?(source$: Observable<TransportResponse>, request: PreparedRequest): Observable<TransportResponse>
}

export interface RestClientConfig {
  /** Base URL every request path is appended to. Trailing slashes are dropped. */
  serviceUrl: string
  credentials?: BasicCredentials
  /** Sent with every request; per-request headerParameters win. */
  headers?: Readonly<Record<string, string>>
  /** Defaults to `fetchTransport`. */
  transport?: HttpTransport
  /** Request phase left-to-right, response phase right-to-left. */
  interceptors?: ReadonlyArray<RestInterceptor>
  /** Receives every failure before it reaches the subscriber. */
  errorHandler?: ErrorHandler
}

export interface RestClient {
  readonly serviceUrl: string
  /** Sends the request; errors on anything but a 2xx response. */
  send(request: ServiceRequestInput, context?: string): Observable<TransportResponse>
  /** Sends the request and decodes the JSON body through `schema`. */
  json<T>(request: ServiceRequestInput, schema: ResponseSchema<T>, context?: string): Observable<T>
}

// ---------------------------------------------------------------------------
// executeRequest
// ---------------------------------------------------------------------------

/**
 * executeRequest(request, transport?)
 *
 * Prepares and sends a single request. An invalid URL errors the returned
 * Observable with an 'invalidUrl' RestError; the transport is never called.
 *
 * @example
 *   executeRequest({ method: 'GET', url: 'https://api.example.com/v1/items' })
 *     .subscribe({ next: (res) => console.log(res.status), error: console.error })
 */
export function executeRequest(
  request: RestRequest,
  transport: HttpTransport = fetchTransport,
): Observable<TransportResponse> {
  return defer(() => {
    const prepared = prepareRequest(request)
    if (!prepared.ok) return throwError(() => prepared.error)
    return transport(prepared.request)
  })
}

// ---------------------------------------------------------------------------
// Response helpers
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * The service reports failures as `{ "code": 400, "error": "…" }` or
 * `{ "code": 404, "description": "…" }`. Falls back to the status line.
 */
export function errorMessage(response: TransportResponse): string {
  try {
    const parsed: unknown = JSON.parse(response.body)
    if (isRecord(parsed)) {
      if (typeof parsed.error === 'string') return parsed.error
      if (isRecord(parsed.error) && typeof parsed.error.message === 'string') {
        return parsed.error.message
      }
      if (typeof parsed.description === 'string') return parsed.description
    }
  } catch {
    // not JSON; use the status line
  }
  return `HTTP ${response.status} ${response.statusText}`.trim()
}

function ensureSuccess(response: TransportResponse): TransportResponse {
  if (response.status >= 200 && response.status < 300) return response
  throw RestError.http(response.status, errorMessage(response), response.body)
}

/** Validates already-parsed JSON against `schema`; a mismatch is 'badResponse'. */
export function decodeValue<T>(json: unknown, schema: ResponseSchema<T>, body?: string): T {
  const result = schema.safeParse(json)
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw RestError.badResponse(`Response did not match the expected shape: ${issues}`, body)
  }
  return result.data
}

/** Parses a JSON body and validates it against `schema`. */
export function decodeJson<T>(body: string, schema: ResponseSchema<T>): T {
  let json: unknown
  try {
    json = JSON.parse(body)
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e)
    throw RestError.badResponse(`Response body is not valid JSON: ${reason}`, body)
  }
  return decodeValue(json, schema, body)
}

// ---------------------------------------------------------------------------
// createRestClient
// ---------------------------------------------------------------------------

/**
 * createRestClient(config)
 *
 * Binds a service URL, credentials, transport and interceptors. Service
 * clients build on this; every method returns a cold Observable that emits
 * once and completes, or errors with a RestError.
 *
 * @example
 *   const client = createRestClient({
 *     serviceUrl: 'https://api.example.com/nlc/api',
 *     credentials: { username, password },
 *     interceptors: [createLoggingInterceptor({ prefix: 'nlc' })],
 *   })
 *   client.json({ method: 'GET', path: '/v1/classifiers' }, classifierListSchema)
 */
export function createRestClient(config: RestClientConfig): RestClient {
  const serviceUrl = config.serviceUrl.replace(/\/+$/, '')
  const transport = config.transport ?? fetchTransport
  const interceptors = config.interceptors ?? []
  const errorHandler = config.errorHandler

  function exchange(input: ServiceRequestInput): Observable<TransportResponse> {
    return defer(() => {
      const { path, headerParameters, ...rest } = typeof input === 'function' ? input() : input
      const prepared = prepareRequest({
        ...rest,
        url: serviceUrl + (path.startsWith('/') ? path : '/' + path),
        headerParameters: { ...config.headers, ...headerParameters },
        credentials: config.credentials,
      })
      if (!prepared.ok) return throwError(() => prepared.error)

      // Apply request interceptors left-to-right
      let request = prepared.request
      for (const i of interceptors) {
        if (i.request) request = i.request(request)
      }

      let result$ = transport(request).pipe(catchError((raw: unknown) => throwError(() => toRestError(raw))))

      // Apply response interceptors right-to-left (reverse order)
      for (let idx = interceptors.length - 1; idx >= 0; idx--) {
        const i = interceptors[idx]
        if (i.response) result$ = i.response(result$, request)
      }

      return result$.pipe(map(ensureSuccess))
    })
  }

  function reported<T>(source$: Observable<T>, context?: string): Observable<T> {
    const normalised$ = source$.pipe(catchError((raw: unknown) => throwError(() => toRestError(raw))))
    return errorHandler ? normalised$.pipe(reportErrors(errorHandler, context)) : normalised$
  }

  return {
    serviceUrl,
    send(request: ServiceRequestInput, context?: string): Observable<TransportResponse> {
      return reported(exchange(request), context)
    },
    json<T>(request: ServiceRequestInput, schema: ResponseSchema<T>, context?: string): Observable<T> {
      return reported(
        exchange(request).pipe(map((response) => decodeJson(response.body, schema))),
        context,
      )
    },
  }
}

// ---------------------------------------------------------------------------
// createLoggingInterceptor
// ---------------------------------------------------------------------------

export interface LoggingInterceptorOptions {
  /** Shown in brackets at the start of each line. Defaults to 'http'. */
  prefix?: string
  /** Defaults to console.log. */
  log?: (line: string) => void
}

/**
 * createLoggingInterceptor(options?)
 *
 * Logs one line per outgoing request and one per response status.
 * Failures without a response are left to the error handler.
 *
 * @example
 *   createRestClient({ serviceUrl, interceptors: [createLoggingInterceptor({ prefix: 'insights' })] })
 *   // [insights] POST https://…/v2/profile?include_raw=true
 *   // [insights] 200 POST https://…/v2/profile?include_raw=true
 */
export function createLoggingInterceptor(options?: LoggingInterceptorOptions): RestInterceptor {
  const prefix = options?.prefix ?? 'http'
  const log = options?.log ?? ((line: string) => console.log(line))

  return {
    request: (request) => {
      log(`[${prefix}] ${request.method} ${requestUrl(request)}`)
      return request
    },
    response: (source$, request) =>
      source$.pipe(
        tap((response) => log(`[${prefix}] ${response.status} ${request.method} ${requestUrl(request)}`)),
      ),
  }
}

// ---------------------------------------------------------------------------
// createServiceClient
// ---------------------------------------------------------------------------

/** What every service client is configured with. */
export interface ServiceConfig {
  username: string
  password: string
  /** Overrides the service's default base URL. */
  serviceUrl?: string
  /** Sent with every request of this client. */
  headers?: Readonly<Record<string, string>>
  transport?: HttpTransport
  interceptors?: ReadonlyArray<RestInterceptor>
  errorHandler?: ErrorHandler
}

export function createServiceClient(config: ServiceConfig, defaultServiceUrl: string): RestClient {
  return createRestClient({
    serviceUrl: config.serviceUrl ?? defaultServiceUrl,
    credentials: { username: config.username, password: config.password },
    headers: config.headers,
    transport: config.transport,
    interceptors: config.interceptors,
    errorHandler: config.errorHandler,
  })
}
