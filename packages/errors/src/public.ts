import { Observable, Subject, Subscription, throwError } from 'rxjs'
import { catchError } from 'rxjs/operators'
import type { OperatorFunction } from 'rxjs'

// ---------------------------------------------------------------------------
// RestError
// ---------------------------------------------------------------------------

/**
 * What went wrong:
 *   'badData'      input could not be encoded before sending
 *   'invalidUrl'   the request URL lacks a scheme, host or path
 *   'transport'    the request never produced a response (network, abort)
 *   'http'         the service answered with a non-2xx status
 *   'badResponse'  the body was not JSON, or not the expected shape
 */
export type RestErrorKind = 'badData' | 'invalidUrl' | 'transport' | 'http' | 'badResponse'

export interface RestErrorOptions {
  statusCode?: number
  /** Raw response body, when there was one. */
  body?: string
  cause?: unknown
}

export class RestError extends Error {
  readonly kind: RestErrorKind
  readonly statusCode?: number
  readonly body?: string

  constructor(kind: RestErrorKind, message: string, options: RestErrorOptions = {}) {
    super(message, { cause: options.cause })
    this.name = 'RestError'
    this.kind = kind
    this.statusCode = options.statusCode
    this.body = options.body
  }

  static badData(reason: string): RestError {
    return new RestError('badData', reason)
  }

  static invalidUrl(reason: string): RestError {
    return new RestError('invalidUrl', reason)
  }

  static transport(message: string, cause?: unknown): RestError {
    return new RestError('transport', message, { cause })
  }

  static http(statusCode: number, message: string, body?: string): RestError {
    return new RestError('http', message, { statusCode, body })
  }

  static badResponse(reason: string, body?: string): RestError {
    return new RestError('badResponse', reason, { body })
  }
}

export function isRestError(value: unknown): value is RestError {
  return value instanceof RestError
}

// ---------------------------------------------------------------------------
// toRestError: normalise any thrown value
// ---------------------------------------------------------------------------

/**
 * toRestError(raw)
 *
 * RestErrors pass through untouched. Anything else is something the transport
 * threw, so it becomes a 'transport' error carrying the original as `cause`.
 */
export function toRestError(raw: unknown): RestError {
  if (raw instanceof RestError) return raw
  if (raw instanceof Error) return RestError.transport(raw.message, raw)
  if (typeof raw === 'string') return RestError.transport(raw)
  try {
    return RestError.transport(JSON.stringify(raw), raw)
  } catch {
    return RestError.transport(String(raw), raw)
  }
}

// ---------------------------------------------------------------------------
// ErrorHandler
// ---------------------------------------------------------------------------

export interface ReportedError {
  error: RestError
  /** Alias for error.message. */
  message: string
  /** Date.now() when the error was reported. */
  timestamp: number
  /** Label of the operation that failed, e.g. 'personality-insights/getProfile'. */
  context?: string
}

export interface ErrorHandlerConfig {
  /**
   * Called synchronously whenever an error is reported.
   * The usual place for console logging.
   */
  onError?: (reported: ReportedError) => void
}

export interface ErrorHandler {
  /** Hot stream of every reported error. Does NOT replay. */
  errors$: Observable<ReportedError>
  reportError(error: unknown, context?: string): void
}

/**
 * createErrorHandler(config?)
 *
 * Creates a central sink for request failures. Unsubscribing the returned
 * Subscription completes `errors$`.
 *
 * @example
 *   const [handler, sub] = createErrorHandler({
 *     onError: (e) => console.error(`[${e.context}] ${e.message}`),
 *   })
 *   const insights = createPersonalityInsights({ username, password, errorHandler: handler })
 */
export function createErrorHandler(
  config?: ErrorHandlerConfig,
): [ErrorHandler, Subscription] {
  const onError = config?.onError
  const bus = new Subject<ReportedError>()
  const cleanupSub = new Subscription(() => bus.complete())

  function reportError(raw: unknown, context?: string): void {
    const error = toRestError(raw)
    const reported: ReportedError = {
      error,
      message: error.message,
      timestamp: Date.now(),
      context,
    }
    onError?.(reported)
    bus.next(reported)
  }

  return [{ errors$: bus.asObservable(), reportError }, cleanupSub]
}

// ---------------------------------------------------------------------------
// reportErrors
// ---------------------------------------------------------------------------

/**
 * reportErrors(handler, context?)
 *
 * RxJS operator. Reports a failure to the handler, then rethrows it as a
 * RestError so the subscriber's error callback still runs.
 *
 * @example
 *   client.json(request, schema).pipe(reportErrors(handler, 'nlc/classify'))
 */
export function reportErrors<T>(
  handler: ErrorHandler,
  context?: string,
): OperatorFunction<T, T> {
  return (source: Observable<T>): Observable<T> =>
    source.pipe(
      catchError((raw: unknown) => {
        const error = toRestError(raw)
        handler.reportError(error, context)
        return throwError(() => error)
      }),
    )
}
