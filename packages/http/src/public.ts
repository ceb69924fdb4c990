export { HTTP_METHODS, mergeHeaders, prepareRequest, requestUrl } from './request'
export type {
  BasicCredentials,
  HttpMethod,
  PrepareResult,
  PreparedRequest,
  QueryParameter,
  RestRequest,
} from './request'

export { basicAuthorization, fetchTransport } from './transport'
export type { HttpTransport, TransportResponse } from './transport'

export {
  createLoggingInterceptor,
  createRestClient,
  createServiceClient,
  decodeJson,
  decodeValue,
  errorMessage,
  executeRequest,
} from './client'
export type {
  LoggingInterceptorOptions,
  ResponseSchema,
  RestClient,
  RestClientConfig,
  RestInterceptor,
  ServiceConfig,
  ServiceRequest,
  ServiceRequestInput,
} from './client'

export { encodeJson, encodeText } from './encoding'
