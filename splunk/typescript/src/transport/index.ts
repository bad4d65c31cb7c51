/**
 * HTTP transport layer
 * @module splunk-client/transport
 */

export type { HttpRequest, HttpResponse, HttpTransport, StreamingHttpResponse } from './types.js';
export {
  bodyText,
  getContentType,
  getHeader,
  isSuccessResponse,
  readStreamText,
} from './types.js';
export { FetchTransport, createFetchTransport, type FetchTransportOptions } from './fetch-transport.js';
