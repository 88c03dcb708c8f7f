/**
 * HTTP Hosting Module
 */

export {
  createRequestListener,
  toDispatchInput,
  readRequestBody,
  parseQueryString,
  getClientIp,
  NodeResponseWriter,
  INTERNAL_ERROR_BODY,
} from './node-adapter';
export type { RawRequest, RawResponse, RequestListener, RequestListenerOptions } from './node-adapter';
export { HTTPServer, createHTTPServer } from './http-server';
export type { HTTPServerConfig, StopOptions } from './http-server';
export { serveStaticDir, listFiles, getMimeType, generateETag } from './static-files';
export type { StaticDirOptions } from './static-files';
