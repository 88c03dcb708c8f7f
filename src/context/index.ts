/**
 * Request Context Module
 */

export { RequestContext, createRequestInfo } from './context';
export { ResponseBuilder } from './response';
export type { BodyChunk } from './response';
export { VariableBag, coercePathValue, toPathValue } from './variables';
export type { PathValue, PathValueKind } from './variables';
export { parseContentType } from './content-type';
export { decodeBody } from './body';
export type {
  RequestInfo,
  DispatchInput,
  ResponseWriter,
  ContentType,
  BodyParser,
  BodyDecoder,
} from './types';
