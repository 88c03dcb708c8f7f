/**
 * Request Context
 *
 * Created once per dispatch and owned by it: request metadata, path
 * variables, the abort latch and the single response builder.
 */

import { generateRequestId } from '../ids';
import { decodeBody } from './body';
import { parseContentType } from './content-type';
import { ResponseBuilder } from './response';
import { VariableBag } from './variables';
import type { BodyDecoder, BodyParser, DispatchInput, RequestInfo, ResponseWriter } from './types';

export class RequestContext {
  readonly id: string;
  readonly request: RequestInfo;
  readonly variables = new VariableBag();
  readonly response: ResponseBuilder;

  /** Used by readBody when no built-in decoder fits the Content-Type */
  fallbackDecoder?: BodyDecoder;

  private _aborted = false;

  constructor(request: RequestInfo, writer: ResponseWriter, id: string = generateRequestId()) {
    this.id = id;
    this.request = request;
    this.response = new ResponseBuilder(writer);
  }

  get method(): string {
    return this.request.method;
  }

  get path(): string {
    return this.request.path;
  }

  get aborted(): boolean {
    return this._aborted;
  }

  /**
   * Stop the interceptor chain; the handler will not run.
   * Populate the response before calling.
   */
  abort(): void {
    this._aborted = true;
  }

  getHeader(name: string): string | undefined {
    return this.request.headers[name.toLowerCase()];
  }

  async readText(): Promise<string> {
    const body = await this.request.readBody();
    return body.toString('utf8');
  }

  /**
   * Decode the body by Content-Type and hand it to `parser`
   */
  async readBody<T>(parser: BodyParser<T>): Promise<T> {
    const body = await this.request.readBody();
    const decoded = decodeBody(body, parseContentType(this.getHeader('content-type')), this.fallbackDecoder);
    return parser.parse(decoded);
  }
}

/**
 * Normalise dispatch input into request metadata
 */
export function createRequestInfo(input: DispatchInput): RequestInfo {
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(input.headers ?? {})) {
    headers[name.toLowerCase()] = value;
  }

  const source = input.body;
  let cached: Promise<Buffer> | null = null;
  const readBody = (): Promise<Buffer> => {
    if (!cached) {
      if (typeof source === 'function') {
        cached = source();
      } else if (typeof source === 'string') {
        cached = Promise.resolve(Buffer.from(source, 'utf8'));
      } else {
        cached = Promise.resolve(source ?? Buffer.alloc(0));
      }
    }
    return cached;
  };

  return {
    method: input.method.toUpperCase(),
    path: input.path,
    url: input.url ?? input.path,
    headers,
    query: { ...input.query },
    ip: input.ip ?? 'unknown',
    readBody,
  };
}
