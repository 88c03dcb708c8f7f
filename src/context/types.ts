/**
 * Request Context Types
 */

// ============================================================================
// Request
// ============================================================================

export interface RequestInfo {
  /** Upper-cased HTTP method */
  method: string;

  /** Path without query string */
  path: string;

  /** Raw request target */
  url: string;

  /** Lower-cased header names */
  headers: Record<string, string>;

  /** Query string parameters */
  query: Record<string, string>;

  /** Client IP */
  ip: string;

  /** Read the whole body (once per request; later calls return the same bytes) */
  readBody(): Promise<Buffer>;
}

export interface DispatchInput {
  method: string;
  path: string;
  url?: string;
  headers?: Record<string, string>;
  query?: Record<string, string>;
  ip?: string;
  body?: Buffer | string | (() => Promise<Buffer>);
}

// ============================================================================
// Response
// ============================================================================

/**
 * Where a finished response goes. Called at most once per request.
 */
export interface ResponseWriter {
  write(status: number, headers: Record<string, string>, body: Buffer): void;
}

// ============================================================================
// Body
// ============================================================================

export interface ContentType {
  mimeType: string;
  charset?: string;
  boundary?: string;
}

/** Turns a decoded body into T; a zod schema satisfies this */
export interface BodyParser<T> {
  parse(value: unknown): T;
}

/** Decoder used when no built-in decoder handles the Content-Type */
export interface BodyDecoder {
  decode(body: Buffer, contentType: ContentType): unknown;
}
