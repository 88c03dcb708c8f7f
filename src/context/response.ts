/**
 * Response Builder
 *
 * Accumulates status, headers and body for one request and hands them to
 * the ResponseWriter exactly once.
 */

import { ResponseAlreadySentError } from '../shared/errors';
import type { ResponseWriter } from './types';

export type BodyChunk = Buffer | Uint8Array | string;

export class ResponseBuilder {
  private _statusCode = 200;
  private _headers: Record<string, string> = {};
  private _chunks: Buffer[] = [];
  private _sent = false;
  private _touched = false;

  constructor(private readonly writer: ResponseWriter) {}

  get sent(): boolean {
    return this._sent;
  }

  /** Whether anything has been set since creation */
  get touched(): boolean {
    return this._touched;
  }

  get statusCode(): number {
    return this._statusCode;
  }

  get headers(): Readonly<Record<string, string>> {
    return this._headers;
  }

  get body(): Buffer {
    return Buffer.concat(this._chunks);
  }

  getHeader(name: string): string | undefined {
    return this._headers[name.toLowerCase()];
  }

  /**
   * Set status code
   */
  status(code: number): this {
    this.assertWritable();
    this._statusCode = code;
    return this;
  }

  /**
   * Set header (names are stored lower-cased)
   */
  header(name: string, value: string | number): this {
    this.assertWritable();
    this._headers[name.toLowerCase()] = String(value);
    return this;
  }

  /**
   * Append bytes to the body, optionally setting Content-Type
   */
  append(chunk: BodyChunk, contentType?: string): this {
    this.assertWritable();
    this._chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : Buffer.from(chunk));
    if (contentType) {
      this._headers['content-type'] = contentType;
    }
    return this;
  }

  text(content: string): this {
    return this.append(content, 'text/plain');
  }

  html(content: string): this {
    return this.append(content, 'text/html');
  }

  /**
   * Append without touching Content-Type
   */
  raw(content: BodyChunk): this {
    return this.append(content);
  }

  /**
   * Append JSON. A value that cannot be serialised becomes a 500.
   */
  json(data: unknown): this {
    let serialized: string | undefined;
    try {
      serialized = JSON.stringify(data);
    } catch {
      serialized = undefined;
    }

    if (serialized === undefined) {
      this._chunks = [];
      return this.error('Internal Server Error', 500);
    }

    return this.append(serialized, 'application/json');
  }

  /**
   * Status plus plain-text message
   */
  error(message: string, code: number): this {
    return this.status(code).text(message);
  }

  /**
   * Hand the response to the writer. Throws if already sent.
   */
  send(): void {
    if (this._sent) {
      throw new ResponseAlreadySentError();
    }

    this._sent = true;
    this.writer.write(this._statusCode, { ...this._headers }, this.body);
  }

  private assertWritable(): void {
    if (this._sent) {
      throw new ResponseAlreadySentError();
    }
    this._touched = true;
  }
}
