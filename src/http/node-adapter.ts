/**
 * Node HTTP Adapter
 *
 * Bridges http.IncomingMessage / http.ServerResponse to Router.dispatch.
 */

import type { IncomingHttpHeaders } from 'http';
import type { DispatchInput, ResponseWriter } from '../context';
import type { Logger } from '../logging';
import type { Router } from '../router';
import { BodyTooLargeError, ResponseAlreadySentError, SwitchyardError } from '../shared/errors';

export const INTERNAL_ERROR_BODY = '500 - Internal Server Error';

/** The parts of http.IncomingMessage the adapter reads */
export interface RawRequest {
  method?: string;
  url?: string;
  headers: IncomingHttpHeaders;
  socket: { remoteAddress?: string };
  on(event: 'data', listener: (chunk: Buffer | string) => void): this;
  on(event: 'end', listener: () => void): this;
  on(event: 'error', listener: (error: Error) => void): this;
}

/** The parts of http.ServerResponse the adapter writes */
export interface RawResponse {
  readonly headersSent: boolean;
  readonly writableEnded: boolean;
  writeHead(statusCode: number, headers: Record<string, string>): unknown;
  end(chunk: Buffer): unknown;
}

export type RequestListener = (req: RawRequest, res: RawResponse) => Promise<void>;

export interface RequestListenerOptions {
  maxBodySize?: number;
  logger?: Logger;
}

/**
 * Parse query string
 */
export function parseQueryString(queryString: string): Record<string, string> {
  const params: Record<string, string> = {};

  if (!queryString) {
    return params;
  }

  for (const pair of queryString.split('&')) {
    const [key, value] = pair.split('=');
    if (key) {
      params[safeDecode(key.replace(/\+/g, ' '))] = value ? safeDecode(value.replace(/\+/g, ' ')) : '';
    }
  }

  return params;
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/**
 * Buffer the request body, rejecting once it grows past maxSize. The rest of
 * an oversized body is read and discarded so the socket survives to carry
 * the 413.
 */
export function readRequestBody(req: RawRequest, maxSize: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let settled = false;

    req.on('data', (chunk) => {
      if (settled) {
        return;
      }

      const buffer = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
      size += buffer.length;

      if (size > maxSize) {
        settled = true;
        chunks.length = 0;
        reject(new BodyTooLargeError(maxSize));
        return;
      }

      chunks.push(buffer);
    });

    req.on('end', () => {
      if (!settled) {
        settled = true;
        resolve(Buffer.concat(chunks));
      }
    });

    req.on('error', (error) => {
      if (!settled) {
        settled = true;
        reject(error);
      }
    });
  });
}

/**
 * Extract client IP
 */
export function getClientIp(req: RawRequest): string {
  const forwarded = req.headers['x-forwarded-for'];
  if (forwarded) {
    const ips = Array.isArray(forwarded) ? forwarded[0] : forwarded;
    return ips.split(',')[0].trim();
  }

  const realIp = req.headers['x-real-ip'];
  if (realIp) {
    return Array.isArray(realIp) ? realIp[0] : realIp;
  }

  return req.socket.remoteAddress || 'unknown';
}

export function toDispatchInput(req: RawRequest, maxBodySize: number): DispatchInput {
  // The raw target is the path: a leading '//' is not an authority here
  const target = req.url || '/';
  const queryStart = target.indexOf('?');
  const rawPath = queryStart === -1 ? target : target.slice(0, queryStart);
  const queryString = queryStart === -1 ? '' : target.slice(queryStart + 1);

  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(req.headers)) {
    if (typeof value === 'string') {
      headers[key.toLowerCase()] = value;
    } else if (Array.isArray(value)) {
      headers[key.toLowerCase()] = value.join(', ');
    }
  }

  return {
    method: req.method?.toUpperCase() || 'GET',
    path: safeDecode(rawPath),
    url: target,
    headers,
    query: parseQueryString(queryString),
    ip: getClientIp(req),
    body: () => readRequestBody(req, maxBodySize),
  };
}

/**
 * ResponseWriter over a ServerResponse
 */
export class NodeResponseWriter implements ResponseWriter {
  private _sent = false;

  constructor(private readonly res: RawResponse) {}

  get sent(): boolean {
    return this._sent || this.res.headersSent;
  }

  write(status: number, headers: Record<string, string>, body: Buffer): void {
    if (this.sent) {
      throw new ResponseAlreadySentError();
    }

    this._sent = true;
    this.res.writeHead(status, { ...headers, 'content-length': String(body.length) });
    this.res.end(body);
  }
}

/**
 * Listener for http.createServer. Errors thrown by handlers or interceptors
 * become a plain-text error response when nothing was sent yet.
 */
export function createRequestListener(router: Router, options: RequestListenerOptions = {}): RequestListener {
  const maxBodySize = options.maxBodySize ?? router.config.limits.maxBodySize;
  const logger = options.logger ?? router.logger.child('http');

  return async (req, res) => {
    const writer = new NodeResponseWriter(res);

    try {
      await router.dispatch(toDispatchInput(req, maxBodySize), writer);
    } catch (error) {
      if (router.config.logging.errors) {
        logger.error('Request failed', {
          method: req.method,
          url: req.url,
          error: error instanceof Error ? error.message : String(error),
        });
      }

      if (writer.sent) {
        if (!res.writableEnded) {
          res.end(Buffer.alloc(0));
        }
        return;
      }

      // Client errors raised while handling (bad body, oversized body) keep their status
      if (error instanceof SwitchyardError && error.statusCode >= 400 && error.statusCode < 500) {
        const headers: Record<string, string> = { 'content-type': 'text/plain' };
        // The unread remainder of the body is still on the wire
        if (error instanceof BodyTooLargeError) {
          headers['connection'] = 'close';
        }
        writer.write(error.statusCode, headers, Buffer.from(error.message, 'utf8'));
        return;
      }

      writer.write(500, { 'content-type': 'text/plain' }, Buffer.from(INTERNAL_ERROR_BODY, 'utf8'));
    }
  };
}
