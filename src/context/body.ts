/**
 * Body Decoding
 *
 * Built-in decoders by Content-Type, with an optional fallback.
 */

import { BodyDecodeError } from '../shared/errors';
import type { BodyDecoder, ContentType } from './types';

export function decodeBody(body: Buffer, contentType: ContentType, fallback?: BodyDecoder): unknown {
  const { mimeType } = contentType;

  if (mimeType === 'application/json' || mimeType.endsWith('+json')) {
    const text = body.toString('utf8');
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new BodyDecodeError('Invalid JSON body', {
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  }

  if (mimeType === 'application/x-www-form-urlencoded') {
    return Object.fromEntries(new URLSearchParams(body.toString('utf8')));
  }

  if (mimeType.startsWith('text/')) {
    return body.toString('utf8');
  }

  if (fallback) {
    return fallback.decode(body, contentType);
  }

  throw new BodyDecodeError('Cannot determine decoder from Content-Type and no fallback set', {
    contentType: mimeType,
  });
}
