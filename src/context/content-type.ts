/**
 * Content-Type Parsing
 */

import type { ContentType } from './types';

/**
 * Parse `type/subtype; charset=...; boundary=...`
 */
export function parseContentType(header: string | undefined): ContentType {
  const [mime = '', ...directives] = (header ?? '').split(';');
  const result: ContentType = { mimeType: mime.trim().toLowerCase() };

  for (const directive of directives) {
    const eq = directive.indexOf('=');
    if (eq === -1) {
      continue;
    }

    const key = directive.slice(0, eq).trim().toLowerCase();
    const value = unquote(directive.slice(eq + 1).trim());

    if (key === 'charset') {
      result.charset = value.toLowerCase();
    } else if (key === 'boundary') {
      result.boundary = value;
    }
  }

  return result;
}

function unquote(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1);
  }
  return value;
}
