/**
 * Request ID Generator
 *
 * Sortable, URL-safe request IDs: req_<epoch-ms>_<random>.
 */

import { customAlphabet } from 'nanoid';

const REQUEST_ID_PREFIX = 'req_';
const RANDOM_LENGTH = 8;
const ALPHABET = '0123456789abcdefghijklmnopqrstuvwxyz';

const nanoid = customAlphabet(ALPHABET, RANDOM_LENGTH);

const REQUEST_ID_PATTERN = new RegExp(`^${REQUEST_ID_PREFIX}(\\d+)_([${ALPHABET}]{${RANDOM_LENGTH}})$`);

export function generateRequestId(): string {
  return `${REQUEST_ID_PREFIX}${Date.now()}_${nanoid()}`;
}

export function isValidRequestId(id: string): boolean {
  return REQUEST_ID_PATTERN.test(id);
}

export function parseRequestId(id: string): { timestamp: number; random: string } | null {
  const match = REQUEST_ID_PATTERN.exec(id);
  if (!match) {
    return null;
  }

  return {
    timestamp: parseInt(match[1], 10),
    random: match[2],
  };
}
