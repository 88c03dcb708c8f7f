/**
 * .env Loader
 *
 * Reads NAME=value lines into the environment without overwriting
 * variables that are already set.
 */

import * as fs from 'fs/promises';
import type { Environment } from './config';

export const DEFAULT_ENV_FILE = '.env';

const LINE_PATTERN = /^(?<name>[a-zA-Z][a-zA-Z0-9_]+)=(?<value>\S+)$/;

/**
 * Parse .env content into name/value pairs, in file order
 */
export function parseEnvFile(content: string): Array<[string, string]> {
  const pairs: Array<[string, string]> = [];

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.length === 0 || line.startsWith('#')) {
      continue;
    }

    const groups = LINE_PATTERN.exec(line)?.groups;
    if (!groups) {
      continue;
    }

    pairs.push([groups.name, groups.value]);
  }

  return pairs;
}

/**
 * Load variables from `file` into `env`. Returns the names that were set.
 */
export async function loadEnvironment(
  file: string = DEFAULT_ENV_FILE,
  env: Environment = process.env
): Promise<string[]> {
  const content = await fs.readFile(file, 'utf8');
  const applied: string[] = [];

  for (const [name, value] of parseEnvFile(content)) {
    if (env[name] !== undefined) {
      continue;
    }
    env[name] = value;
    applied.push(name);
  }

  return applied;
}
