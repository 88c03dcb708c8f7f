/**
 * CLI Option Parsers
 *
 * Parsers handed to commander. They throw InvalidArgumentError so commander
 * reports a usage error instead of a stack trace.
 */

import { InvalidArgumentError } from 'commander';

export function parsePort(value: string): number {
  const port = Number(value);
  if (value.trim() === '' || !Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError(`Invalid port: ${value}`);
  }
  return port;
}
