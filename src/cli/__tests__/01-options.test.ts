/**
 * CLI Tests - Option Parsers
 */

import { Command, InvalidArgumentError } from 'commander';
import { parsePort } from '../options';

describe('parsePort()', () => {
  it('should accept ports in range', () => {
    expect(parsePort('0')).toBe(0);
    expect(parsePort('8080')).toBe(8080);
    expect(parsePort('65535')).toBe(65535);
  });

  it('should reject invalid ports with a commander argument error', () => {
    expect(() => parsePort('abc')).toThrow(InvalidArgumentError);
    expect(() => parsePort('65536')).toThrow('Invalid port: 65536');
    expect(() => parsePort('80.5')).toThrow(InvalidArgumentError);
    expect(() => parsePort('')).toThrow(InvalidArgumentError);
  });

  it('should surface as a usage error when commander parses the option', () => {
    const errors: string[] = [];
    const program = new Command()
      .exitOverride()
      .configureOutput({ writeErr: (message) => errors.push(message) })
      .option('-p, --port <port>', 'port', parsePort);

    expect(() => program.parse(['node', 'switchyard', '--port', 'abc'])).toThrow(
      "error: option '-p, --port <port>' argument 'abc' is invalid. Invalid port: abc"
    );
    expect(errors).toEqual(["error: option '-p, --port <port>' argument 'abc' is invalid. Invalid port: abc\n"]);
  });
});
