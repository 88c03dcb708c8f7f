/**
 * Path Variables
 *
 * Tagged values extracted from path segments, and the per-request bag
 * holding them behind typed accessors.
 */

import { VariableNotFoundError, VariableTypeError } from '../shared/errors';

export type PathValue =
  | { kind: 'int'; value: number }
  | { kind: 'float'; value: number }
  | { kind: 'bool'; value: boolean }
  | { kind: 'string'; value: string };

export type PathValueKind = PathValue['kind'];

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Coerce a raw segment: integer, then float, then true/false, else string.
 * Integers beyond Number.MAX_SAFE_INTEGER (2^53 - 1) become floats and may
 * lose precision. Negative zero is stored as 0.
 */
export function coercePathValue(raw: string): PathValue {
  if (INTEGER_PATTERN.test(raw)) {
    const value = Number(raw);
    if (Number.isSafeInteger(value)) {
      return { kind: 'int', value: value + 0 };
    }
  }

  if (FLOAT_PATTERN.test(raw)) {
    const value = Number(raw);
    if (Number.isFinite(value)) {
      return { kind: 'float', value: value + 0 };
    }
  }

  if (raw === 'true' || raw === 'false') {
    return { kind: 'bool', value: raw === 'true' };
  }

  return { kind: 'string', value: raw };
}

/**
 * Tag a plain value. Whole numbers become ints.
 */
export function toPathValue(value: number | boolean | string): PathValue {
  switch (typeof value) {
    case 'number':
      return Number.isInteger(value) ? { kind: 'int', value } : { kind: 'float', value };
    case 'boolean':
      return { kind: 'bool', value };
    default:
      return { kind: 'string', value };
  }
}

export class VariableBag {
  private readonly values = new Map<string, PathValue>();

  set(name: string, value: PathValue | number | boolean | string): void {
    this.values.set(name, typeof value === 'object' ? value : toPathValue(value));
  }

  get(name: string): PathValue | undefined {
    return this.values.get(name);
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  get size(): number {
    return this.values.size;
  }

  names(): string[] {
    return [...this.values.keys()];
  }

  /**
   * Whole-number segments within the safe integer range. Larger ones were
   * bound as floats, so read them with float() or number(); the raw digits
   * past 2^53 are not kept.
   */
  int(name: string): number {
    const entry = this.require(name);
    if (entry.kind !== 'int') {
      throw new VariableTypeError(name, 'int', entry.kind);
    }
    return entry.value;
  }

  float(name: string): number {
    const entry = this.require(name);
    if (entry.kind !== 'float') {
      throw new VariableTypeError(name, 'float', entry.kind);
    }
    return entry.value;
  }

  /**
   * Int or float
   */
  number(name: string): number {
    const entry = this.require(name);
    if (entry.kind !== 'int' && entry.kind !== 'float') {
      throw new VariableTypeError(name, 'number', entry.kind);
    }
    return entry.value;
  }

  bool(name: string): boolean {
    const entry = this.require(name);
    if (entry.kind !== 'bool') {
      throw new VariableTypeError(name, 'bool', entry.kind);
    }
    return entry.value;
  }

  string(name: string): string {
    const entry = this.require(name);
    if (entry.kind !== 'string') {
      throw new VariableTypeError(name, 'string', entry.kind);
    }
    return entry.value;
  }

  toJSON(): Record<string, number | boolean | string> {
    const result: Record<string, number | boolean | string> = {};
    for (const [name, entry] of this.values) {
      result[name] = entry.value;
    }
    return result;
  }

  private require(name: string): PathValue {
    const entry = this.values.get(name);
    if (!entry) {
      throw new VariableNotFoundError(name);
    }
    return entry;
  }
}
