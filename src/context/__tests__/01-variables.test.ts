/**
 * Request Context Tests - Path Variables
 */

import { VariableBag, coercePathValue, toPathValue } from '../variables';
import { VariableNotFoundError, VariableTypeError } from '../../shared/errors';

describe('Path Variables', () => {
  describe('coercePathValue', () => {
    it('should read integers first', () => {
      expect(coercePathValue('27')).toEqual({ kind: 'int', value: 27 });
      expect(coercePathValue('-4')).toEqual({ kind: 'int', value: -4 });
      expect(coercePathValue('007')).toEqual({ kind: 'int', value: 7 });
    });

    it('should read floats when the value is not an integer', () => {
      expect(coercePathValue('10.3')).toEqual({ kind: 'float', value: 10.3 });
      expect(coercePathValue('.5')).toEqual({ kind: 'float', value: 0.5 });
      expect(coercePathValue('1e3')).toEqual({ kind: 'float', value: 1000 });
    });

    it('should keep integers beyond the safe range as floats', () => {
      expect(coercePathValue('9007199254740991')).toEqual({ kind: 'int', value: 9007199254740991 });
      expect(coercePathValue('9007199254740993')).toEqual({ kind: 'float', value: 9007199254740992 });
    });

    it('should store negative zero as zero', () => {
      expect(coercePathValue('-0')).toEqual({ kind: 'int', value: 0 });
      expect(coercePathValue('-0.0')).toEqual({ kind: 'float', value: 0 });
    });

    it('should read exact true and false as booleans', () => {
      expect(coercePathValue('true')).toEqual({ kind: 'bool', value: true });
      expect(coercePathValue('false')).toEqual({ kind: 'bool', value: false });
      expect(coercePathValue('True')).toEqual({ kind: 'string', value: 'True' });
    });

    it('should fall back to strings', () => {
      expect(coercePathValue('test-test')).toEqual({ kind: 'string', value: 'test-test' });
      expect(coercePathValue('1.2.3')).toEqual({ kind: 'string', value: '1.2.3' });
      expect(coercePathValue('NaN')).toEqual({ kind: 'string', value: 'NaN' });
      expect(coercePathValue('Infinity')).toEqual({ kind: 'string', value: 'Infinity' });
    });
  });

  describe('toPathValue', () => {
    it('should tag plain values', () => {
      expect(toPathValue(3)).toEqual({ kind: 'int', value: 3 });
      expect(toPathValue(3.5)).toEqual({ kind: 'float', value: 3.5 });
      expect(toPathValue(true)).toEqual({ kind: 'bool', value: true });
      expect(toPathValue('x')).toEqual({ kind: 'string', value: 'x' });
    });
  });

  describe('VariableBag', () => {
    let bag: VariableBag;

    beforeEach(() => {
      bag = new VariableBag();
      bag.set('id', coercePathValue('42'));
      bag.set('ratio', coercePathValue('0.25'));
      bag.set('flag', coercePathValue('true'));
      bag.set('slug', coercePathValue('hello'));
    });

    it('should return values through matching accessors', () => {
      expect(bag.int('id')).toBe(42);
      expect(bag.float('ratio')).toBe(0.25);
      expect(bag.bool('flag')).toBe(true);
      expect(bag.string('slug')).toBe('hello');
    });

    it('should accept ints and floats as numbers', () => {
      expect(bag.number('id')).toBe(42);
      expect(bag.number('ratio')).toBe(0.25);
      expect(() => bag.number('slug')).toThrow('Variable "slug" is string, not number');
    });

    it('should raise a type mismatch for the wrong accessor', () => {
      expect(() => bag.string('id')).toThrow(VariableTypeError);

      try {
        bag.int('flag');
        throw new Error('expected int() to throw');
      } catch (error) {
        expect(error).toBeInstanceOf(VariableTypeError);
        if (error instanceof VariableTypeError) {
          expect(error.code).toBe('VARIABLE_TYPE_MISMATCH');
          expect(error.message).toBe('Variable "flag" is bool, not int');
          expect(error.details).toEqual({ variable: 'flag', expected: 'int', actual: 'bool' });
        }
      }
    });

    it('should raise not-found for unbound names', () => {
      expect(() => bag.int('missing')).toThrow(VariableNotFoundError);
      expect(() => bag.string('missing')).toThrow('Variable "missing" is not bound');
      expect(bag.get('missing')).toBeUndefined();
      expect(bag.has('missing')).toBe(false);
    });

    it('should tag plain values passed to set', () => {
      bag.set('user', 'alice');
      bag.set('count', 3);

      expect(bag.get('user')).toEqual({ kind: 'string', value: 'alice' });
      expect(bag.int('count')).toBe(3);
    });

    it('should replace a value bound under the same name', () => {
      bag.set('id', coercePathValue('abc'));

      expect(bag.string('id')).toBe('abc');
      expect(bag.size).toBe(4);
    });

    it('should list names and plain values', () => {
      expect(bag.names()).toEqual(['id', 'ratio', 'flag', 'slug']);
      expect(bag.toJSON()).toEqual({ id: 42, ratio: 0.25, flag: true, slug: 'hello' });
      expect(JSON.stringify(bag)).toBe('{"id":42,"ratio":0.25,"flag":true,"slug":"hello"}');
    });
  });
});
