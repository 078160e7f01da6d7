import { describe, expect, it } from 'vitest';
import * as fc from 'fast-check';
import { copyConfigMap, deepCopy, deepFreeze, formatPath, formatValue, getKey, hasKey, isConfigMap, isNil } from './values.js';

describe('value helpers', () => {
  describe('isNil', () => {
    it('should accept only null and undefined', () => {
      expect(isNil(null)).toBe(true);
      expect(isNil(undefined)).toBe(true);
      expect(isNil(0)).toBe(false);
      expect(isNil('')).toBe(false);
      expect(isNil(false)).toBe(false);
    });
  });

  describe('isConfigMap', () => {
    it('should accept plain objects', () => {
      expect(isConfigMap({})).toBe(true);
      expect(isConfigMap({ a: 1 })).toBe(true);
      expect(isConfigMap(Object.create(null))).toBe(true);
    });

    it('should reject arrays, collections, class instances and scalars', () => {
      class Box {
        readonly value = 1;
      }
      expect(isConfigMap([])).toBe(false);
      expect(isConfigMap(new Map())).toBe(false);
      expect(isConfigMap(new Set())).toBe(false);
      expect(isConfigMap(new Box())).toBe(false);
      expect(isConfigMap(null)).toBe(false);
      expect(isConfigMap('map')).toBe(false);
    });
  });

  describe('hasKey / getKey', () => {
    it('should only see own properties', () => {
      expect(hasKey({}, 'toString')).toBe(false);
      expect(getKey({}, 'toString')).toBeUndefined();
      expect(hasKey({ a: undefined }, 'a')).toBe(true);
      expect(getKey({ a: 2 }, 'a')).toBe(2);
    });
  });

  describe('deepFreeze', () => {
    it('should freeze nested objects and arrays', () => {
      const value = { a: { b: [1, { c: 2 }] } };
      deepFreeze(value);
      expect(Object.isFrozen(value)).toBe(true);
      expect(Object.isFrozen(value.a)).toBe(true);
      expect(Object.isFrozen(value.a.b)).toBe(true);
      expect(Object.isFrozen(value.a.b[1])).toBe(true);
    });

    it('should leave Maps and Sets alone', () => {
      const map = new Map([['a', 1]]);
      deepFreeze({ map });
      expect(Object.isFrozen(map)).toBe(false);
    });
  });

  describe('deepCopy', () => {
    it('should rebuild nested objects and arrays', () => {
      const inner = { c: 2 };
      const list = [1, inner];
      const copy = copyConfigMap({ a: { b: list } });

      expect(copy).toEqual({ a: { b: [1, { c: 2 }] } });
      const copiedList = deepCopy({ b: list });
      expect(copiedList).toEqual({ b: [1, { c: 2 }] });
      expect(copiedList).not.toBe(list);
      deepFreeze(copy);
      expect(Object.isFrozen(list)).toBe(false);
      expect(Object.isFrozen(inner)).toBe(false);
    });

    it('should return scalars and Maps as they are', () => {
      const map = new Map([['a', 1]]);
      expect(deepCopy(map)).toBe(map);
      expect(deepCopy('x')).toBe('x');
      expect(deepCopy(null)).toBeNull();
    });
  });

  describe('formatPath', () => {
    it('should render keys and indices', () => {
      expect(formatPath([])).toBe('<root>');
      expect(formatPath(['a'])).toBe('a');
      expect(formatPath(['a', 'b'])).toBe('a.b');
      expect(formatPath(['a', 2, 'c'])).toBe('a[2].c');
      expect(formatPath([0, 1])).toBe('[0][1]');
    });

    it('should join plain keys with dots', () => {
      fc.assert(
        fc.property(fc.array(fc.string({ minLength: 1 }), { minLength: 1 }), (keys) => {
          expect(formatPath(keys)).toBe(keys.join('.'));
        })
      );
    });
  });

  describe('formatValue', () => {
    it('should quote strings and render other values', () => {
      expect(formatValue('x')).toBe("'x'");
      expect(formatValue(3)).toBe('3');
      expect(formatValue(undefined)).toBe('undefined');
    });
  });
});
