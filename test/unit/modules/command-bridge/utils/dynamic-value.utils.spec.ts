import 'reflect-metadata';
import { ConversionError } from '@src/index';
import { describeValue, extractReference, isPlainMapping, toStructural, toText } from '@modules/command-bridge/utils';

describe('dynamic value utils', () => {
  describe('isPlainMapping', () => {
    it('should accept object literals and null-prototype objects', () => {
      expect(isPlainMapping({ a: 1 })).toBe(true);
      expect(isPlainMapping(Object.create(null))).toBe(true);
    });

    it('should reject arrays, class instances and primitives', () => {
      class Thing {}
      expect(isPlainMapping([])).toBe(false);
      expect(isPlainMapping(new Thing())).toBe(false);
      expect(isPlainMapping(new Date())).toBe(false);
      expect(isPlainMapping('text')).toBe(false);
      expect(isPlainMapping(null)).toBe(false);
    });
  });

  describe('describeValue', () => {
    it('should label values by runtime shape', () => {
      class Widget {}
      expect(describeValue(null)).toBe('null');
      expect(describeValue(undefined)).toBe('null');
      expect(describeValue([1])).toBe('sequence');
      expect(describeValue({ a: 1 })).toBe('mapping');
      expect(describeValue(new Widget())).toBe('Widget');
      expect(describeValue(3)).toBe('number');
    });
  });

  describe('toStructural', () => {
    it('should encode dates, sets and maps', () => {
      const value = {
        when: new Date('2024-01-02T03:04:05.000Z'),
        tags: new Set(['a', 'b']),
        lookup: new Map<string, number>([['one', 1]]),
      };

      expect(toStructural(value)).toEqual({
        when: '2024-01-02T03:04:05.000Z',
        tags: ['a', 'b'],
        lookup: { one: 1 },
      });
    });

    it('should drop functions and undefined members', () => {
      expect(toStructural({ a: 1, b: undefined, c: () => 2 })).toEqual({ a: 1 });
    });

    it('should encode class instances by their own properties', () => {
      class Point {
        x = 1;
        y = 2;
      }
      expect(toStructural(new Point())).toEqual({ x: 1, y: 2 });
    });

    it('should turn non-finite numbers into null', () => {
      expect(toStructural([Number.NaN, Number.POSITIVE_INFINITY, 4])).toEqual([null, null, 4]);
    });

    it('should throw ConversionError on reference cycles', () => {
      const node: { name: string; self?: unknown } = { name: 'loop' };
      node.self = node;
      expect(() => toStructural(node)).toThrow(ConversionError);
    });

    it('should allow the same object twice when it is not a cycle', () => {
      const shared = { v: 1 };
      expect(toStructural({ a: shared, b: shared })).toEqual({ a: { v: 1 }, b: { v: 1 } });
    });

    it('should let a replacer substitute objects', () => {
      const special = { secret: true };
      const encoded = toStructural({ item: special }, (candidate) => (candidate === special ? 'replaced' : undefined));
      expect(encoded).toEqual({ item: 'replaced' });
    });
  });

  describe('toText', () => {
    it('should render scalars and structures', () => {
      expect(toText('abc')).toBe('abc');
      expect(toText(12.5)).toBe('12.5');
      expect(toText(true)).toBe('true');
      expect(toText([1, 'a'])).toBe('[1,"a"]');
      expect(toText({ a: 1 })).toBe('{"a":1}');
    });
  });

  describe('extractReference', () => {
    it('should read a bare string as a path', () => {
      expect(extractReference(' Root/Child ')).toEqual({ path: 'Root/Child' });
    });

    it('should read the typed reference shape', () => {
      expect(extractReference({ $type: 'reference', $path: 'Root/A' })).toEqual({ path: 'Root/A', id: undefined });
    });

    it('should read $ref together with $id', () => {
      expect(extractReference({ $ref: 'Root/A', $id: 'id-1' })).toEqual({ path: 'Root/A', id: 'id-1' });
    });

    it('should read an id-only descriptor', () => {
      expect(extractReference({ $id: 'id-2' })).toEqual({ id: 'id-2' });
    });

    it('should fall back to common path keys', () => {
      expect(extractReference({ objectPath: 'Root/B' })).toEqual({ path: 'Root/B' });
      expect(extractReference({ target: 'Root/C' })).toEqual({ path: 'Root/C' });
    });

    it('should accept a mapping whose only value is a string', () => {
      expect(extractReference({ anything: 'Root/D' })).toEqual({ path: 'Root/D' });
    });

    it('should return undefined for non-reference shapes', () => {
      expect(extractReference({ x: 1, y: 2 })).toBeUndefined();
      expect(extractReference('   ')).toBeUndefined();
      expect(extractReference(42)).toBeUndefined();
    });
  });
});
