import 'reflect-metadata';
import { ConversionError, PrimitiveValueConverter, Types } from '@src/index';

describe('PrimitiveValueConverter', () => {
  const converter = new PrimitiveValueConverter();

  it('should only handle primitive targets', () => {
    expect(converter.canConvert('1', Types.int)).toBe(true);
    expect(converter.canConvert({}, Types.int)).toBe(false);
    expect(converter.canConvert({}, Types.string)).toBe(true);
    expect(converter.canConvert('1', Types.list(Types.int))).toBe(false);
  });

  describe('integral targets', () => {
    it('should truncate toward zero', () => {
      expect(converter.convert(3.9, Types.int)).toBe(3);
      expect(converter.convert(-3.9, Types.int)).toBe(-3);
      expect(converter.convert(-0.5, Types.int)).toBe(0);
    });

    it('should parse integral strings', () => {
      expect(converter.convert(' 42 ', Types.int)).toBe(42);
      expect(converter.convert('-7', Types.short)).toBe(-7);
    });

    it('should reject non-integral strings', () => {
      expect(() => converter.convert('4.5', Types.int)).toThrow("Cannot parse '4.5' as int");
      expect(() => converter.convert('abc', Types.int)).toThrow(ConversionError);
    });

    it('should range-check the result', () => {
      expect(converter.convert(255, Types.byte)).toBe(255);
      expect(() => converter.convert(256, Types.byte)).toThrow('256 is outside the byte range [0, 255]');
      expect(() => converter.convert(40000, Types.short)).toThrow(ConversionError);
    });

    it('should widen booleans to 1 and 0', () => {
      expect(converter.convert(true, Types.long)).toBe(1);
      expect(converter.convert(false, Types.int)).toBe(0);
    });

    it('should reject non-finite numbers', () => {
      expect(() => converter.convert(Number.NaN, Types.int)).toThrow('NaN is not a valid int');
    });
  });

  describe('floating targets', () => {
    it('should parse numeric strings', () => {
      expect(converter.convert('2.5', Types.float)).toBe(2.5);
      expect(converter.convert('1e3', Types.double)).toBe(1000);
    });

    it('should reject empty and non-numeric strings', () => {
      expect(() => converter.convert('', Types.float)).toThrow(ConversionError);
      expect(() => converter.convert('fast', Types.double)).toThrow("Cannot parse 'fast' as double");
    });
  });

  describe('bool targets', () => {
    it('should parse true and false case-insensitively', () => {
      expect(converter.convert('TRUE', Types.bool)).toBe(true);
      expect(converter.convert(' false ', Types.bool)).toBe(false);
    });

    it('should treat non-zero numbers as true', () => {
      expect(converter.convert(2, Types.bool)).toBe(true);
      expect(converter.convert(0, Types.bool)).toBe(false);
      expect(converter.convert('0', Types.bool)).toBe(false);
    });

    it('should reject other text', () => {
      expect(() => converter.convert('maybe', Types.bool)).toThrow("Cannot convert string 'maybe' to bool");
    });
  });

  describe('string targets', () => {
    it('should produce textual representations', () => {
      expect(converter.convert(12, Types.string)).toBe('12');
      expect(converter.convert(false, Types.string)).toBe('false');
      expect(converter.convert(['a', 1], Types.string)).toBe('["a",1]');
    });
  });
});
