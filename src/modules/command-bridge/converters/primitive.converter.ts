import { ConversionError } from '../errors';
import type { PrimitiveKind, TypeDescriptor, ValueConverter } from '../interfaces';
import { INTEGRAL_RANGES, describeValue, isIntegralKind, toText } from '../utils';

const INTEGER_TEXT = /^[+-]?\d+$/;

/**
 * Numeric narrowing and widening, boolean parsing and textual representation
 */
export class PrimitiveValueConverter implements ValueConverter {
  readonly name = 'primitive';
  readonly priority = 100;

  canConvert(value: unknown, target: TypeDescriptor): boolean {
    if (target.kind !== 'primitive') {
      return false;
    }
    if (target.primitive === 'string') {
      return value !== null && value !== undefined;
    }
    return typeof value === 'number' || typeof value === 'string' || typeof value === 'boolean';
  }

  convert(value: unknown, target: TypeDescriptor): unknown {
    if (target.kind !== 'primitive') {
      throw new ConversionError(`Primitive converter cannot produce ${target.kind} values`);
    }

    switch (target.primitive) {
      case 'string':
        return toText(value);
      case 'bool':
        return this.toBool(value);
      default:
        return this.toNumber(value, target.primitive);
    }
  }

  private toBool(value: unknown): boolean {
    if (typeof value === 'boolean') {
      return value;
    }
    if (typeof value === 'number') {
      return value !== 0;
    }
    if (typeof value === 'string') {
      const text = value.trim().toLowerCase();
      if (text === 'true') return true;
      if (text === 'false') return false;
      if (INTEGER_TEXT.test(text)) return Number.parseInt(text, 10) !== 0;
    }
    throw new ConversionError(`Cannot convert ${describeValue(value)} '${toText(value)}' to bool`);
  }

  private toNumber(value: unknown, kind: PrimitiveKind): number {
    let numeric: number;

    if (typeof value === 'number') {
      numeric = value;
    } else if (typeof value === 'boolean') {
      numeric = value ? 1 : 0;
    } else if (typeof value === 'string') {
      const text = value.trim();
      if (isIntegralKind(kind) ? !INTEGER_TEXT.test(text) : text === '' || Number.isNaN(Number(text))) {
        throw new ConversionError(`Cannot parse '${value}' as ${kind}`);
      }
      numeric = Number(text);
    } else {
      throw new ConversionError(`Cannot convert ${describeValue(value)} to ${kind}`);
    }

    if (!isIntegralKind(kind)) {
      return numeric;
    }

    if (!Number.isFinite(numeric)) {
      throw new ConversionError(`${numeric} is not a valid ${kind}`);
    }
    const truncated = Math.trunc(numeric);
    const [min, max] = INTEGRAL_RANGES[kind];
    if (truncated < min || truncated > max) {
      throw new ConversionError(`${truncated} is outside the ${kind} range [${min}, ${max}]`);
    }
    // Math.trunc yields -0 for values in (-1, 0)
    return truncated === 0 ? 0 : truncated;
  }
}
