import { ConversionError } from '../errors';
import type { EnumTypeDescriptor, TypeDescriptor, ValueConverter } from '../interfaces';

const INTEGER_TEXT = /^[+-]?\d+$/;

/**
 * Weak enumerations: symbolic names (case-insensitive), numeric strings,
 * comma-joined names for flag types, and raw integers stored without
 * membership checks
 */
export class EnumValueConverter implements ValueConverter {
  readonly name = 'enum';
  readonly priority = 150;

  canConvert(value: unknown, target: TypeDescriptor): boolean {
    return target.kind === 'enum' && (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean');
  }

  convert(value: unknown, target: TypeDescriptor): unknown {
    if (target.kind !== 'enum') {
      throw new ConversionError(`Enum converter cannot produce ${target.kind} values`);
    }

    if (typeof value === 'number') {
      if (!Number.isFinite(value)) {
        throw new ConversionError(`${value} is not a valid ${target.name} value`);
      }
      return Math.trunc(value);
    }

    if (typeof value !== 'string') {
      throw new ConversionError(`Cannot convert ${typeof value} to ${target.name}`);
    }

    const text = value.trim();
    if (INTEGER_TEXT.test(text)) {
      return Number.parseInt(text, 10);
    }

    if (target.flags && text.includes(',')) {
      return text.split(',').reduce((combined, name) => combined | this.lookup(target, name.trim()), 0);
    }
    return this.lookup(target, text);
  }

  private lookup(target: EnumTypeDescriptor, name: string): number {
    const wanted = name.toLowerCase();
    const match = Object.entries(target.members).find(([member]) => member.toLowerCase() === wanted);
    if (!match) {
      throw new ConversionError(`'${name}' is not a member of ${target.name}. Valid members: ${Object.keys(target.members).join(', ')}`);
    }
    return match[1];
  }
}
