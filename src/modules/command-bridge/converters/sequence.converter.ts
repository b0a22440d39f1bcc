import { ConversionError } from '../errors';
import type { ConversionContext, TypeDescriptor, ValueConverter } from '../interfaces';

/**
 * Builds a fresh container of the demanded kind, converting every element.
 * A single value becomes a one-element sequence.
 */
export class SequenceValueConverter implements ValueConverter {
  readonly name = 'sequence';
  readonly priority = 250;

  canConvert(value: unknown, target: TypeDescriptor): boolean {
    return target.kind === 'sequence' && value !== null && value !== undefined;
  }

  convert(value: unknown, target: TypeDescriptor, context: ConversionContext): unknown {
    if (target.kind !== 'sequence') {
      throw new ConversionError(`Sequence converter cannot produce ${target.kind} values`);
    }

    const { element } = target;
    const items: unknown[] = !element ? [] : Array.isArray(value) ? value : value instanceof Set ? Array.from(value) : [value];
    const converted = element ? items.map((item) => context.convert(item, element)) : [];

    return target.container === 'set' ? new Set(converted) : converted;
  }
}
