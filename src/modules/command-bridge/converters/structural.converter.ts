import { ConversionError } from '../errors';
import type { ConversionContext, TypeDescriptor, ValueConverter } from '../interfaces';
import { describeValue, isPlainMapping, toStructural } from '../utils';
import { CompositeValueConverter } from './composite.converter';

/**
 * Last resort: encode the value to plain structural form, then decode it
 * into the target
 */
export class StructuralValueConverter implements ValueConverter {
  readonly name = 'structural';
  readonly priority = 0;

  constructor(private readonly composite = new CompositeValueConverter()) {}

  canConvert(_value: unknown, target: TypeDescriptor): boolean {
    return target.kind === 'composite' || target.kind === 'opaque';
  }

  convert(value: unknown, target: TypeDescriptor, context: ConversionContext): unknown {
    const structural = toStructural(value);

    if (target.kind === 'opaque') {
      if (target.decode) {
        return target.decode(structural);
      }
      throw new ConversionError(`${target.name} rejects ${describeValue(value)} and has no decoder`);
    }

    if (target.kind === 'composite' && isPlainMapping(structural)) {
      return this.composite.convert(structural, target, context);
    }

    throw new ConversionError(`Cannot decode ${describeValue(value)} into ${target.kind === 'composite' ? target.name : target.kind}`);
  }
}
