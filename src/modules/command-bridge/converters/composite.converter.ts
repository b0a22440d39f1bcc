import { ConversionError } from '../errors';
import type { ConversionContext, TypeDescriptor, ValueConverter } from '../interfaces';
import { defaultValueFor, isPlainMapping, isWritableMember, storageKey } from '../utils';

/**
 * Builds a composite from a mapping, member by member. Unknown keys are
 * ignored; absent members keep the factory's value or their type's default.
 */
export class CompositeValueConverter implements ValueConverter {
  readonly name = 'composite';
  readonly priority = 200;

  canConvert(value: unknown, target: TypeDescriptor): boolean {
    return target.kind === 'composite' && isPlainMapping(value);
  }

  convert(value: unknown, target: TypeDescriptor, context: ConversionContext): unknown {
    if (target.kind !== 'composite') {
      throw new ConversionError(`Composite converter cannot produce ${target.kind} values`);
    }
    if (!isPlainMapping(value)) {
      throw new ConversionError(`${target.name} can only be built from a mapping`);
    }

    const instance = target.create ? target.create() : {};

    for (const member of target.members) {
      if (!isWritableMember(member)) {
        continue;
      }
      const key = storageKey(member);
      const raw = value[member.name];

      if (raw !== undefined) {
        Reflect.set(instance, key, context.convert(raw, member.type));
      } else if (Reflect.get(instance, key) === undefined) {
        Reflect.set(instance, key, defaultValueFor(member.type));
      }
    }

    return instance;
  }
}
