import { Logger } from '@nestjs/common';
import { ConversionError } from '../errors';
import type { ConversionContext, ResourceResolver, TypeDescriptor, ValueConverter } from '../interfaces';
import { describeValue, extractReference, isPlainMapping } from '../utils';

/**
 * Resolves reference descriptors and bare locator paths into live objects or
 * assets. Paths are tried before ids, each against the preferred resolver
 * first. An unresolved reference converts to null.
 */
export class ReferenceValueConverter implements ValueConverter {
  readonly name = 'reference';
  readonly priority = 300;

  private readonly logger = new Logger(ReferenceValueConverter.name);

  canConvert(value: unknown, target: TypeDescriptor): boolean {
    return target.kind === 'reference' && (typeof value === 'string' || isPlainMapping(value));
  }

  convert(value: unknown, target: TypeDescriptor, context: ConversionContext): unknown {
    if (target.kind !== 'reference') {
      throw new ConversionError(`Reference converter cannot produce ${target.kind} values`);
    }

    const reference = extractReference(value);
    if (!reference) {
      throw new ConversionError(`Cannot read a reference from ${describeValue(value)}`);
    }

    const resolvers: Array<ResourceResolver<object> | undefined> =
      target.source === 'asset' ? [context.assets, context.liveObjects] : [context.liveObjects, context.assets];
    const identifiers = [reference.path, reference.id].filter((identifier): identifier is string => identifier !== undefined);

    for (const identifier of identifiers) {
      for (const resolver of resolvers) {
        const resolved = resolver?.tryResolve(identifier);
        if (resolved && (!target.accepts || target.accepts(resolved))) {
          return resolved;
        }
      }
    }

    this.logger.warn(`Unresolved ${target.referenceKind} reference: ${identifiers.join(' / ')}`);
    return null;
  }
}
