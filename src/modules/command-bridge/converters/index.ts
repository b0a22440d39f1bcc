import type { ValueConverter } from '../interfaces';
import { CompositeValueConverter } from './composite.converter';
import { EnumValueConverter } from './enum.converter';
import { PrimitiveValueConverter } from './primitive.converter';
import { ReferenceValueConverter } from './reference.converter';
import { SequenceValueConverter } from './sequence.converter';
import { StructuralValueConverter } from './structural.converter';

export * from './composite.converter';
export * from './enum.converter';
export * from './primitive.converter';
export * from './reference.converter';
export * from './sequence.converter';
export * from './structural.converter';

/**
 * Built-in coercion chain, highest priority first
 */
export function createDefaultConverters(): ValueConverter[] {
  return [
    new ReferenceValueConverter(),
    new SequenceValueConverter(),
    new CompositeValueConverter(),
    new EnumValueConverter(),
    new PrimitiveValueConverter(),
    new StructuralValueConverter(),
  ];
}
