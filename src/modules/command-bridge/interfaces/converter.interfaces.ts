import type { AssetResolver, LiveObjectResolver } from './resolver.interfaces';
import type { TypeDescriptor } from './type-descriptor.interfaces';

/**
 * Services a converter may call back into while converting nested values
 */
export interface ConversionContext {
  /** Recursive entry point; runs the full chain, defaults included */
  convert(value: unknown, target: TypeDescriptor): unknown;
  readonly liveObjects?: LiveObjectResolver;
  readonly assets?: AssetResolver;
}

/**
 * One link of the coercion chain. Higher priority runs first.
 */
export interface ValueConverter {
  readonly name: string;
  readonly priority: number;
  canConvert(value: unknown, target: TypeDescriptor): boolean;
  /** Throws `ConversionError` when the value cannot be coerced */
  convert(value: unknown, target: TypeDescriptor, context: ConversionContext): unknown;
}
