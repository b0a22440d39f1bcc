import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { createDefaultConverters } from '../converters';
import { ConversionError, describeError } from '../errors';
import {
  ASSET_RESOLVER,
  AssetResolver,
  COMMAND_BRIDGE_OPTIONS,
  CommandBridgeOptions,
  CompositeTypeDescriptor,
  ConversionContext,
  ConversionOutcome,
  DynamicValue,
  LIVE_OBJECT_RESOLVER,
  LiveObjectResolver,
  TypeDescriptor,
  ValueConverter,
} from '../interfaces';
import {
  defaultValueFor,
  describeType,
  describeValue,
  isPlainMapping,
  isWritableMember,
  satisfiesType,
  storageKey,
  toStructural,
} from '../utils';

/**
 * Coercion engine: turns untyped wire values into values of a declared type.
 *
 * Order of evaluation:
 * 1. null or undefined gives the type's default
 * 2. a value that already fits the type is returned unchanged
 * 3. every applicable converter, highest priority first, until one succeeds
 * 4. when all of them throw, a warning is logged and the default is returned
 */
@Injectable()
export class ValueConverterService {
  private readonly logger = new Logger(ValueConverterService.name);
  private readonly converters: ValueConverter[];
  private readonly context: ConversionContext;

  constructor(
    @Optional()
    @Inject(LIVE_OBJECT_RESOLVER)
    private readonly liveObjects?: LiveObjectResolver,
    @Optional()
    @Inject(ASSET_RESOLVER)
    private readonly assets?: AssetResolver,
    @Optional()
    @Inject(COMMAND_BRIDGE_OPTIONS)
    private readonly options: CommandBridgeOptions = {},
  ) {
    this.converters = [...createDefaultConverters(), ...(this.options.converters ?? [])].sort((a, b) => b.priority - a.priority);
    this.context = {
      convert: (value: unknown, target: TypeDescriptor) => this.convert(value, target),
      liveObjects: this.liveObjects,
      assets: this.assets,
    };
  }

  /**
   * Converts a value, absorbing failures into the target's default
   */
  convert(value: unknown, target: TypeDescriptor): unknown {
    return this.tryConvert(value, target).value;
  }

  tryConvert(value: unknown, target: TypeDescriptor): ConversionOutcome {
    if (value === null || value === undefined) {
      return { ok: true, value: defaultValueFor(target) };
    }

    if (satisfiesType(value, target, { isLiveObject: (candidate) => this.isLiveObject(candidate) })) {
      if (target.kind === 'composite' && !target.ctor && isPlainMapping(value)) {
        return { ok: true, value: this.copyMapping(value, target) };
      }
      return { ok: true, value };
    }

    const failures: string[] = [];
    for (const converter of this.converters) {
      if (!converter.canConvert(value, target)) {
        continue;
      }
      try {
        return { ok: true, value: converter.convert(value, target, this.context) };
      } catch (error: unknown) {
        failures.push(`${converter.name}: ${describeError(error)}`);
      }
    }

    const error = new ConversionError(
      failures.length > 0
        ? `Cannot convert ${describeValue(value)} to ${describeType(target)} (${failures.join('; ')})`
        : `No converter accepts ${describeValue(value)} for ${describeType(target)}`,
    );
    this.logger.warn(`${error.message}; using default value`);
    return { ok: false, value: defaultValueFor(target), error };
  }

  // Class-less composites are stored as plain objects; never hand back the caller's mapping
  private copyMapping(value: Record<string, unknown>, target: CompositeTypeDescriptor): object {
    const copy = target.create ? target.create() : {};
    for (const member of target.members) {
      if (isWritableMember(member)) {
        const key = storageKey(member);
        Reflect.set(copy, key, this.convert(value[key], member.type));
      }
    }
    return copy;
  }

  /**
   * Adds a converter to the chain. Among equal priorities, earlier
   * registrations run first.
   */
  registerConverter(converter: ValueConverter): void {
    this.converters.push(converter);
    this.converters.sort((a, b) => b.priority - a.priority);
    this.logger.debug(`Registered converter '${converter.name}' with priority ${converter.priority}`);
  }

  getConverters(): readonly ValueConverter[] {
    return this.converters;
  }

  /**
   * Encodes a live value back into wire form. Live objects and assets
   * become `{ $ref, $id }` descriptors.
   */
  serialize(value: unknown): DynamicValue {
    return toStructural(value, (candidate) => {
      const locator = this.liveObjects?.describe(candidate) ?? this.assets?.describe(candidate);
      return locator ? { $ref: locator.path, $id: locator.id } : undefined;
    });
  }

  private isLiveObject(value: object): boolean {
    return this.liveObjects?.describe(value) !== undefined || this.assets?.describe(value) !== undefined;
  }
}
