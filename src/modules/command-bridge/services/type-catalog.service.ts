import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { TargetNotFoundError, ValidationError } from '../errors';
import {
  COMMAND_BRIDGE_OPTIONS,
  CommandBridgeOptions,
  CompositeTypeDescriptor,
  EXPOSED_MEMBERS_METADATA,
  EXPOSED_TYPE_METADATA,
  ExposedClass,
  MemberDescriptor,
  TypeResolver,
} from '../interfaces';
import type { ExposedTypeOptions } from '../decorators';

/**
 * Registry of composite member tables, keyed by type name and by class.
 * Tables are fixed when a type is registered.
 */
@Injectable()
export class TypeCatalogService implements TypeResolver {
  private readonly logger = new Logger(TypeCatalogService.name);
  private readonly byName = new Map<string, CompositeTypeDescriptor>();
  private readonly byConstructor = new Map<unknown, CompositeTypeDescriptor>();

  constructor(
    private readonly reflector: Reflector,
    @Optional()
    @Inject(COMMAND_BRIDGE_OPTIONS)
    private readonly options: CommandBridgeOptions = {},
  ) {
    for (const exposed of this.options.exposedTypes ?? []) {
      if (typeof exposed === 'function') {
        this.registerClass(exposed);
      } else {
        this.registerType(exposed);
      }
    }
  }

  registerType(descriptor: CompositeTypeDescriptor): CompositeTypeDescriptor {
    if (!descriptor.name) {
      throw new ValidationError('Type name cannot be empty');
    }
    if (this.byName.has(descriptor.name)) {
      this.logger.warn(`Type '${descriptor.name}' is already registered. Overwriting...`);
    }

    this.byName.set(descriptor.name, descriptor);
    if (descriptor.ctor) {
      this.byConstructor.set(descriptor.ctor, descriptor);
    }
    this.logger.debug(`Registered type '${descriptor.name}' with ${descriptor.members.length} members`);
    return descriptor;
  }

  /**
   * Builds a descriptor from `@ExposedType`, `@ExposedProperty` and
   * `@SerializedField` metadata. Classes are registered once.
   */
  registerClass(ctor: ExposedClass): CompositeTypeDescriptor {
    const existing = this.byConstructor.get(ctor);
    if (existing) {
      return existing;
    }

    // Own metadata only: an undecorated subclass must not take over its parent's name
    const typeOptions: ExposedTypeOptions | undefined = Reflect.getOwnMetadata(EXPOSED_TYPE_METADATA, ctor);
    const members = this.reflector.get<MemberDescriptor[] | undefined>(EXPOSED_MEMBERS_METADATA, ctor) ?? [];

    return this.registerType({
      kind: 'composite',
      name: typeOptions?.name ?? ctor.name,
      members,
      valueType: typeOptions?.valueType,
      create: () => new ctor(),
      ctor,
    });
  }

  resolve(identifier: string): CompositeTypeDescriptor {
    const descriptor = this.tryResolve(identifier);
    if (!descriptor) {
      throw new TargetNotFoundError(`Type '${identifier}' not found`, identifier);
    }
    return descriptor;
  }

  tryResolve(identifier: string): CompositeTypeDescriptor | undefined {
    return this.byName.get(identifier);
  }

  exists(identifier: string): boolean {
    return this.byName.has(identifier);
  }

  resolveMany(...identifiers: string[]): CompositeTypeDescriptor[] {
    return identifiers.map((identifier) => this.tryResolve(identifier)).filter((descriptor): descriptor is CompositeTypeDescriptor => descriptor !== undefined);
  }

  /**
   * Finds the descriptor of an instance's class or its nearest registered ancestor
   */
  describeInstance(instance: object): CompositeTypeDescriptor | undefined {
    let prototype: unknown = Object.getPrototypeOf(instance);
    while (prototype !== null && typeof prototype === 'object') {
      const descriptor = this.byConstructor.get(prototype.constructor);
      if (descriptor) {
        return descriptor;
      }
      prototype = Object.getPrototypeOf(prototype);
    }
    return undefined;
  }

  listTypes(): string[] {
    return Array.from(this.byName.keys());
  }
}
