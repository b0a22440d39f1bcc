import 'reflect-metadata';
import { EXPOSED_MEMBERS_METADATA, EXPOSED_TYPE_METADATA, MemberDescriptor, TypeDescriptor } from '../interfaces';

export interface ExposedTypeOptions {
  /** Catalog name; defaults to the class name */
  name?: string;
  /** Defaults to a default-initialised instance instead of null */
  valueType?: boolean;
}

export interface ExposedPropertyOptions {
  readonly?: boolean;
}

export interface SerializedFieldOptions {
  /** Name callers use when it differs from the storage key */
  name?: string;
  readonly?: boolean;
}

/**
 * Marks a class as a composite type the type catalog can describe
 *
 * @example
 * ```typescript
 * @ExposedType('Light')
 * class Light {
 *   @ExposedProperty(Types.float)
 *   intensity = 1;
 *
 *   @SerializedField(Types.int, { name: 'range' })
 *   private _range = 10;
 * }
 * ```
 */
export function ExposedType(nameOrOptions?: string | ExposedTypeOptions): ClassDecorator {
  const options: ExposedTypeOptions = typeof nameOrOptions === 'string' ? { name: nameOrOptions } : (nameOrOptions ?? {});
  return (target) => {
    Reflect.defineMetadata(EXPOSED_TYPE_METADATA, { name: options.name ?? target.name, valueType: options.valueType }, target);
  };
}

/**
 * Public, assignable member
 */
export function ExposedProperty(type: TypeDescriptor, options: ExposedPropertyOptions = {}): PropertyDecorator {
  return (target, propertyKey) => {
    const name = String(propertyKey);
    appendMember(target.constructor, { name, type, access: 'property', readonly: options.readonly });
  };
}

/**
 * Non-public field opted in to the pipeline
 */
export function SerializedField(type: TypeDescriptor, options: SerializedFieldOptions = {}): PropertyDecorator {
  return (target, propertyKey) => {
    const key = String(propertyKey);
    appendMember(target.constructor, { name: options.name ?? key, key, type, access: 'field', serialized: true, readonly: options.readonly });
  };
}

// Members live on the constructor; subclasses copy the inherited list before appending
function appendMember(ctor: object, member: MemberDescriptor): void {
  const inherited: unknown = Reflect.getMetadata(EXPOSED_MEMBERS_METADATA, ctor);
  const members: MemberDescriptor[] = Array.isArray(inherited) ? [...inherited] : [];
  Reflect.defineMetadata(EXPOSED_MEMBERS_METADATA, [...members.filter((existing) => existing.name !== member.name || existing.access !== member.access), member], ctor);
}
