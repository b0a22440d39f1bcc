import type { DynamicValue } from './dynamic-value.interfaces';

/**
 * Primitive member kinds. Integral kinds are range-checked on conversion.
 */
export type PrimitiveKind = 'int' | 'long' | 'short' | 'byte' | 'float' | 'double' | 'bool' | 'string';

/** Concrete container a sequence member demands */
export type SequenceContainer = 'list' | 'array' | 'set';

/** Resolver tried first for a live-object reference */
export type ReferenceSource = 'object' | 'asset';

/** How a member is stored on its owner */
export type MemberAccess = 'property' | 'field';

/**
 * Constructor of a type whose instances can be described by the type catalog
 */
export type ExposedConstructor = abstract new (...args: never[]) => object;

/**
 * Class the type catalog can build from its member decorators
 */
export type ExposedClass = new () => object;

export interface PrimitiveTypeDescriptor {
  readonly kind: 'primitive';
  readonly primitive: PrimitiveKind;
}

/**
 * Weak enumeration: symbolic names over an integral underlying value.
 * Integral values outside `members` are stored as-is.
 */
export interface EnumTypeDescriptor {
  readonly kind: 'enum';
  readonly name: string;
  readonly members: Readonly<Record<string, number>>;
  /** Comma-joined names are OR-ed together */
  readonly flags?: boolean;
}

export interface ReferenceTypeDescriptor {
  readonly kind: 'reference';
  /** Concrete kind of live object the member holds, e.g. `Camera` */
  readonly referenceKind: string;
  readonly source?: ReferenceSource;
  /** Narrows a resolved instance to the concrete kind */
  readonly accepts?: (instance: object) => boolean;
}

export interface SequenceTypeDescriptor {
  readonly kind: 'sequence';
  readonly container: SequenceContainer;
  /** Element type. An unknown element type yields an empty container. */
  readonly element?: TypeDescriptor;
}

export interface CompositeTypeDescriptor {
  readonly kind: 'composite';
  readonly name: string;
  readonly members: readonly MemberDescriptor[];
  /** Value types default to a fully default-initialised instance instead of null */
  readonly valueType?: boolean;
  /** Factory for a fresh instance; plain objects are built when absent */
  readonly create?: () => object;
  /** Runtime class of instances, used for identity checks and instance lookup */
  readonly ctor?: ExposedConstructor;
}

/**
 * Anything the engine has no dedicated converter for. Values pass through
 * unchanged unless `decode` is given, in which case they take a structural
 * round trip through it.
 */
export interface OpaqueTypeDescriptor {
  readonly kind: 'opaque';
  readonly name: string;
  readonly decode?: (structural: DynamicValue) => unknown;
  readonly is?: (value: unknown) => boolean;
}

/**
 * Statically-known shape a member requires
 */
export type TypeDescriptor =
  | PrimitiveTypeDescriptor
  | EnumTypeDescriptor
  | ReferenceTypeDescriptor
  | SequenceTypeDescriptor
  | CompositeTypeDescriptor
  | OpaqueTypeDescriptor;

/**
 * One entry of a composite type's member table
 */
export interface MemberDescriptor {
  /** Name callers address the member by */
  readonly name: string;
  readonly type: TypeDescriptor;
  readonly access: MemberAccess;
  /** Runtime storage key when it differs from `name`, e.g. `_health` */
  readonly key?: string;
  readonly readonly?: boolean;
  /** Opt-in visibility marker for `field` members */
  readonly serialized?: boolean;
}

/**
 * Member table slot: a name may carry a property and a like-named field
 */
export interface MemberSlot {
  readonly property?: MemberDescriptor;
  readonly field?: MemberDescriptor;
}
