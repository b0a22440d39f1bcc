import type {
  CompositeTypeDescriptor,
  EnumTypeDescriptor,
  MemberDescriptor,
  MemberSlot,
  OpaqueTypeDescriptor,
  PrimitiveKind,
  PrimitiveTypeDescriptor,
  ReferenceSource,
  ReferenceTypeDescriptor,
  SequenceContainer,
  SequenceTypeDescriptor,
  TypeDescriptor,
} from '../interfaces';
import { isPlainMapping } from './dynamic-value.utils';

/**
 * Inclusive bounds of the integral primitive kinds
 */
export const INTEGRAL_RANGES: Readonly<Record<'int' | 'long' | 'short' | 'byte', readonly [number, number]>> = {
  int: [-2147483648, 2147483647],
  long: [Number.MIN_SAFE_INTEGER, Number.MAX_SAFE_INTEGER],
  short: [-32768, 32767],
  byte: [0, 255],
};

const NUMERIC_KINDS: ReadonlySet<PrimitiveKind> = new Set(['int', 'long', 'short', 'byte', 'float', 'double']);

export function isIntegralKind(kind: PrimitiveKind): kind is 'int' | 'long' | 'short' | 'byte' {
  return kind in INTEGRAL_RANGES;
}

export function isNumericKind(kind: PrimitiveKind): boolean {
  return NUMERIC_KINDS.has(kind);
}

function primitive(kind: PrimitiveKind): PrimitiveTypeDescriptor {
  return { kind: 'primitive', primitive: kind };
}

/**
 * Builders for type descriptors
 *
 * @example
 * ```typescript
 * const Health = Types.composite('Health', [
 *   { name: 'current', type: Types.int, access: 'property' },
 *   { name: 'tags', type: Types.list(Types.string), access: 'property' },
 * ]);
 * ```
 */
export const Types = {
  int: primitive('int'),
  long: primitive('long'),
  short: primitive('short'),
  byte: primitive('byte'),
  float: primitive('float'),
  double: primitive('double'),
  bool: primitive('bool'),
  string: primitive('string'),

  enumeration(name: string, members: Record<string, number>, flags = false): EnumTypeDescriptor {
    return { kind: 'enum', name, members, flags };
  },

  reference(referenceKind: string, options: { source?: ReferenceSource; accepts?: (instance: object) => boolean } = {}): ReferenceTypeDescriptor {
    return { kind: 'reference', referenceKind, ...options };
  },

  sequence(container: SequenceContainer, element?: TypeDescriptor): SequenceTypeDescriptor {
    return { kind: 'sequence', container, element };
  },

  list(element?: TypeDescriptor): SequenceTypeDescriptor {
    return { kind: 'sequence', container: 'list', element };
  },

  array(element?: TypeDescriptor): SequenceTypeDescriptor {
    return { kind: 'sequence', container: 'array', element };
  },

  set(element?: TypeDescriptor): SequenceTypeDescriptor {
    return { kind: 'sequence', container: 'set', element };
  },

  composite(name: string, members: readonly MemberDescriptor[], options: Omit<CompositeTypeDescriptor, 'kind' | 'name' | 'members'> = {}): CompositeTypeDescriptor {
    return { kind: 'composite', name, members, ...options };
  },

  opaque(name: string, options: Omit<OpaqueTypeDescriptor, 'kind' | 'name'> = {}): OpaqueTypeDescriptor {
    return { kind: 'opaque', name, ...options };
  },
} as const;

/**
 * Display name of a type, e.g. `int`, `List<string>`, `Reference<Camera>`
 */
export function describeType(type: TypeDescriptor): string {
  switch (type.kind) {
    case 'primitive':
      return type.primitive;
    case 'enum':
    case 'composite':
    case 'opaque':
      return type.name;
    case 'reference':
      return `Reference<${type.referenceKind}>`;
    case 'sequence': {
      const element = type.element ? describeType(type.element) : 'unknown';
      const container = type.container === 'list' ? 'List' : type.container === 'set' ? 'Set' : 'Array';
      return `${container}<${element}>`;
    }
  }
}

/** Runtime key a member is stored under */
export function storageKey(member: MemberDescriptor): string {
  return member.key ?? member.name;
}

/**
 * Readable through inspection: any property, or a field marked serialized
 */
export function isVisibleMember(member: MemberDescriptor): boolean {
  return member.access === 'property' || member.serialized === true;
}

/**
 * Assignable by the pipeline: a visible member that is not read-only
 */
export function isWritableMember(member: MemberDescriptor): boolean {
  return isVisibleMember(member) && member.readonly !== true;
}

const memberTables = new WeakMap<CompositeTypeDescriptor, ReadonlyMap<string, MemberSlot>>();

/**
 * Name to property/field slot, built once per descriptor
 */
export function buildMemberTable(type: CompositeTypeDescriptor): ReadonlyMap<string, MemberSlot> {
  const cached = memberTables.get(type);
  if (cached) {
    return cached;
  }

  const table = new Map<string, MemberSlot>();
  for (const member of type.members) {
    const slot = table.get(member.name) ?? {};
    table.set(member.name, member.access === 'property' ? { ...slot, property: member } : { ...slot, field: member });
  }
  memberTables.set(type, table);
  return table;
}

/**
 * Default a member of the given type holds when nothing was supplied:
 * numeric kinds 0, bool false, enumerations 0, value-type composites a
 * default-initialised instance, anything else null
 */
export function defaultValueFor(type: TypeDescriptor): unknown {
  switch (type.kind) {
    case 'primitive':
      if (type.primitive === 'bool') {
        return false;
      }
      return isNumericKind(type.primitive) ? 0 : null;
    case 'enum':
      return 0;
    case 'composite':
      return type.valueType ? createDefaultInstance(type) : null;
    default:
      return null;
  }
}

/**
 * Fresh composite instance; writable members the factory left undefined hold
 * their type's default
 */
export function createDefaultInstance(type: CompositeTypeDescriptor): object {
  const instance = type.create ? type.create() : {};
  for (const member of type.members) {
    if (!isWritableMember(member)) {
      continue;
    }
    const key = storageKey(member);
    if (Reflect.get(instance, key) === undefined) {
      Reflect.set(instance, key, defaultValueFor(member.type));
    }
  }
  return instance;
}

export interface SatisfiesOptions {
  /** Recognises plain objects that are live-graph members rather than descriptors */
  isLiveObject?: (value: object) => boolean;
}

/**
 * True when a value's runtime shape already fits the type, so coercion can
 * return it unchanged
 */
export function satisfiesType(value: unknown, type: TypeDescriptor, options: SatisfiesOptions = {}): boolean {
  switch (type.kind) {
    case 'primitive':
      return satisfiesPrimitive(value, type.primitive);
    case 'enum':
      return typeof value === 'number' && Number.isInteger(value);
    case 'reference':
      if (value === null || typeof value !== 'object' || Array.isArray(value)) {
        return false;
      }
      if (isPlainMapping(value) && !options.isLiveObject?.(value)) {
        return false;
      }
      return type.accepts ? type.accepts(value) : true;
    case 'sequence': {
      const items = type.container === 'set' ? (value instanceof Set ? Array.from(value) : undefined) : Array.isArray(value) ? value : undefined;
      if (!items) {
        return false;
      }
      const { element } = type;
      if (!element) {
        return items.length === 0;
      }
      return items.every((item: unknown) => satisfiesType(item, element, options));
    }
    case 'composite':
      return satisfiesComposite(value, type, options);
    case 'opaque':
      if (type.is) {
        return type.is(value);
      }
      return !type.decode;
  }
}

function satisfiesPrimitive(value: unknown, kind: PrimitiveKind): boolean {
  if (kind === 'bool') {
    return typeof value === 'boolean';
  }
  if (kind === 'string') {
    return typeof value === 'string';
  }
  if (typeof value !== 'number') {
    return false;
  }
  if (isIntegralKind(kind)) {
    const [min, max] = INTEGRAL_RANGES[kind];
    return Number.isInteger(value) && value >= min && value <= max;
  }
  return true;
}

function satisfiesComposite(value: unknown, type: CompositeTypeDescriptor, options: SatisfiesOptions): boolean {
  if (value === null || typeof value !== 'object') {
    return false;
  }
  if (type.ctor) {
    return value instanceof type.ctor;
  }
  if (!isPlainMapping(value)) {
    return false;
  }

  const writable = type.members.filter(isWritableMember);
  const keys = Object.keys(value);
  if (keys.length !== writable.length) {
    return false;
  }
  return writable.every((member) => {
    const key = storageKey(member);
    return key in value && satisfiesType(value[key], member.type, options);
  });
}
