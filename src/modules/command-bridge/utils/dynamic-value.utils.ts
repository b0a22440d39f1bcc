import { ConversionError } from '../errors';
import type { DynamicMapping, DynamicValue, ExtractedReference } from '../interfaces';

/**
 * Helpers for inspecting and encoding untyped wire values
 */

/**
 * Replaces a value during structural encoding. Returning `undefined` lets the
 * default encoding run.
 */
export type StructuralReplacer = (value: object) => DynamicValue | undefined;

/**
 * True for object literals and `Object.create(null)` mappings, false for
 * class instances, arrays and everything else
 */
export function isPlainMapping(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false;
  }
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

/**
 * Short label of a value's runtime shape, for log and error messages
 */
export function describeValue(value: unknown): string {
  if (value === null || value === undefined) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'sequence';
  }
  if (isPlainMapping(value)) {
    return 'mapping';
  }
  if (typeof value === 'object') {
    return value.constructor?.name ?? 'object';
  }
  return typeof value;
}

/**
 * Encodes a value into plain structural form: dates become ISO strings,
 * sets become sequences, maps become mappings, functions and symbols become
 * null. A reference cycle is a `ConversionError`.
 */
export function toStructural(value: unknown, replacer?: StructuralReplacer): DynamicValue {
  return encode(value, replacer, new Set<object>());
}

function encode(value: unknown, replacer: StructuralReplacer | undefined, ancestors: Set<object>): DynamicValue {
  if (value === null || value === undefined) {
    return null;
  }

  switch (typeof value) {
    case 'boolean':
    case 'string':
      return value;
    case 'number':
      return Number.isFinite(value) ? value : null;
    case 'bigint':
      return Number.isSafeInteger(Number(value)) ? Number(value) : value.toString();
    case 'function':
    case 'symbol':
      return null;
    default:
      break;
  }

  if (typeof value !== 'object') {
    return null;
  }

  if (replacer) {
    const replaced = replacer(value);
    if (replaced !== undefined) {
      return replaced;
    }
  }

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }

  if (ancestors.has(value)) {
    throw new ConversionError(`Cannot encode ${describeValue(value)}: reference cycle detected`);
  }
  ancestors.add(value);

  try {
    if (Array.isArray(value)) {
      return value.map((item: unknown) => encode(item, replacer, ancestors));
    }
    if (value instanceof Set) {
      return Array.from(value, (item: unknown) => encode(item, replacer, ancestors));
    }
    if (value instanceof Map) {
      const mapping: DynamicMapping = {};
      value.forEach((item: unknown, key: unknown) => {
        mapping[String(key)] = encode(item, replacer, ancestors);
      });
      return mapping;
    }

    const mapping: DynamicMapping = {};
    for (const [key, item] of Object.entries(value)) {
      if (item === undefined || typeof item === 'function') {
        continue;
      }
      mapping[key] = encode(item, replacer, ancestors);
    }
    return mapping;
  } finally {
    ancestors.delete(value);
  }
}

/**
 * Textual representation used for string targets
 */
export function toText(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'object') {
    return JSON.stringify(toStructural(value));
  }
  return String(value);
}

// Keys that carry a locator path, checked after the `$`-prefixed shapes
const PATH_KEYS = ['path', 'objectPath', 'target', 'reference'] as const;

/**
 * Pulls an identifier and/or path out of a reference value. A bare string is
 * read as a path. Returns undefined when the value is not a reference shape.
 */
export function extractReference(value: unknown): ExtractedReference | undefined {
  if (typeof value === 'string') {
    return value.trim() ? { path: value.trim() } : undefined;
  }
  if (!isPlainMapping(value)) {
    return undefined;
  }

  const text = (key: string): string | undefined => {
    const candidate = value[key];
    return typeof candidate === 'string' && candidate.trim() ? candidate.trim() : undefined;
  };

  const id = text('$id');

  if (value['$type'] === 'reference' && text('$path')) {
    return { path: text('$path'), id };
  }
  const ref = text('$ref') ?? text('$path');
  if (ref) {
    return { path: ref, id };
  }
  if (id) {
    return { id };
  }

  for (const key of PATH_KEYS) {
    const path = text(key);
    if (path) {
      return { path };
    }
  }

  const values = Object.values(value);
  const [only] = values;
  if (values.length === 1 && typeof only === 'string' && only.trim()) {
    return { path: only.trim() };
  }
  return undefined;
}
