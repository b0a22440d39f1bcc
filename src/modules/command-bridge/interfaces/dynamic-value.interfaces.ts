/**
 * Untyped wire-level values as they arrive from a remote caller.
 */

/** Scalar wire values */
export type DynamicPrimitive = null | boolean | number | string;

/**
 * Closed variant of everything a JSON-like payload can carry.
 * A missing key (`undefined`) is read as Null.
 */
export type DynamicValue = DynamicPrimitive | DynamicValue[] | DynamicMapping;

/**
 * String-keyed mapping. Keys are unique, order is irrelevant.
 */
export interface DynamicMapping {
  [key: string]: DynamicValue | undefined;
}

/**
 * Mapping that points at a live object or asset this package does not own.
 *
 * Recognised shapes, in lookup order:
 * - `{ "$type": "reference", "$path": "Root/Child" }`
 * - `{ "$ref": "Root/Child" }`
 * - `{ "$path": "Root/Child" }`
 * - `{ "$id": "4f1c..." }`
 * - `{ "path" | "objectPath" | "target" | "reference": "Root/Child" }`
 * - a mapping whose only value is a string
 */
export type ReferenceDescriptor = DynamicMapping;

/**
 * Identifier and/or locator path pulled out of a {@link ReferenceDescriptor}
 */
export interface ExtractedReference {
  readonly path?: string;
  readonly id?: string;
}
