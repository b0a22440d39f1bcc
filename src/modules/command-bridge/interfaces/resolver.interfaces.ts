import type { DynamicMapping } from './dynamic-value.interfaces';
import type { CompositeTypeDescriptor } from './type-descriptor.interfaces';

/**
 * Resolves resources from an identifier (locator path, opaque id, name)
 */
export interface ResourceResolver<T> {
  /** Throws `TargetNotFoundError` when nothing matches */
  resolve(identifier: string): T;
  tryResolve(identifier: string): T | undefined;
  exists(identifier: string): boolean;
  /** Unresolved identifiers are skipped */
  resolveMany(...identifiers: string[]): T[];
}

/**
 * Stable identifier and human-readable path of a live object
 */
export interface LiveObjectLocator {
  readonly id: string;
  readonly path: string;
  /** Catalog type name, for objects whose class carries no type metadata */
  readonly typeName?: string;
}

export interface LiveObjectEntry<T extends object = object> extends LiveObjectLocator {
  readonly instance: T;
}

/**
 * Access to the external live-object graph
 */
export interface LiveObjectResolver extends ResourceResolver<object> {
  /** Every live object, in enumeration order */
  enumerate(): Iterable<LiveObjectEntry>;
  describe(instance: object): LiveObjectLocator | undefined;
}

/**
 * Access to stored assets
 */
export interface AssetResolver extends ResourceResolver<object> {
  validatePath(path: string): boolean;
  describe(asset: object): LiveObjectLocator | undefined;
}

/**
 * Resolves type names and instances to their member tables
 */
export interface TypeResolver extends ResourceResolver<CompositeTypeDescriptor> {
  describeInstance(instance: object): CompositeTypeDescriptor | undefined;
}

/**
 * Outcome of payload validation
 */
export interface ValidationResult {
  readonly isValid: boolean;
  readonly errors: readonly string[];
  /** Written back over the original payload, key by key */
  readonly normalizedPayload?: DynamicMapping;
}

export interface PayloadValidator {
  validate(payload: DynamicMapping, operation: string): ValidationResult;
}

/**
 * Post-mutation hook. Must never block; returning null means nothing to report.
 */
export type SideEffectWaiter = (operation: string) => DynamicMapping | null;
