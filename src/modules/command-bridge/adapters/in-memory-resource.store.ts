import { v4 as uuidv4 } from 'uuid';
import { TargetNotFoundError, ValidationError } from '../errors';
import type { LiveObjectEntry, LiveObjectLocator, ResourceResolver } from '../interfaces';
import { normalizePath } from '../utils';

export interface AddResourceOptions {
  /** Stable identifier; a UUID is generated when omitted */
  id?: string;
  /** Catalog type name for instances whose class carries no type metadata */
  typeName?: string;
}

/**
 * Path- and id-indexed store of object instances
 */
export class InMemoryResourceStore implements ResourceResolver<object> {
  protected readonly byPath = new Map<string, LiveObjectEntry>();
  protected readonly byId = new Map<string, LiveObjectEntry>();
  protected readonly byInstance = new WeakMap<object, LiveObjectEntry>();

  constructor(protected readonly label = 'Object') {}

  /**
   * Add an instance under a path. An existing entry at that path is replaced.
   */
  add<T extends object>(path: string, instance: T, options: AddResourceOptions = {}): LiveObjectEntry<T> {
    const normalized = normalizePath(path);
    if (!normalized) {
      throw new ValidationError(`${this.label} path cannot be null or empty`);
    }

    this.remove(normalized);
    const entry: LiveObjectEntry<T> = { id: options.id ?? uuidv4(), path: normalized, typeName: options.typeName, instance };
    this.byPath.set(entry.path, entry);
    this.byId.set(entry.id, entry);
    this.byInstance.set(instance, entry);
    return entry;
  }

  /**
   * Remove the entry at a path or id
   */
  remove(identifier: string): boolean {
    const entry = this.findEntry(identifier);
    if (!entry) {
      return false;
    }
    this.byPath.delete(entry.path);
    this.byId.delete(entry.id);
    this.byInstance.delete(entry.instance);
    return true;
  }

  clear(): void {
    for (const entry of this.byPath.values()) {
      this.byInstance.delete(entry.instance);
    }
    this.byPath.clear();
    this.byId.clear();
  }

  get size(): number {
    return this.byPath.size;
  }

  resolve(identifier: string): object {
    const instance = this.tryResolve(identifier);
    if (!instance) {
      throw new TargetNotFoundError(`${this.label} not found: ${identifier}`, identifier);
    }
    return instance;
  }

  /**
   * Path first, then id
   */
  tryResolve(identifier: string): object | undefined {
    return this.findEntry(identifier)?.instance;
  }

  exists(identifier: string): boolean {
    return this.findEntry(identifier) !== undefined;
  }

  resolveMany(...identifiers: string[]): object[] {
    return identifiers.map((identifier) => this.tryResolve(identifier)).filter((instance): instance is object => instance !== undefined);
  }

  describe(instance: object): LiveObjectLocator | undefined {
    const entry = this.byInstance.get(instance);
    return entry ? { id: entry.id, path: entry.path, typeName: entry.typeName } : undefined;
  }

  protected findEntry(identifier: string): LiveObjectEntry | undefined {
    if (!identifier) {
      return undefined;
    }
    return this.byPath.get(normalizePath(identifier)) ?? this.byId.get(identifier);
  }
}
