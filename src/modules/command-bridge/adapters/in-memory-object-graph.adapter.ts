import type { LiveObjectEntry, LiveObjectResolver } from '../interfaces';
import { InMemoryResourceStore } from './in-memory-resource.store';

/**
 * In-memory implementation of LiveObjectResolver
 */
export class InMemoryObjectGraphAdapter extends InMemoryResourceStore implements LiveObjectResolver {
  constructor() {
    super('Object');
  }

  /**
   * Every object, in insertion order
   */
  enumerate(): Iterable<LiveObjectEntry> {
    return Array.from(this.byPath.values());
  }
}
