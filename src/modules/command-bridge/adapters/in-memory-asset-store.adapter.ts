import { ValidationError } from '../errors';
import type { AssetResolver, LiveObjectEntry } from '../interfaces';
import { AddResourceOptions, InMemoryResourceStore } from './in-memory-resource.store';

const INVALID_PATH_CHARS = /[<>"|\u0000-\u001f]/;

/**
 * In-memory implementation of AssetResolver. Asset paths live under a fixed
 * root, `Assets/` by default.
 */
export class InMemoryAssetStoreAdapter extends InMemoryResourceStore implements AssetResolver {
  constructor(private readonly root = 'Assets/') {
    super('Asset');
  }

  validatePath(path: string): boolean {
    if (!path || !path.startsWith(this.root)) {
      return false;
    }
    if (path.includes('..')) {
      return false;
    }
    return !INVALID_PATH_CHARS.test(path);
  }

  override add<T extends object>(path: string, instance: T, options: AddResourceOptions = {}): LiveObjectEntry<T> {
    if (!this.validatePath(path)) {
      throw new ValidationError(`Invalid asset path: ${path}`);
    }
    return super.add(path, instance, options);
  }
}
