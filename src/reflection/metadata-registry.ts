import { PropertyMetadata } from './property-metadata.js';
import type { Constructor } from './types.js';

/**
 * Cache of `PropertyMetadata` per type. One registry is created with the
 * configuration and shared by every executor built from it.
 */
export class MetadataRegistry {
  private readonly metadataMap = new Map<Constructor<unknown>, PropertyMetadata>();
  private cacheEnabled: boolean;

  constructor(options: { cacheEnabled?: boolean } = {}) {
    this.cacheEnabled = options.cacheEnabled ?? true;
  }

  isCacheEnabled(): boolean {
    return this.cacheEnabled;
  }

  setCacheEnabled(enabled: boolean): void {
    this.cacheEnabled = enabled;
  }

  /**
   * Returns the metadata of `type`, building it on first use. With caching
   * disabled every call builds a fresh instance.
   */
  findForType(type: Constructor<unknown>): PropertyMetadata {
    if (!this.cacheEnabled) {
      return new PropertyMetadata(type);
    }
    const cached = this.metadataMap.get(type);
    if (cached) {
      return cached;
    }
    const built = new PropertyMetadata(type);
    this.metadataMap.set(type, built);
    return built;
  }

  /**
   * Number of cached types.
   */
  get size(): number {
    return this.metadataMap.size;
  }

  clear(): void {
    this.metadataMap.clear();
  }
}
