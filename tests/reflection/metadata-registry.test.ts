import { describe, expect, it } from 'vitest';

import { MetadataRegistry } from '../../src/reflection/metadata-registry.js';

class Blog {
  title = 'untitled';
}

describe('MetadataRegistry', () => {
  it('should build metadata once per type while caching', () => {
    const registry = new MetadataRegistry();

    const first = registry.findForType(Blog);
    const second = registry.findForType(Blog);

    expect(second).toBe(first);
    expect(registry.size).toBe(1);
    expect(first.getReadablePropertyNames()).toEqual(['title']);
  });

  it('should build fresh metadata when caching is disabled', () => {
    const registry = new MetadataRegistry({ cacheEnabled: false });

    expect(registry.isCacheEnabled()).toBe(false);
    expect(registry.findForType(Blog)).not.toBe(registry.findForType(Blog));
    expect(registry.size).toBe(0);
  });

  it('should toggle caching and clear cached entries', () => {
    const registry = new MetadataRegistry();
    const cached = registry.findForType(Blog);

    registry.setCacheEnabled(false);
    expect(registry.findForType(Blog)).not.toBe(cached);

    registry.setCacheEnabled(true);
    expect(registry.findForType(Blog)).toBe(cached);

    registry.clear();
    expect(registry.size).toBe(0);
    expect(registry.findForType(Blog)).not.toBe(cached);
  });
});
