/**
 * Descriptor Cache
 *
 * Per-prober cache of descriptors keyed by absolute path. An entry is only
 * served while the file's modification time matches the one it was probed at.
 */

import type { MediaDescriptor } from './types.js';

interface CacheEntry {
  mtimeMs: number;
  descriptor: MediaDescriptor;
}

export class DescriptorCache {
  private readonly entries = new Map<string, CacheEntry>();

  /**
   * Return the cached descriptor if it was taken at `mtimeMs`. A stale entry
   * is dropped.
   */
  get(path: string, mtimeMs: number): MediaDescriptor | undefined {
    const entry = this.entries.get(path);
    if (!entry) return undefined;
    if (entry.mtimeMs !== mtimeMs) {
      this.entries.delete(path);
      return undefined;
    }
    return entry.descriptor;
  }

  set(path: string, mtimeMs: number, descriptor: MediaDescriptor): void {
    this.entries.set(path, { mtimeMs, descriptor });
  }

  invalidate(path: string): void {
    this.entries.delete(path);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
