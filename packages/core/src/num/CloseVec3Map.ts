/**
 * Hash map keyed by approximate position
 */

import type { Vec3 } from './vec3.js';
import { CloseVec3Comparer } from './tolerance.js';

interface Entry<V> {
  key: Vec3;
  value: V;
}

/**
 * Map from Vec3 keys to values where keys that a {@link CloseVec3Comparer}
 * considers equal share one entry.
 *
 * Lookups search the key's own hash bucket only.
 */
export class CloseVec3Map<V> {
  readonly comparer: CloseVec3Comparer;
  private buckets = new Map<number, Entry<V>[]>();
  private count = 0;

  constructor(comparer: CloseVec3Comparer = new CloseVec3Comparer()) {
    this.comparer = comparer;
  }

  get size(): number {
    return this.count;
  }

  get(key: Vec3): V | undefined {
    return this.find(key)?.value;
  }

  has(key: Vec3): boolean {
    return this.find(key) !== undefined;
  }

  /**
   * Insert or replace. When a close key already exists its stored key is
   * kept and only the value changes.
   */
  set(key: Vec3, value: V): this {
    const existing = this.find(key);
    if (existing) {
      existing.value = value;
      return this;
    }
    const hash = this.comparer.hash(key);
    const bucket = this.buckets.get(hash);
    const entry: Entry<V> = { key: [key[0], key[1], key[2]], value };
    if (bucket) {
      bucket.push(entry);
    } else {
      this.buckets.set(hash, [entry]);
    }
    this.count++;
    return this;
  }

  delete(key: Vec3): boolean {
    const hash = this.comparer.hash(key);
    const bucket = this.buckets.get(hash);
    if (!bucket) return false;
    const index = bucket.findIndex((e) => this.comparer.equals(e.key, key));
    if (index < 0) return false;
    bucket.splice(index, 1);
    if (bucket.length === 0) {
      this.buckets.delete(hash);
    }
    this.count--;
    return true;
  }

  clear(): void {
    this.buckets.clear();
    this.count = 0;
  }

  *entries(): IterableIterator<[Vec3, V]> {
    for (const bucket of this.buckets.values()) {
      for (const entry of bucket) {
        yield [entry.key, entry.value];
      }
    }
  }

  private find(key: Vec3): Entry<V> | undefined {
    const bucket = this.buckets.get(this.comparer.hash(key));
    return bucket?.find((e) => this.comparer.equals(e.key, key));
  }
}
