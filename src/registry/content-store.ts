/**
 * Content-Addressable Store
 *
 * Keys values by a hash of their normalized form, so equal content always
 * lands on the same key and different content never shares one. Used for
 * asset bytes and for rubric structures.
 */

import { createHash } from 'crypto';

export interface ContentKeyer<T> {
  /** Prepended to the hex digest, e.g. `content-hash-` */
  prefix: string;
  /** Canonical byte/string form that is hashed */
  normalize(value: T): string | Buffer;
  /** Hex chars of the md5 digest kept in the key (default 12) */
  hashLength?: number;
}

export interface PutResult<R> {
  key: string;
  record: R;
  created: boolean;
}

/** Full md5 hex digest */
export function md5Hex(data: string | Buffer): string {
  return createHash('md5').update(data).digest('hex');
}

/**
 * Map from content key to record, where the key is derived from content.
 *
 * `T` is the hashed value, `R` the stored record (defaults to `T`).
 */
export class ContentAddressableStore<T, R = T> {
  private readonly records = new Map<string, R>();

  constructor(private readonly keyer: ContentKeyer<T>) {}

  keyFor(value: T): string {
    return this.keyForDigest(md5Hex(this.keyer.normalize(value)));
  }

  /** Key for an already computed full md5 digest */
  keyForDigest(digest: string): string {
    return `${this.keyer.prefix}${digest.slice(0, this.keyer.hashLength ?? 12)}`;
  }

  putIfAbsent(value: T, create: (key: string) => R): PutResult<R> {
    const key = this.keyFor(value);
    const existing = this.records.get(key);
    if (existing !== undefined) {
      return { key, record: existing, created: false };
    }
    const record = create(key);
    this.records.set(key, record);
    return { key, record, created: true };
  }

  get(key: string): R | undefined {
    return this.records.get(key);
  }

  set(key: string, record: R): void {
    this.records.set(key, record);
  }

  has(key: string): boolean {
    return this.records.has(key);
  }

  delete(key: string): boolean {
    return this.records.delete(key);
  }

  entries(): Array<[string, R]> {
    return Array.from(this.records.entries());
  }

  get size(): number {
    return this.records.size;
  }
}
