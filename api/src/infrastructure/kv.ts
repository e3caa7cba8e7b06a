/**
 * Transactional key-value store
 *
 * Named buckets of byte values. Reads go through `view` (read-only),
 * writes through `update`. A rejected `update` callback leaves the
 * store exactly as it was before the transaction began.
 */

export interface ReadBucket {
  get(key: string): Promise<Uint8Array | null>;
}

export interface WriteBucket extends ReadBucket {
  put(key: string, value: Uint8Array): Promise<void>;
}

export interface ReadTx {
  /** Returns null when the bucket does not exist */
  bucket(name: string): Promise<ReadBucket | null>;
}

export interface WriteTx {
  bucket(name: string): Promise<WriteBucket | null>;
}

export interface KvStore {
  createBucketIfAbsent(name: string): Promise<void>;
  view<T>(fn: (tx: ReadTx) => Promise<T>): Promise<T>;
  update<T>(fn: (tx: WriteTx) => Promise<T>): Promise<T>;
  healthCheck(): Promise<void>;
  close(): Promise<void>;
}

// ============ In-memory driver ============

type BucketMap = Map<string, Map<string, Uint8Array>>;

/**
 * Process-local store. Used when no database is configured and as the
 * stand-in backing store in tests.
 */
export class MemoryKvStore implements KvStore {
  private readonly buckets: BucketMap = new Map();
  private closed = false;

  async createBucketIfAbsent(name: string): Promise<void> {
    this.assertOpen();
    if (!name) {
      throw new Error("bucket name required");
    }
    if (!this.buckets.has(name)) {
      this.buckets.set(name, new Map());
    }
  }

  /** Removes a bucket and everything in it, as an operator would out-of-band */
  deleteBucket(name: string): boolean {
    return this.buckets.delete(name);
  }

  /** Writes raw bytes outside any transaction; creates the bucket if needed */
  putRaw(bucketName: string, key: string, value: Uint8Array): void {
    let bucket = this.buckets.get(bucketName);
    if (!bucket) {
      bucket = new Map();
      this.buckets.set(bucketName, bucket);
    }
    bucket.set(key, new Uint8Array(value));
  }

  getRaw(bucketName: string, key: string): Uint8Array | null {
    const value = this.buckets.get(bucketName)?.get(key);
    return value ? new Uint8Array(value) : null;
  }

  async view<T>(fn: (tx: ReadTx) => Promise<T>): Promise<T> {
    this.assertOpen();
    return fn({
      bucket: async (name) => {
        const bucket = this.buckets.get(name);
        if (!bucket) return null;
        return {
          get: async (key) => {
            const value = bucket.get(key);
            return value ? new Uint8Array(value) : null;
          },
        };
      },
    });
  }

  async update<T>(fn: (tx: WriteTx) => Promise<T>): Promise<T> {
    this.assertOpen();
    const staged = new Map<string, Map<string, Uint8Array>>();

    const result = await fn({
      bucket: async (name) => {
        const bucket = this.buckets.get(name);
        if (!bucket) return null;
        return {
          get: async (key) => {
            const value = staged.get(name)?.get(key) ?? bucket.get(key);
            return value ? new Uint8Array(value) : null;
          },
          put: async (key, value) => {
            let writes = staged.get(name);
            if (!writes) {
              writes = new Map();
              staged.set(name, writes);
            }
            writes.set(key, new Uint8Array(value));
          },
        };
      },
    });

    // Commit
    for (const [name, writes] of staged) {
      const bucket = this.buckets.get(name);
      if (!bucket) continue;
      for (const [key, value] of writes) {
        bucket.set(key, value);
      }
    }
    return result;
  }

  async healthCheck(): Promise<void> {
    this.assertOpen();
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error("store is closed");
    }
  }
}
