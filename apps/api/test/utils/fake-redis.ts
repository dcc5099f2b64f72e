/** Subset of the ioredis string commands used by the stores. */
export class FakeRedis {
  private readonly values = new Map<string, string>();
  readonly ttls = new Map<string, number>();
  status = 'ready';

  async get(key: string): Promise<string | null> {
    return this.values.get(key) ?? null;
  }

  async set(key: string, value: string, mode?: 'EX', ttl?: number): Promise<'OK'> {
    this.values.set(key, value);
    if (mode === 'EX' && typeof ttl === 'number') {
      this.ttls.set(key, ttl);
    } else {
      this.ttls.delete(key);
    }
    return 'OK';
  }

  async del(...keys: string[]): Promise<number> {
    let removed = 0;
    for (const key of keys) {
      if (this.values.delete(key)) {
        removed += 1;
      }
      this.ttls.delete(key);
    }
    return removed;
  }

  async quit(): Promise<'OK'> {
    this.status = 'end';
    return 'OK';
  }

  disconnect(): void {
    this.status = 'end';
  }
}
