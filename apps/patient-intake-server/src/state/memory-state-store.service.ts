import { Injectable } from '@nestjs/common';
import { ExpiryListener, StateStore } from './state-store.interface';

type StoredValue<TValue> = {
  value: TValue;
  expiresAt?: number;
};

/** Process-local store. Expired entries are dropped when read and swept on every write. */
@Injectable()
export class MemoryStateStoreService<TValue> implements StateStore<TValue> {
  private readonly store = new Map<string, StoredValue<TValue>>();
  private readonly expiryListeners: ExpiryListener<TValue>[] = [];

  async get(key: string): Promise<TValue | undefined> {
    const entry = this.store.get(key);
    if (!entry) {
      return undefined;
    }
    if (isExpired(entry, Date.now())) {
      this.expire(key, entry);
      return undefined;
    }
    return entry.value;
  }

  async set(key: string, value: TValue, ttlSeconds?: number): Promise<void> {
    this.sweep();
    const expiresAt = ttlSeconds ? Date.now() + ttlSeconds * 1000 : undefined;
    this.store.set(key, { value, expiresAt });
  }

  async delete(key: string): Promise<void> {
    this.store.delete(key);
  }

  onExpire(listener: ExpiryListener<TValue>): void {
    this.expiryListeners.push(listener);
  }

  private sweep(): void {
    const now = Date.now();
    for (const [key, entry] of this.store) {
      if (isExpired(entry, now)) {
        this.expire(key, entry);
      }
    }
  }

  private expire(key: string, entry: StoredValue<TValue>): void {
    this.store.delete(key);
    this.expiryListeners.forEach((listener) => listener(key, entry.value));
  }
}

const isExpired = <TValue>(entry: StoredValue<TValue>, now: number): boolean =>
  entry.expiresAt !== undefined && entry.expiresAt <= now;
