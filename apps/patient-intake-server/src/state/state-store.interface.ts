export type ExpiryListener<TValue> = (key: string, value: TValue) => void;

export type StateStore<TValue> = {
  get(key: string): Promise<TValue | undefined>;
  set(key: string, value: TValue, ttlSeconds?: number): Promise<void>;
  delete(key: string): Promise<void>;
  /** Called for each entry dropped because its TTL passed, never for deletes. */
  onExpire(listener: ExpiryListener<TValue>): void;
};

export const CALL_SESSION_STORE = Symbol('CALL_SESSION_STORE');
