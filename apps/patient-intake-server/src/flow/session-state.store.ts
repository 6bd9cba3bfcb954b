/**
 * Per-conversation record of collected values. Keys are only ever added or
 * overwritten; the whole record is dropped with {@link clear} when the session ends.
 */
export class SessionStateStore<TState extends object> {
  private values: Partial<TState>;

  constructor(initial: Partial<TState> = {}) {
    this.values = { ...initial };
  }

  get<K extends keyof TState>(key: K): Partial<TState>[K] {
    return this.values[key];
  }

  has(key: keyof TState): boolean {
    return this.values[key] !== undefined;
  }

  set<K extends keyof TState>(key: K, value: TState[K]): void {
    this.values[key] = value;
  }

  patch(update: Partial<TState>): void {
    this.values = { ...this.values, ...update };
  }

  snapshot(): Readonly<Partial<TState>> {
    return { ...this.values };
  }

  fork(): SessionStateStore<TState> {
    return new SessionStateStore<TState>(this.values);
  }

  commit(draft: SessionStateStore<TState>): void {
    this.values = draft.snapshot();
  }

  clear(): void {
    this.values = {};
  }
}
