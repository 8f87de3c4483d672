/**
 * Read-only snapshots for values crossing a dispatch boundary.
 *
 * Applied at hook emission, filter application and namespaced handler calls
 * so that callbacks cannot mutate caller-owned state through their
 * arguments. The caller's value is copied, never frozen in place.
 *
 *   Map         → FrozenMap (ReadonlyMap view over a private copy)
 *   Set         → FrozenSet (ReadonlySet view over a private copy)
 *   array       → frozen array copy
 *   plain object → frozen object copy
 *
 * Nested plain containers are frozen the same way. Scalars, functions and
 * class instances pass through unchanged.
 */

// Backing stores built by the freezer; a frozen view adopts these instead of copying.
const adoptable = new WeakSet<object>();

export class FrozenMap<K, V> implements ReadonlyMap<K, V> {
  private readonly store: Map<K, V>;

  constructor(entries: Iterable<readonly [K, V]>) {
    if (entries instanceof Map && adoptable.delete(entries)) {
      this.store = entries;
    } else {
      this.store = new Map(entries);
    }
    Object.freeze(this);
  }

  get size(): number {
    return this.store.size;
  }

  get(key: K): V | undefined {
    return this.store.get(key);
  }

  has(key: K): boolean {
    return this.store.has(key);
  }

  forEach(callback: (value: V, key: K, map: ReadonlyMap<K, V>) => void, thisArg?: unknown): void {
    for (const [key, value] of this.store) {
      callback.call(thisArg, value, key, this);
    }
  }

  entries() {
    return this.store.entries();
  }

  keys() {
    return this.store.keys();
  }

  values() {
    return this.store.values();
  }

  [Symbol.iterator]() {
    return this.store[Symbol.iterator]();
  }

  get [Symbol.toStringTag](): string {
    return 'FrozenMap';
  }
}

export class FrozenSet<T> implements ReadonlySet<T> {
  private readonly store: Set<T>;

  constructor(items: Iterable<T>) {
    if (items instanceof Set && adoptable.delete(items)) {
      this.store = items;
    } else {
      this.store = new Set(items);
    }
    Object.freeze(this);
  }

  get size(): number {
    return this.store.size;
  }

  has(value: T): boolean {
    return this.store.has(value);
  }

  forEach(callback: (value: T, value2: T, set: ReadonlySet<T>) => void, thisArg?: unknown): void {
    for (const item of this.store) {
      callback.call(thisArg, item, item, this);
    }
  }

  entries() {
    return this.store.entries();
  }

  keys() {
    return this.store.keys();
  }

  values() {
    return this.store.values();
  }

  [Symbol.iterator]() {
    return this.store[Symbol.iterator]();
  }

  get [Symbol.toStringTag](): string {
    return 'FrozenSet';
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function freezeValue(value: unknown, seen: WeakMap<object, unknown>): unknown {
  if (value === null || typeof value !== 'object') return value;

  const cached = seen.get(value);
  if (cached !== undefined) return cached;

  // Register the view before filling it so self-references resolve to it.
  if (value instanceof Map) {
    const store = new Map<unknown, unknown>();
    adoptable.add(store);
    const frozen = new FrozenMap(store);
    seen.set(value, frozen);
    for (const [key, inner] of value) store.set(key, freezeValue(inner, seen));
    return frozen;
  }

  if (value instanceof Set) {
    const store = new Set<unknown>();
    adoptable.add(store);
    const frozen = new FrozenSet(store);
    seen.set(value, frozen);
    for (const item of value) store.add(freezeValue(item, seen));
    return frozen;
  }

  if (Array.isArray(value)) {
    const copy: unknown[] = [];
    seen.set(value, copy);
    for (const item of value) copy.push(freezeValue(item, seen));
    return Object.freeze(copy);
  }

  if (isPlainObject(value)) {
    const copy: Record<string, unknown> = {};
    seen.set(value, copy);
    for (const [key, inner] of Object.entries(value)) copy[key] = freezeValue(inner, seen);
    return Object.freeze(copy);
  }

  return value;
}

export function freeze<K, V>(value: Map<K, V> | ReadonlyMap<K, V>): ReadonlyMap<K, V>;
export function freeze<T>(value: Set<T> | ReadonlySet<T>): ReadonlySet<T>;
export function freeze<T>(value: readonly T[]): readonly T[];
export function freeze<T extends object>(value: T): Readonly<T>;
export function freeze<T>(value: T): T;
export function freeze(value: unknown): unknown {
  return freezeValue(value, new WeakMap());
}

/** Freeze every argument of a call. */
export function freezeArgs(args: readonly unknown[]): readonly unknown[] {
  const seen = new WeakMap<object, unknown>();
  return Object.freeze(args.map((arg) => freezeValue(arg, seen)));
}

/** Freeze each value of a keyword-argument record. */
export function freezeRecord(record: Readonly<Record<string, unknown>>): Readonly<Record<string, unknown>> {
  const seen = new WeakMap<object, unknown>();
  const copy: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) copy[key] = freezeValue(value, seen);
  return Object.freeze(copy);
}
