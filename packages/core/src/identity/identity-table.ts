/**
 * IdentityTable - weak, identity-keyed association with enumeration
 *
 * A `WeakMap` alone cannot be iterated, and reconciliation has to walk every
 * pending instance. The table pairs the `WeakMap` with a set of `WeakRef`s;
 * a `FinalizationRegistry` prunes refs whose target was collected. Nothing
 * in the table keeps a key alive.
 *
 * @example
 * ```typescript
 * const pending = new IdentityTable<ComponentRecord>();
 * pending.set(instance, record);
 *
 * for (const [instance, record] of pending.entries()) {
 *   // only live instances are yielded
 * }
 * ```
 */
export class IdentityTable<V> {
  private readonly byKey = new WeakMap<object, V>();
  private readonly refOf = new WeakMap<object, WeakRef<object>>();
  private readonly refs = new Set<WeakRef<object>>();
  private readonly finalizer = new FinalizationRegistry<WeakRef<object>>((ref) => {
    this.refs.delete(ref);
  });

  set(key: object, value: V): void {
    if (!this.refOf.has(key)) {
      const ref = new WeakRef(key);
      this.refOf.set(key, ref);
      this.refs.add(ref);
      this.finalizer.register(key, ref, ref);
    }
    this.byKey.set(key, value);
  }

  get(key: object): V | undefined {
    return this.byKey.get(key);
  }

  has(key: object): boolean {
    return this.byKey.has(key);
  }

  delete(key: object): boolean {
    const ref = this.refOf.get(key);
    if (ref) {
      this.refs.delete(ref);
      this.finalizer.unregister(ref);
      this.refOf.delete(key);
    }
    return this.byKey.delete(key);
  }

  /**
   * Live entries in insertion order. Refs to collected keys are dropped as
   * they are encountered.
   */
  *entries(): IterableIterator<[object, V]> {
    for (const ref of this.refs) {
      const key = ref.deref();
      if (key === undefined) {
        this.refs.delete(ref);
        continue;
      }
      const value = this.byKey.get(key);
      if (value !== undefined) {
        yield [key, value];
      }
    }
  }

  *values(): IterableIterator<V> {
    for (const [, value] of this.entries()) {
      yield value;
    }
  }

  /** Number of live keys. Walks the table. */
  get size(): number {
    let count = 0;
    for (const ref of this.refs) {
      if (ref.deref() === undefined) {
        this.refs.delete(ref);
      } else {
        count++;
      }
    }
    return count;
  }

  clear(): void {
    for (const ref of this.refs) {
      const key = ref.deref();
      if (key !== undefined) {
        this.byKey.delete(key);
        this.refOf.delete(key);
      }
      this.finalizer.unregister(ref);
    }
    this.refs.clear();
  }
}
