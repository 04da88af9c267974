/**
 * Anything a pool can hand out: it must be able to forget its contents.
 */
export interface Clearable {
  clear(): void;
}

/**
 * Pool of reusable scratch objects (typically `Map`s) checked out per operation.
 *
 * Items are cleared on release and again on checkout, so no state leaks between
 * unrelated callers. At most `maxIdle` released items are kept; extras are dropped.
 *
 * Checkout is synchronous: within one thread two synchronous operations never
 * interleave, so each holds a distinct item for its whole duration.
 */
export class ScratchPool<T extends Clearable> {
  private readonly idle: T[] = [];
  private readonly inUse = new Set<T>();

  constructor(
    private readonly factory: () => T,
    readonly maxIdle: number = 4,
  ) {
    if (!Number.isInteger(maxIdle) || maxIdle < 0) {
      throw new RangeError(`ScratchPool maxIdle must be a non-negative integer, got ${maxIdle}`);
    }
  }

  get idleCount(): number {
    return this.idle.length;
  }

  get inUseCount(): number {
    return this.inUse.size;
  }

  /**
   * Check out a cleared item. Pair with `release`, or prefer `use`.
   */
  acquire(): T {
    const item = this.idle.pop() ?? this.factory();
    item.clear();
    this.inUse.add(item);
    return item;
  }

  /**
   * Return an item obtained from `acquire`.
   *
   * @throws Error if the item is not currently checked out from this pool
   */
  release(item: T): void {
    if (!this.inUse.delete(item)) {
      throw new Error('ScratchPool.release called with an item that is not checked out');
    }
    item.clear();
    if (this.idle.length < this.maxIdle) {
      this.idle.push(item);
    }
  }

  /**
   * Run `fn` with a checked-out item, releasing it on every exit path.
   * The item must not be retained past `fn`'s return.
   */
  use<R>(fn: (item: T) => R): R {
    const item = this.acquire();
    try {
      return fn(item);
    }
    finally {
      this.release(item);
    }
  }
}
