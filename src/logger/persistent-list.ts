/**
 * Append-only persistent list
 *
 * Each list is a pointer to its last node; appending allocates one node that
 * points back at the receiver's last node, so every list derived from a
 * common ancestor shares that ancestor's nodes. Lists are never mutated after
 * construction, which makes them safe to hand to any number of derived
 * loggers.
 *
 * @example
 * ```typescript
 * const base = PersistentList.of('app');
 * const child = base.append('db');
 *
 * base.toArray();  // ['app']
 * child.toArray(); // ['app', 'db']
 * ```
 */

interface ListNode<T> {
  readonly value: T;
  readonly previous: ListNode<T> | undefined;
}

export class PersistentList<T> implements Iterable<T> {
  private static readonly EMPTY = new PersistentList<never>(undefined, 0);

  // Materialized lazily; lists are immutable so the snapshot never goes stale
  private snapshot: readonly T[] | undefined;

  private constructor(
    private readonly last: ListNode<T> | undefined,
    readonly length: number
  ) {}

  static empty<T>(): PersistentList<T> {
    return PersistentList.EMPTY;
  }

  static of<T>(...items: readonly T[]): PersistentList<T> {
    return PersistentList.empty<T>().appendAll(items);
  }

  get isEmpty(): boolean {
    return this.length === 0;
  }

  /** Returns a new list ending with `item`; O(1) */
  append(item: T): PersistentList<T> {
    return new PersistentList<T>({ value: item, previous: this.last }, this.length + 1);
  }

  /** Returns a new list ending with `items`, in order */
  appendAll(items: Iterable<T>): PersistentList<T> {
    let list: PersistentList<T> = this;
    for (const item of items) {
      list = list.append(item);
    }
    return list;
  }

  /** Frozen array of the items, first appended first */
  toArray(): readonly T[] {
    if (this.snapshot === undefined) {
      const items = new Array<T>(this.length);
      let node = this.last;
      for (let index = this.length - 1; node !== undefined; index--) {
        items[index] = node.value;
        node = node.previous;
      }
      this.snapshot = Object.freeze(items);
    }
    return this.snapshot;
  }

  [Symbol.iterator](): Iterator<T> {
    return this.toArray()[Symbol.iterator]();
  }
}
