import { describe, it, expect } from 'vitest';
import { PersistentList } from '../../src/logger/persistent-list.js';

describe('PersistentList', () => {
  it('starts empty', () => {
    const list = PersistentList.empty<string>();

    expect(list.length).toBe(0);
    expect(list.isEmpty).toBe(true);
    expect(list.toArray()).toEqual([]);
  });

  it('builds from items in order', () => {
    expect(PersistentList.of('a', 'b', 'c').toArray()).toEqual(['a', 'b', 'c']);
  });

  it('appends without touching the receiver', () => {
    const base = PersistentList.of('app');
    const child = base.append('db');

    expect(base.toArray()).toEqual(['app']);
    expect(base.length).toBe(1);
    expect(child.toArray()).toEqual(['app', 'db']);
    expect(child.length).toBe(2);
  });

  it('keeps sibling branches independent', () => {
    const root = PersistentList.of(1, 2);
    const left = root.append(3);
    const right = root.append(4).append(5);

    expect(root.toArray()).toEqual([1, 2]);
    expect(left.toArray()).toEqual([1, 2, 3]);
    expect(right.toArray()).toEqual([1, 2, 4, 5]);
  });

  it('appends several items with appendAll', () => {
    expect(PersistentList.of('x').appendAll(['y', 'z']).toArray()).toEqual(['x', 'y', 'z']);
  });

  it('returns a frozen snapshot', () => {
    const items = PersistentList.of('a').append('b').toArray();

    expect(Object.isFrozen(items)).toBe(true);
  });

  it('snapshots stay valid after further appends', () => {
    const list = PersistentList.of('a');
    const before = list.toArray();
    list.append('b');

    expect(before).toEqual(['a']);
    expect(list.toArray()).toBe(before);
  });

  it('is iterable', () => {
    expect([...PersistentList.of(1, 2, 3)]).toEqual([1, 2, 3]);
  });

  it('handles long chains', () => {
    let list = PersistentList.empty<number>();
    for (let index = 0; index < 10_000; index++) {
      list = list.append(index);
    }

    const items = list.toArray();
    expect(items).toHaveLength(10_000);
    expect(items[0]).toBe(0);
    expect(items[9_999]).toBe(9_999);
  });
});
