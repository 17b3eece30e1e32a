/**
 * Arena-backed doubly-linked recency list.
 *
 * Entries live in a slot array and refer to their neighbours by slot index,
 * so unlinking and prepending are O(1) without object back-references.
 * Released slots go on a free list and are reused by later inserts.
 *
 * @packageDocumentation
 */

import type { EntryHandle, RecencyEntry, RecencyList } from './types.js';

/**
 * Creates an empty recency list.
 *
 * @returns A RecencyList instance
 *
 * @example
 * ```typescript
 * const list = createRecencyList<string, number>();
 * const a = list.insert('a', 1, undefined);
 * const b = list.insert('b', 2, undefined);
 * list.touch(a);
 * list.handles(); // [a, b]
 * ```
 */
export const createRecencyList = <K, V>(): RecencyList<K, V> => {
  let slots: (RecencyEntry<K, V> | undefined)[] = [];
  let freeSlots: EntryHandle[] = [];
  let headHandle: EntryHandle | undefined;
  let tailHandle: EntryHandle | undefined;
  let linked = 0;

  const entry = (handle: EntryHandle): RecencyEntry<K, V> => {
    const found = slots[handle];
    if (found === undefined) {
      throw new Error(`recency list has no entry at slot ${String(handle)}`);
    }
    return found;
  };

  const unlink = (handle: EntryHandle): void => {
    const current = entry(handle);

    if (current.prev === undefined) {
      headHandle = current.next;
    } else {
      entry(current.prev).next = current.next;
    }

    if (current.next === undefined) {
      tailHandle = current.prev;
    } else {
      entry(current.next).prev = current.prev;
    }

    current.prev = undefined;
    current.next = undefined;
    linked--;
  };

  const prepend = (handle: EntryHandle): void => {
    const current = entry(handle);

    current.prev = undefined;
    current.next = headHandle;
    if (headHandle !== undefined) {
      entry(headHandle).prev = handle;
    }
    headHandle = handle;
    if (tailHandle === undefined) {
      tailHandle = handle;
    }
    linked++;
  };

  const touch = (handle: EntryHandle): void => {
    // Position check, not a key or value comparison
    if (handle === headHandle) {
      return;
    }
    unlink(handle);
    prepend(handle);
  };

  const insert = (key: K, value: V, expireAt: number | undefined): EntryHandle => {
    const created: RecencyEntry<K, V> = {
      key,
      value,
      expireAt,
      prev: undefined,
      next: undefined,
    };

    const reused = freeSlots.pop();
    const handle = reused ?? slots.length;
    slots[handle] = created;

    prepend(handle);
    return handle;
  };

  const release = (handle: EntryHandle): RecencyEntry<K, V> => {
    const released = entry(handle);
    unlink(handle);
    slots[handle] = undefined;
    freeSlots.push(handle);
    return released;
  };

  const reset = (): void => {
    slots = [];
    freeSlots = [];
    headHandle = undefined;
    tailHandle = undefined;
    linked = 0;
  };

  const handles = (): EntryHandle[] => {
    const ordered: EntryHandle[] = [];
    for (let handle = headHandle; handle !== undefined; handle = entry(handle).next) {
      ordered.push(handle);
    }
    return ordered;
  };

  return {
    head: () => headHandle,
    tail: () => tailHandle,
    length: () => linked,
    entry,
    insert,
    unlink,
    prepend,
    touch,
    release,
    reset,
    handles,
  };
};
