export type Comparator<K> = (a: K, b: K) => number;

/**
 * A map that iterates its entries in comparator order, whatever the order
 * they were inserted in.
 */
export class SortedMap<K, V> implements Iterable<[K, V]> {
  private readonly entryList: Array<[K, V]> = [];
  private readonly lookup = new Map<K, [K, V]>();

  constructor(readonly compare: Comparator<K>) {}

  get size(): number {
    return this.entryList.length;
  }

  has(key: K): boolean {
    return this.lookup.has(key);
  }

  get(key: K): V | undefined {
    return this.lookup.get(key)?.[1];
  }

  set(key: K, value: V): this {
    const existing = this.lookup.get(key);
    if (existing) {
      existing[1] = value;
      return this;
    }

    const entry: [K, V] = [key, value];
    this.entryList.splice(this.insertionPoint(key), 0, entry);
    this.lookup.set(key, entry);
    return this;
  }

  keys(): K[] {
    return this.entryList.map(([key]) => key);
  }

  values(): V[] {
    return this.entryList.map(([, value]) => value);
  }

  entries(): Array<[K, V]> {
    return this.entryList.map(([key, value]): [K, V] => [key, value]);
  }

  [Symbol.iterator](): Iterator<[K, V]> {
    return this.entries()[Symbol.iterator]();
  }

  // First position whose key sorts after `key`.
  private insertionPoint(key: K): number {
    let low = 0;
    let high = this.entryList.length;

    while (low < high) {
      const mid = (low + high) >>> 1;
      if (this.compare(this.entryList[mid][0], key) <= 0) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }

    return low;
  }
}

export function compareNumbers(a: number, b: number): number {
  return a - b;
}

/**
 * Order keys by their position in `order`. Keys missing from `order` sort
 * after every listed key, and lexically among themselves.
 */
export function rankComparator(order: readonly string[]): Comparator<string> {
  const ranks = new Map<string, number>();
  order.forEach((key, index) => {
    if (!ranks.has(key)) ranks.set(key, index);
  });

  return (a, b) => {
    const rankA = ranks.get(a);
    const rankB = ranks.get(b);

    if (rankA !== undefined && rankB !== undefined) return rankA - rankB;
    if (rankA !== undefined) return -1;
    if (rankB !== undefined) return 1;
    return a < b ? -1 : a > b ? 1 : 0;
  };
}
