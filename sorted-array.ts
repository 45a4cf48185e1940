import { defaultComparator } from './ordered-index';
import type { Comparator, IIndex, PairCallback } from './interfaces';

/** A super-inefficient sorted list for testing and benchmarking purposes */
export default class SortedArray<K = number, V = unknown> implements IIndex<K,V>
{
  a: [K,V][];
  cmp: Comparator<K>;

  public constructor(entries?: [K,V][], compare?: Comparator<K>) {
    this.cmp = compare || defaultComparator;
    this.a = [];
    if (entries !== undefined)
      for (var e of entries)
        this.insert(e[0], e[1]);
  }

  get size() { return this.a.length; }
  search(key: K): V | undefined {
    return this.get(key);
  }
  get(key: K, defaultValue?: V): V | undefined {
    var i = this.indexOf(key, -1);
    return i < 0 ? defaultValue : this.a[i][1];
  }
  has(key: K): boolean {
    return this.indexOf(key, -1) >= 0;
  }
  insert(key: K, value: V, overwrite?: boolean): boolean {
    var i = this.indexOf(key, -1);
    if (i < 0) {
      this.a.splice(~i, 0, [key, value]);
      return true;
    }
    if (overwrite !== false)
      this.a[i] = [key, value];
    return false;
  }
  insertIfAbsent(key: K, value: V): boolean {
    return this.insert(key, value, false);
  }
  minKey(): K | undefined { return this.a.length ? this.a[0][0] : undefined; }
  maxKey(): K | undefined { return this.a.length ? this.a[this.a.length-1][0] : undefined; }
  forEachPair<R = number>(callback: PairCallback<K,V,R>, initialCounter?: number): R | number {
    var counter = initialCounter || 0;
    for (var pair of this.a) {
      var result = callback(pair[0], pair[1], counter++);
      if (result !== undefined && result.break !== undefined)
        return result.break;
    }
    return counter;
  }
  toArray(): [K,V][] { return this.a.slice(); }

  indexOf(key: K, failXor: number): number {
    var lo = 0, hi = this.a.length, mid = hi >> 1;
    while(lo < hi) {
      var c = this.cmp(this.a[mid][0], key);
      if (c < 0)
        lo = mid + 1;
      else if (c > 0) // keys[mid] > key
        hi = mid;
      else if (c === 0)
        return mid;
      else
        throw new Error("Problem: compare failed");
      mid = (lo + hi) >> 1;
    }
    return mid ^ failXor;
  }
}
