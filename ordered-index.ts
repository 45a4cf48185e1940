// B+ tree by David Piepgrass. License: MIT
import { BNode, BNodeInternal, type IndexNodeHost } from './internal/nodes';
import { check } from './internal/assert';
import { ConfigurationError } from './errors';
import type { Comparator, IIndex, PairCallback } from './interfaces';

export type {
  Comparator, BreakResult, PairCallback, IIndexSource, IIndexSink, IIndex
} from './interfaces';
export { ConfigurationError } from './errors';

/** Degree used when none is given: non-root nodes then hold 15 to 31 keys. */
export const DefaultDegree = 16;

/**
 * Types that OrderedIndex orders by default
 */
export type DefaultComparable = number | string | bigint | boolean | Date |
               { valueOf: () => number | string | bigint | boolean };

/**
 * Compares DefaultComparables to form a total order.
 *
 * Numbers compare numerically and return NaN if either side is NaN, which
 * OrderedIndex treats as "not a usable key". Objects are compared by their
 * valueOf(), so two Dates with the same time are equal. Values of different
 * kinds are ordered by kind name: bigint < boolean < number < string.
 */
export function defaultComparator(a: unknown, b: unknown): number {
  // Special case numbers first for performance.
  if (typeof a === 'number' && typeof b === 'number')
    return a - b;

  var pa = primitiveOf(a), pb = primitiveOf(b);
  var ta = typeof pa, tb = typeof pb;
  if (ta !== tb)
    return ta < tb ? -1 : 1;
  if (typeof pa === 'string' && typeof pb === 'string')
    return pa < pb ? -1 : pa > pb ? 1 : 0;
  if (typeof pa === 'bigint' && typeof pb === 'bigint')
    return pa < pb ? -1 : pa > pb ? 1 : 0;
  return Number(pa) - Number(pb);
}

function primitiveOf(x: unknown): number | string | bigint | boolean {
  if (typeof x === 'object' && x !== null)
    x = x.valueOf();
  if (typeof x === 'number' || typeof x === 'string' || typeof x === 'bigint' || typeof x === 'boolean')
    return x;
  throw new TypeError(`OrderedIndex: ${String(x)} has no default ordering; pass a comparator`);
}

const NotFound = Symbol('NotFound');

/**
 * An in-memory B-tree mapping unique keys to values, kept in key order.
 *
 * Every node other than the root holds between `degree-1` and `2*degree-1`
 * keys, and values live beside their keys in internal nodes as well as in
 * leaves. Insertion splits full nodes on the way down, so the tree only
 * grows at the root and all leaves stay at the same depth.
 *
 * @example
 *     var index = new OrderedIndex<number, string>(3);
 *     index.insert(10, "Record 10");
 *     index.insert(15, "Record 15");
 *     index.search(10); // "Record 10"
 *     index.search(99); // undefined
 *
 * Keys are compared with `defaultComparator` unless a comparator is given.
 * Inserting a key that is already present replaces its value (pass
 * `overwrite = false`, or use insertIfAbsent, to keep the old one).
 */
export default class OrderedIndex<K = number, V = unknown> implements IIndex<K,V>, IndexNodeHost<K>
{
  /** @internal */
  _root: BNode<K,V>;
  /** @internal */
  _size = 0;
  /** @internal */
  _degree: number;
  /** Returns a negative value if a < b, 0 if a === b and a positive value if a > b. */
  _compare: Comparator<K>;
  private _frozen = false;

  /**
   * Initializes an empty index whose root is a single empty leaf.
   * @param degree Minimum branching factor t: nodes hold at most 2t-1 keys
   *   and internal nodes at most 2t children. Must be an integer >= 2.
   * @param compare Custom function to compare keys. If not specified,
   *   defaultComparator is used.
   * @param entries Key-value pairs to insert, in order.
   * @throws ConfigurationError if degree is not an integer >= 2.
   */
  public constructor(degree: number = DefaultDegree, compare?: Comparator<K>, entries?: [K,V][]) {
    if (!Number.isInteger(degree) || degree < 2)
      throw new ConfigurationError(`OrderedIndex degree must be an integer >= 2 (got ${degree})`);
    this._degree = degree;
    this._compare = compare || defaultComparator;
    this._root = new BNode<K,V>();
    if (entries)
      this.insertPairs(entries);
  }

  /////////////////////////////////////////////////////////////////////////////
  // Lookup ///////////////////////////////////////////////////////////////////

  /** Gets the number of key-value pairs in the index. */
  get size(): number { return this._size; }
  /** Returns true iff the index contains no key-value pairs. */
  get isEmpty(): boolean { return this._size === 0; }

  /**
   * Finds a key and returns the associated value.
   * @returns the value, or undefined if the key is not present.
   * @description Computational complexity: O(height * log degree)
   */
  search(key: K): V | undefined {
    return this.get(key);
  }

  /**
   * Finds a key and returns the associated value.
   * @param defaultValue a value to return if the key was not found.
   */
  get(key: K, defaultValue?: V): V | undefined {
    if (!this.isOrderable(key))
      return defaultValue;
    return this._root.get(key, defaultValue, this);
  }

  /**
   * Returns true if the key exists in the index. Use search() when values
   * are never undefined; use has() to tell "undefined value" from "absent".
   */
  has(key: K): boolean {
    return this.isOrderable(key) && this._root.get(key, NotFound, this) !== NotFound;
  }

  /** Gets the lowest key in the index. Complexity: O(height) */
  minKey(): K | undefined { return this._root.minKey(); }

  /** Gets the highest key in the index. Complexity: O(height) */
  maxKey(): K | undefined { return this._root.maxKey(); }

  // A key that does not equal itself (such as NaN) has no place in the order.
  private isOrderable(key: K): boolean {
    return this._compare(key, key) === 0;
  }

  /////////////////////////////////////////////////////////////////////////////
  // Insertion ////////////////////////////////////////////////////////////////

  /**
   * Adds a key-value pair, or overwrites the value of an existing key.
   * @param overwrite Whether to overwrite an existing pair (default: true).
   *   If this is false and the key exists, the index is left unchanged.
   * @returns true if a new key was added.
   * @description A full root is split before descending, which is the only
   * way the height grows; a full child is split before it is entered.
   */
  insert(key: K, value: V, overwrite?: boolean): boolean {
    if (this._frozen)
      throw new Error("Attempted to modify a frozen OrderedIndex");
    if (!this.isOrderable(key))
      throw new Error("OrderedIndex: NaN was used as a key");
    if (this._root.keys.length >= this.maxKeysPerNode) {
      // Root node is full, so put a new root above it and split the old one.
      var root = new BNodeInternal<K,V>([this._root]);
      root.splitChild(0, this);
      this._root = root;
    }
    return this._root.set(key, value, overwrite, this);
  }

  /** Stores a key-value pair only if the key doesn't already exist.
   *  @returns true if a new key was added */
  insertIfAbsent(key: K, value: V): boolean {
    return this.insert(key, value, false);
  }

  /** Inserts each pair in order.
   *  @returns the number of keys that were not already present. */
  insertPairs(pairs: [K,V][], overwrite?: boolean): number {
    var added = 0;
    for (var i = 0; i < pairs.length; i++)
      if (this.insert(pairs[i][0], pairs[i][1], overwrite))
        added++;
    return added;
  }

  /////////////////////////////////////////////////////////////////////////////
  // Traversal ////////////////////////////////////////////////////////////////

  /** Runs a function for each key-value pair, in order from smallest to
   *  largest key. The callback can return {break:R} (where R is any value
   *  except undefined) to stop immediately and return R from forEachPair.
   * @param initialCounter This is the value of the third argument of
   *        `callback` the first time it is called. Default value: 0
   * @returns the number of pairs sent to the callback (plus initialCounter,
   *        if you provided one). If the callback returned {break:R} then
   *        the R value is returned instead. */
  forEachPair<R = number>(callback: PairCallback<K,V,R>, initialCounter?: number): R | number {
    var result = this._root.forEachPair(callback, initialCounter || 0);
    return typeof result === 'number' ? result : result.break;
  }

  /** Gets an array filled with the contents of the index, sorted by key */
  toArray(): [K,V][] {
    var results: [K,V][] = [];
    this.forEachPair((k, v) => { results.push([k, v]); });
    return results;
  }

  /** Gets an array of all keys, sorted */
  keysArray(): K[] {
    var results: K[] = [];
    this.forEachPair(k => { results.push(k); });
    return results;
  }

  /** Gets an array of all values, sorted by key */
  valuesArray(): V[] {
    var results: V[] = [];
    this.forEachPair((k, v) => { results.push(v); });
    return results;
  }

  /** Gets a string representing the index's data based on toArray(). */
  toString() {
    return this.toArray().toString();
  }

  /////////////////////////////////////////////////////////////////////////////
  // Additional methods ///////////////////////////////////////////////////////

  /** The minimum branching factor given to the constructor. */
  get degree(): number { return this._degree; }

  /** A node with this many keys is full and splits before taking another. */
  get maxKeysPerNode(): number { return 2 * this._degree - 1; }

  /** Every node except the root holds at least this many keys. */
  get minKeysPerNode(): number { return this._degree - 1; }

  /** Gets the number of node levels, counting the root: 1 while the root
   *  is a leaf (also when the index is empty). */
  get height(): number {
    var node: BNode<K,V> = this._root, height = 1;
    while (node instanceof BNodeInternal) {
      node = node.children[0];
      height++;
    }
    return height;
  }

  /** Makes the index read-only so that it is not accidentally modified.
   *  Lookups and traversal keep working; unfreeze() reverses the effect. */
  freeze() {
    this._frozen = true;
  }

  /** Ensures mutations are allowed, reversing the effect of freeze(). */
  unfreeze() {
    this._frozen = false;
  }

  /** Returns true if the index is frozen. */
  get isFrozen(): boolean {
    return this._frozen;
  }

  /** Scans the whole tree for broken invariants: unsorted keys, keys outside
   *  the range their parent allows, nodes with too few or too many keys,
   *  wrong child counts, leaves at different depths, or a stored size that
   *  does not match the number of pairs. Throws an Error describing the
   *  first problem found. Computational complexity: O(size). */
  checkValid() {
    var size = this._root.checkValid(0, this.height - 1, this, undefined, undefined);
    check(size === this._size, "size mismatch: counted", size, "but stored", this._size);
  }
}
