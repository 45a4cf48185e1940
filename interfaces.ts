/** Orders two keys: negative if a < b, zero if they are equal, positive if a > b. */
export type Comparator<K> = (a: K, b: K) => number;

/** Returned by a walk that a callback stopped early with `{break: R}`. */
export type BreakResult<R> = { break: R };

/** Callback for in-order walks. Return `{break: R}` to stop early. */
export type PairCallback<K, V, R> = (k: K, v: V, counter: number) => { break?: R } | void;

/** Read-only interface of an ordered key-value index. */
export interface IIndexSource<K = number, V = unknown> {
  /** Returns the number of key-value pairs in the index. */
  readonly size: number;
  /** Returns the value stored for `key`, or undefined if there is none. */
  search(key: K): V | undefined;
  /** Returns the value stored for `key`, or `defaultValue` if there is none. */
  get(key: K, defaultValue?: V): V | undefined;
  /** Returns true if `key` is present, even when its value is undefined. */
  has(key: K): boolean;
  minKey(): K | undefined;
  maxKey(): K | undefined;
  /** Calls `callback` for every pair in ascending key order. */
  forEachPair<R = number>(callback: PairCallback<K, V, R>, initialCounter?: number): R | number;
  /** Returns all pairs in ascending key order. */
  toArray(): [K, V][];
}

/** Write interface of an ordered key-value index. Keys are unique. */
export interface IIndexSink<K = number, V = unknown> {
  /**
   * Adds a pair, or overwrites the value of an existing key unless
   * `overwrite` is false.
   * @returns true if a new key was added.
   */
  insert(key: K, value: V, overwrite?: boolean): boolean;
  /** Adds a pair only if the key is not already present. */
  insertIfAbsent(key: K, value: V): boolean;
}

/** An ordered key-value index supporting point lookup and insertion. */
export interface IIndex<K = number, V = unknown> extends IIndexSource<K, V>, IIndexSink<K, V> {}
