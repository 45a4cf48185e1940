import type { BreakResult, Comparator, PairCallback } from '../interfaces';
import { check } from './assert';

type index = number;

/** @internal */
export interface IndexNodeHost<K> {
  _compare: Comparator<K>;
  _size: number;
  _degree: number;
  readonly maxKeysPerNode: number;
  readonly minKeysPerNode: number;
}

/** What a full node hands to its parent when it splits. */
export interface SplitResult<K, V> {
  key: K;
  value: V;
  right: BNode<K, V>;
}

/** Leaf node / base class. **************************************************/
export class BNode<K,V> {
  keys: K[];
  // values[i] belongs to keys[i], in leaves and internal nodes alike.
  values: V[];

  constructor(keys: K[] = [], values: V[] = []) {
    this.keys = keys;
    this.values = values;
  }

  get isLeaf(): boolean { return true; }

  ///////////////////////////////////////////////////////////////////////////
  // Shared methods /////////////////////////////////////////////////////////

  // If key not found, returns i^failXor where i is the insertion index.
  // Callers that don't care whether there was a match will set failXor=0.
  indexOf(key: K, failXor: number, cmp: Comparator<K>): index {
    const keys = this.keys;
    var lo = 0, hi = keys.length, mid = hi >> 1;
    while (lo < hi) {
      var c = cmp(keys[mid], key);
      if (c < 0)
        lo = mid + 1;
      else if (c > 0) // key < keys[mid]
        hi = mid;
      else if (c === 0)
        return mid;
      else // c is NaN: the comparator does not order these keys
        throw new Error("OrderedIndex: NaN was used as a key");
      mid = (lo + hi) >> 1;
    }
    return mid ^ failXor;
  }

  /** Stores `value` at index i unless overwrite is false. Always returns false. */
  protected replaceAt(i: index, key: K, value: V, overwrite: boolean|undefined): false {
    if (overwrite !== false) {
      // usually a no-op, but the new key may carry data outside its sort order
      this.keys[i] = key;
      this.values[i] = value;
    }
    return false;
  }

  protected checkKeys(depth: number, tree: IndexNodeHost<K>, low: K|undefined, high: K|undefined) {
    var keys = this.keys, kL = keys.length, cmp = tree._compare;
    check(kL === this.values.length, "keys/values length mismatch at depth", depth, "lengths", kL, this.values.length);
    check(depth === 0 || kL >= tree.minKeysPerNode, "too few keys (", kL, ") at depth", depth);
    check(kL <= tree.maxKeysPerNode, "too many keys (", kL, ") at depth", depth);
    for (var i = 1; i < kL; i++)
      if (!(cmp(keys[i-1], keys[i]) < 0))
        check(false, "sort violation at depth", depth, "index", i, "keys", keys[i-1], keys[i]);
    if (kL > 0) {
      if (low !== undefined && !(cmp(low, keys[0]) < 0))
        check(false, "key", keys[0], "is not above lower bound", low, "at depth", depth);
      if (high !== undefined && !(cmp(keys[kL-1], high) < 0))
        check(false, "key", keys[kL-1], "is not below upper bound", high, "at depth", depth);
    }
  }

  /////////////////////////////////////////////////////////////////////////////
  // Leaf Node: misc //////////////////////////////////////////////////////////

  minKey(): K | undefined {
    return this.keys[0];
  }

  maxKey(): K | undefined {
    return this.keys[this.keys.length-1];
  }

  get<D>(key: K, defaultValue: D, tree: IndexNodeHost<K>): V|D {
    var i = this.indexOf(key, -1, tree._compare);
    return i < 0 ? defaultValue : this.values[i];
  }

  /**
   * Checks this subtree and returns the number of pairs in it.
   * `low` and `high` are the keys that bracket this node in its parent
   * (undefined at the edges of the tree).
   */
  checkValid(depth: number, leafDepth: number, tree: IndexNodeHost<K>, low: K|undefined, high: K|undefined): number {
    this.checkKeys(depth, tree, low, high);
    check(depth === leafDepth, "leaf at depth", depth, "but leaves belong at depth", leafDepth);
    return this.keys.length;
  }

  forEachPair<R>(onFound: PairCallback<K,V,R>, count: number): BreakResult<R>|number {
    var keys = this.keys, values = this.values;
    for (var i = 0; i < keys.length; i++) {
      var result = onFound(keys[i], values[i], count++);
      if (result !== undefined && result.break !== undefined)
        return { break: result.break };
    }
    return count;
  }

  /////////////////////////////////////////////////////////////////////////////
  // Leaf Node: set & node splitting //////////////////////////////////////////

  /**
   * Adds or overwrites a pair. The caller guarantees this node is not full.
   * @returns true if a new key was added.
   */
  set(key: K, value: V, overwrite: boolean|undefined, tree: IndexNodeHost<K>): boolean {
    var i = this.indexOf(key, -1, tree._compare);
    if (i >= 0)
      return this.replaceAt(i, key, value, overwrite);
    i = ~i;
    this.keys.splice(i, 0, key);
    this.values.splice(i, 0, value);
    tree._size++;
    return true;
  }

  /**
   * Splits a full node (2*degree-1 keys). Keys [0, degree-1) stay here,
   * the median at degree-1 is returned for the parent and the rest move
   * to a new right sibling.
   */
  splitOffRightSide(degree: number): SplitResult<K,V> {
    // Reminder: parent node must insert the median and the new sibling
    var [key, ...keys] = this.keys.splice(degree - 1);
    var [value, ...values] = this.values.splice(degree - 1);
    return { key, value, right: new BNode<K,V>(keys, values) };
  }
}

/** Internal node (non-leaf node) ********************************************/
export class BNodeInternal<K,V> extends BNode<K,V> {
  // children.length === keys.length + 1; children[i] holds the keys
  // between keys[i-1] and keys[i].
  children: BNode<K,V>[];

  constructor(children: BNode<K,V>[], keys: K[] = [], values: V[] = []) {
    super(keys, values);
    this.children = children;
  }

  get isLeaf(): boolean { return false; }

  minKey(): K | undefined {
    return this.children[0].minKey();
  }

  maxKey(): K | undefined {
    return this.children[this.children.length-1].maxKey();
  }

  get<D>(key: K, defaultValue: D, tree: IndexNodeHost<K>): V|D {
    var i = this.indexOf(key, -1, tree._compare);
    return i >= 0 ? this.values[i] : this.children[~i].get(key, defaultValue, tree);
  }

  checkValid(depth: number, leafDepth: number, tree: IndexNodeHost<K>, low: K|undefined, high: K|undefined): number {
    var kL = this.keys.length, cL = this.children.length;
    check(cL === kL + 1, "keys/children length mismatch at depth", depth, "lengths", kL, cL);
    check(kL > 0, "internal node has no keys at depth", depth);
    this.checkKeys(depth, tree, low, high);
    var size = kL, k = this.keys, c = this.children;
    for (var i = 0; i < cL; i++)
      size += c[i].checkValid(depth + 1, leafDepth, tree, i === 0 ? low : k[i-1], i === kL ? high : k[i]);
    return size;
  }

  forEachPair<R>(onFound: PairCallback<K,V,R>, count: number): BreakResult<R>|number {
    var keys = this.keys, values = this.values, children = this.children;
    for (var i = 0; i < children.length; i++) {
      var result = children[i].forEachPair(onFound, count);
      if (typeof result !== 'number')
        return result;
      count = result;
      if (i < keys.length) {
        var found = onFound(keys[i], values[i], count++);
        if (found !== undefined && found.break !== undefined)
          return { break: found.break };
      }
    }
    return count;
  }

  /////////////////////////////////////////////////////////////////////////////
  // Internal Node: set & node splitting //////////////////////////////////////

  set(key: K, value: V, overwrite: boolean|undefined, tree: IndexNodeHost<K>): boolean {
    var cmp = tree._compare;
    var i = this.indexOf(key, -1, cmp);
    if (i >= 0)
      return this.replaceAt(i, key, value, overwrite);
    i = ~i;
    if (this.children[i].keys.length >= tree.maxKeysPerNode) {
      // Split on the way down so that the child always has room. This node
      // has room for the median because our parent did the same for us.
      this.splitChild(i, tree);
      var c = cmp(key, this.keys[i]);
      if (c === 0)
        return this.replaceAt(i, key, value, overwrite);
      if (c > 0)
        i++;
    }
    return this.children[i].set(key, value, overwrite, tree);
  }

  /** Splits the full child at index i, promoting its median into this node. */
  splitChild(i: index, tree: IndexNodeHost<K>) {
    var { key, value, right } = this.children[i].splitOffRightSide(tree._degree);
    this.keys.splice(i, 0, key);
    this.values.splice(i, 0, value);
    this.children.splice(i + 1, 0, right);
  }

  /** Like BNode.splitOffRightSide; children [0, degree) stay, [degree, 2*degree) move. */
  splitOffRightSide(degree: number): SplitResult<K,V> {
    var [key, ...keys] = this.keys.splice(degree - 1);
    var [value, ...values] = this.values.splice(degree - 1);
    return { key, value, right: new BNodeInternal<K,V>(this.children.splice(degree), keys, values) };
  }
}
