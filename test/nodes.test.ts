import OrderedIndex from '../ordered-index';
import { BNode, BNodeInternal, type IndexNodeHost } from '../internal/nodes';

function host(degree: number): IndexNodeHost<number> {
  return {
    _compare: (a, b) => a - b,
    _size: 0,
    _degree: degree,
    maxKeysPerNode: 2 * degree - 1,
    minKeysPerNode: degree - 1,
  };
}

function leaf(keys: number[]) {
  return new BNode<number, string>(keys, keys.map(k => `v${k}`));
}

function indexWithRoot(degree: number, root: BNode<number, string>, size: number) {
  const index = new OrderedIndex<number, string>(degree);
  index._root = root;
  index._size = size;
  return index;
}

describe('indexOf', () => {
  const node = leaf([10, 20, 30]);
  const cmp = (a: number, b: number) => a - b;

  test('returns the index of a match', () => {
    expect(node.indexOf(20, -1, cmp)).toBe(1);
  });

  test('returns the complement of the insertion index when not found', () => {
    expect(node.indexOf(5, -1, cmp)).toBe(~0);
    expect(node.indexOf(25, -1, cmp)).toBe(~2);
    expect(node.indexOf(35, -1, cmp)).toBe(~3);
    expect(node.indexOf(25, 0, cmp)).toBe(2);
  });

  test('throws when the comparator returns NaN', () => {
    expect(() => node.indexOf(NaN, -1, cmp)).toThrow('OrderedIndex: NaN was used as a key');
  });
});

describe('splitOffRightSide', () => {
  test('a full leaf of degree 3 keeps two keys and hands two to its sibling', () => {
    const node = leaf([10, 20, 30, 40, 50]);
    const { key, value, right } = node.splitOffRightSide(3);
    expect(key).toBe(30);
    expect(value).toBe('v30');
    expect(node.keys).toEqual([10, 20]);
    expect(node.values).toEqual(['v10', 'v20']);
    expect(right.keys).toEqual([40, 50]);
    expect(right.values).toEqual(['v40', 'v50']);
    expect(right.isLeaf).toBe(true);
  });

  test('a full internal node of degree 2 splits its four children two and two', () => {
    const children = [leaf([5]), leaf([15]), leaf([25]), leaf([35])];
    const node = new BNodeInternal<number, string>(children.slice(), [10, 20, 30], ['v10', 'v20', 'v30']);
    const { key, value, right } = node.splitOffRightSide(2);
    expect(key).toBe(20);
    expect(value).toBe('v20');
    expect(node.keys).toEqual([10]);
    expect(node.children).toEqual([children[0], children[1]]);
    expect(right).toBeInstanceOf(BNodeInternal);
    expect(right.isLeaf).toBe(false);
    expect(right.keys).toEqual([30]);
    if (right instanceof BNodeInternal) {
      expect(right.children[0]).toBe(children[2]);
      expect(right.children[1]).toBe(children[3]);
      expect(right.children.length).toBe(right.keys.length + 1);
    }
  });
});

describe('splitChild', () => {
  test('splits the only child of a new root', () => {
    const parent = new BNodeInternal<number, string>([leaf([1, 2, 3])]);
    parent.splitChild(0, host(2));
    expect(parent.keys).toEqual([2]);
    expect(parent.values).toEqual(['v2']);
    expect(parent.children.map(c => c.keys)).toEqual([[1], [3]]);
  });

  test('places the median and the sibling right after the split child', () => {
    const parent = new BNodeInternal<number, string>([leaf([1, 2]), leaf([11, 12, 13])], [10], ['v10']);
    parent.splitChild(1, host(2));
    expect(parent.keys).toEqual([10, 12]);
    expect(parent.values).toEqual(['v10', 'v12']);
    expect(parent.children.map(c => c.keys)).toEqual([[1, 2], [11], [13]]);
  });
});

describe('checkValid', () => {
  test('accepts a well-formed tree', () => {
    const root = new BNodeInternal<number, string>([leaf([1, 2]), leaf([11, 12])], [10], ['v10']);
    indexWithRoot(3, root, 5).checkValid();
  });

  test('reports unsorted keys', () => {
    const index = indexWithRoot(3, leaf([3, 1]), 2);
    expect(() => index.checkValid()).toThrow('sort violation at depth 0');
  });

  test('reports a wrong number of children', () => {
    const root = new BNodeInternal<number, string>([leaf([1, 2])], [10], ['v10']);
    const index = indexWithRoot(3, root, 3);
    expect(() => index.checkValid()).toThrow('keys/children length mismatch at depth 0');
  });

  test('reports keys outside the range of their parent', () => {
    const root = new BNodeInternal<number, string>([leaf([1, 2]), leaf([5, 11])], [10], ['v10']);
    const index = indexWithRoot(3, root, 5);
    expect(() => index.checkValid()).toThrow('key 5 is not above lower bound 10');
  });

  test('reports nodes with too few keys', () => {
    const root = new BNodeInternal<number, string>([leaf([1]), leaf([11, 12])], [10], ['v10']);
    const index = indexWithRoot(3, root, 4);
    expect(() => index.checkValid()).toThrow('too few keys ( 1 ) at depth 1');
  });

  test('reports nodes with too many keys', () => {
    const index = indexWithRoot(2, leaf([1, 2, 3, 4]), 4);
    expect(() => index.checkValid()).toThrow('too many keys ( 4 ) at depth 0');
  });

  test('reports leaves at different depths', () => {
    const deep = new BNodeInternal<number, string>([leaf([15]), leaf([25])], [20], ['v20']);
    const root = new BNodeInternal<number, string>([leaf([5]), deep], [10], ['v10']);
    const index = indexWithRoot(2, root, 5);
    expect(() => index.checkValid()).toThrow('leaf at depth 2 but leaves belong at depth 1');
  });

  test('reports a stored size that does not match', () => {
    const index = indexWithRoot(2, leaf([1, 2]), 3);
    expect(() => index.checkValid()).toThrow('size mismatch: counted 2 but stored 3');
  });
});
