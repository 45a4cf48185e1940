#!/usr/bin/env ts-node
import OrderedIndex from './ordered-index';
import SortedArray from './sorted-array';
import { RBTree } from 'bintrees';

type Log = (...args: unknown[]) => void;

class Timer {
  start = Date.now();
  ms() { return Date.now() - this.start; }
  restart() { var ms = this.ms(); this.start += ms; return ms; }
}

function randInt(max: number) { return Math.random() * max | 0; }

function swap(keys: number[], i: number, j: number) {
  var tmp = keys[i];
  keys[i] = keys[j];
  keys[j] = tmp;
}

function makeArray(size: number, randomOrder: boolean, spacing = 10) {
  var keys: number[] = [], i, n;
  for (i = 0, n = 0; i < size; i++, n += 1 + randInt(spacing))
    keys[i] = n;
  if (randomOrder)
    for (i = 0; i < size; i++)
      swap(keys, i, randInt(size));
  return keys;
}

function measure<T=void>(message: (t:T) => string, callback: () => T, minMillisec: number = 600, log: Log = console.log) {
  var timer = new Timer(), counter = 0, ms;
  var result: T;
  do {
    result = callback();
    counter++;
  } while ((ms = timer.ms()) < minMillisec);
  ms /= counter;
  log((Math.round(ms * 10) / 10) + "\t" + message(result));
  return result;
}

function fillIndex(keys: number[], degree: number) {
  let index = new OrderedIndex<number,number>(degree);
  for (let k of keys)
    index.insert(k, k * 10);
  return index;
}

console.log("Benchmark results (milliseconds with integer keys/values)");
console.log("---------------------------------------------------------");

console.log();
console.log("### Insertions at random locations: OrderedIndex vs the competition ###");

for (let size of [1000, 10000, 100000]) {
  console.log();
  var keys = makeArray(size, true);

  for (let degree of [4, 16, 64]) {
    measure(index => `Insert ${index.size} pairs in OrderedIndex (degree ${degree})`,
      () => fillIndex(keys, degree));
  }
  measure(tree => `Insert ${tree.size} keys in bintrees' RBTree`, () => {
    let tree = new RBTree<number>((a, b) => a - b);
    for (let k of keys)
      tree.insert(k);
    return tree;
  });
  if (size <= 10000) {
    measure(list => `Insert ${list.size} pairs in SortedArray`, () => {
      let list = new SortedArray<number,number>();
      for (let k of keys)
        list.insert(k, k * 10);
      return list;
    });
  }
}

console.log();
console.log("### Insertions in sorted order ###");

for (let size of [1000, 10000, 100000]) {
  console.log();
  var keys = makeArray(size, false);
  measure(index => `Insert ${index.size} sorted pairs in OrderedIndex (degree 16)`,
    () => fillIndex(keys, 16));
  measure(tree => `Insert ${tree.size} sorted keys in bintrees' RBTree`, () => {
    let tree = new RBTree<number>((a, b) => a - b);
    for (let k of keys)
      tree.insert(k);
    return tree;
  });
}

console.log();
console.log("### Lookups of every key ###");

for (let size of [1000, 10000, 100000]) {
  console.log();
  var keys = makeArray(size, true);
  for (let degree of [4, 16, 64]) {
    let index = fillIndex(keys, degree);
    measure(found => `Search ${found} keys in OrderedIndex (degree ${degree}, height ${index.height})`, () => {
      let found = 0;
      for (let k of keys)
        if (index.search(k) !== undefined)
          found++;
      return found;
    });
  }
  let tree = new RBTree<number>((a, b) => a - b);
  for (let k of keys)
    tree.insert(k);
  measure(found => `Search ${found} keys in bintrees' RBTree`, () => {
    let found = 0;
    for (let k of keys)
      if (tree.find(k) !== null)
        found++;
    return found;
  });
}
