/** Throws an Error built from `args` unless `fact` holds. */
export function check(fact: boolean, ...args: unknown[]): void {
  if (!fact) {
    args.unshift('OrderedIndex'); // at beginning of message
    throw new Error(args.join(' '));
  }
}
