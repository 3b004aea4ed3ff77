import { MalformedInputError } from '@daily-puzzles/shared';
import { SnailArena } from './arena';
import { type SnailNumber, pair, snailEquals } from './types';

export function reduce(n: SnailNumber): SnailNumber {
  return SnailArena.fromTree(n).reduce().toTree();
}

export function combine(a: SnailNumber, b: SnailNumber): SnailNumber {
  return reduce(pair(a, b));
}

export function magnitude(n: SnailNumber): number {
  if (n.kind === 'leaf') return n.value;
  return 3 * magnitude(n.left) + 2 * magnitude(n.right);
}

export function countLeaves(n: SnailNumber): number {
  return n.kind === 'leaf' ? 1 : countLeaves(n.left) + countLeaves(n.right);
}

// Left fold: ((a + b) + c) + ...
export function sumAll(list: readonly SnailNumber[]): SnailNumber {
  if (!list.length) throw new MalformedInputError('no snail numbers to add');
  return list.slice(1).reduce((acc, next) => combine(acc, next), list[0]);
}

// Largest magnitude of `a + b` over ordered pairs of two different numbers.
export function maxPairMagnitude(list: readonly SnailNumber[]): number {
  if (list.length < 2) throw new MalformedInputError('need at least two snail numbers');
  let best: number | null = null;
  for (let i = 0; i < list.length; i++) {
    for (let j = 0; j < list.length; j++) {
      if (i === j || snailEquals(list[i], list[j])) continue;
      const m = magnitude(combine(list[i], list[j]));
      if (best === null || m > best) best = m;
    }
  }
  if (best === null) throw new MalformedInputError('need at least two different snail numbers');
  return best;
}
