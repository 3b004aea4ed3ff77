export type Leaf = { kind: 'leaf'; value: number };

export type Pair = { kind: 'pair'; left: SnailNumber; right: SnailNumber };

// A pair owns both children; trees never share nodes.
export type SnailNumber = Leaf | Pair;

export const leaf = (value: number): Leaf => ({ kind: 'leaf', value });

export const pair = (left: SnailNumber, right: SnailNumber): Pair => ({ kind: 'pair', left, right });

export function snailEquals(a: SnailNumber, b: SnailNumber): boolean {
  if (a.kind === 'leaf' || b.kind === 'leaf') {
    return a.kind === 'leaf' && b.kind === 'leaf' && a.value === b.value;
  }
  return snailEquals(a.left, b.left) && snailEquals(a.right, b.right);
}

export function formatSnailNumber(n: SnailNumber): string {
  if (n.kind === 'leaf') return String(n.value);
  return `[${formatSnailNumber(n.left)},${formatSnailNumber(n.right)}]`;
}
