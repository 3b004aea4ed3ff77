import { InvariantViolation } from '@daily-puzzles/shared';
import type { Packet } from './types';

const bit = (b: boolean): bigint => (b ? 1n : 0n);

// Empty minimum/maximum fall back to the u64 bounds.
export const U64_MAX = 18446744073709551615n;

export function evaluate(p: Packet): bigint {
  const { body } = p;
  if (body.type === 'literal') return body.value;
  const values = body.children.map(evaluate);

  switch (body.kind) {
    case 'sum':
      return values.reduce((a, b) => a + b, 0n);
    case 'product':
      return values.reduce((a, b) => a * b, 1n);
    case 'minimum':
      return values.reduce((a, b) => (b < a ? b : a), U64_MAX);
    case 'maximum':
      return values.reduce((a, b) => (b > a ? b : a), 0n);
    case 'greaterThan':
    case 'lessThan':
    case 'equalTo': {
      if (values.length !== 2) {
        throw new InvariantViolation(`${body.kind} packet needs 2 children, has ${values.length}`);
      }
      const [a, b] = values;
      if (body.kind === 'greaterThan') return bit(a > b);
      if (body.kind === 'lessThan') return bit(a < b);
      return bit(a === b);
    }
  }
}

// root first, then children left to right
export function* walkPackets(p: Packet): Generator<Packet> {
  yield p;
  if (p.body.type === 'operator') {
    for (const c of p.body.children) yield* walkPackets(c);
  }
}

export function versionSum(p: Packet): number {
  let total = 0;
  for (const q of walkPackets(p)) total += q.version;
  return total;
}

export function countPackets(p: Packet): number {
  return [...walkPackets(p)].length;
}

// (equalTo (sum 1 3) (product 2 2))
export function formatPacket(p: Packet): string {
  const { body } = p;
  if (body.type === 'literal') return body.value.toString();
  return `(${[body.kind, ...body.children.map(formatPacket)].join(' ')})`;
}
