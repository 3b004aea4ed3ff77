export type OperatorKind =
  | 'sum'
  | 'product'
  | 'minimum'
  | 'maximum'
  | 'greaterThan'
  | 'lessThan'
  | 'equalTo';

export type PacketBody =
  | { type: 'literal'; value: bigint }
  | { type: 'operator'; kind: OperatorKind; children: Packet[] };

export type Packet = {
  version: number; // 3 bits
  body: PacketBody;
};

// How an operator's children end; read while decoding, never stored.
export type LengthSpec = { mode: 'bits'; length: number } | { mode: 'count'; count: number };

export const LITERAL_TYPE_ID = 4;

export const OPERATOR_KINDS: Readonly<Record<number, OperatorKind>> = {
  0: 'sum',
  1: 'product',
  2: 'minimum',
  3: 'maximum',
  5: 'greaterThan',
  6: 'lessThan',
  7: 'equalTo'
};
