import { InvariantViolation, TruncatedStreamError } from '@daily-puzzles/shared';
import { BitReader, hexToBits } from './bits';
import {
  LITERAL_TYPE_ID,
  OPERATOR_KINDS,
  type LengthSpec,
  type Packet
} from './types';

export type Decoded = { packet: Packet; consumed: number };

function readLiteral(r: BitReader): bigint {
  let value = 0n;
  let more = true;
  while (more) {
    more = r.readFlag();
    value = (value << 4n) | r.readBigBits(4);
  }
  return value;
}

function readLengthSpec(r: BitReader): LengthSpec {
  return r.readFlag()
    ? { mode: 'count', count: r.readBits(11) }
    : { mode: 'bits', length: r.readBits(15) };
}

function readChildren(r: BitReader, spec: LengthSpec): Packet[] {
  const children: Packet[] = [];
  if (spec.mode === 'count') {
    for (let i = 0; i < spec.count; i++) children.push(readPacket(r));
    return children;
  }
  // Children tile the region; a tail too short for a packet is padding.
  const region = r.take(spec.length);
  while (region.remaining > 0) {
    const child = readTrailingPacket(region);
    if (!child) break;
    children.push(child);
  }
  return children;
}

function readTrailingPacket(r: BitReader): Packet | null {
  try {
    return readPacket(r);
  } catch (e) {
    if (e instanceof TruncatedStreamError) return null;
    throw e;
  }
}

export function readPacket(r: BitReader): Packet {
  const version = r.readBits(3);
  const typeId = r.readBits(3);
  if (typeId === LITERAL_TYPE_ID) {
    return { version, body: { type: 'literal', value: readLiteral(r) } };
  }
  const kind = OPERATOR_KINDS[typeId];
  if (!kind) throw new InvariantViolation(`no operator for type id ${typeId}`);
  const children = readChildren(r, readLengthSpec(r));
  return { version, body: { type: 'operator', kind, children } };
}

// Trailing bits after the outermost packet are left unread.
export function decode(bits: string): Decoded {
  const r = BitReader.from(bits);
  const packet = readPacket(r);
  return { packet, consumed: r.position };
}

export function decodeHex(hex: string): Decoded {
  return decode(hexToBits(hex));
}
