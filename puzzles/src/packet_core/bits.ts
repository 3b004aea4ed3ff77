import { MalformedInputError, TruncatedStreamError } from '@daily-puzzles/shared';

// Four bits per hex digit, most significant first.
export function hexToBits(hex: string): string {
  const clean = hex.trim();
  if (!clean) throw new MalformedInputError('empty hex input');
  let out = '';
  for (let i = 0; i < clean.length; i++) {
    const d = parseInt(clean[i], 16);
    if (Number.isNaN(d)) throw new MalformedInputError(`bad hex digit '${clean[i]}' at ${i}`);
    out += d.toString(2).padStart(4, '0');
  }
  return out;
}

export class BitReader {
  // Regions from take() share the already-checked string.
  private constructor(private bits: string, private pos: number, private end: number) {}

  static from(bits: string): BitReader {
    if (!/^[01]*$/.test(bits)) throw new MalformedInputError('bit string may only contain 0 and 1');
    return new BitReader(bits, 0, bits.length);
  }

  get position(): number {
    return this.pos;
  }

  get remaining(): number {
    return this.end - this.pos;
  }

  private advance(n: number): string {
    if (n > this.remaining) throw new TruncatedStreamError(n, this.remaining);
    const s = this.bits.slice(this.pos, this.pos + n);
    this.pos += n;
    return s;
  }

  // Fields here are at most 15 bits wide.
  readBits(n: number): number {
    return n === 0 ? 0 : parseInt(this.advance(n), 2);
  }

  readBigBits(n: number): bigint {
    return n === 0 ? 0n : BigInt('0b' + this.advance(n));
  }

  readFlag(): boolean {
    return this.advance(1) === '1';
  }

  // Splits off the next `n` bits as their own reader and skips past them.
  take(n: number): BitReader {
    const start = this.pos;
    this.advance(n);
    return new BitReader(this.bits, start, start + n);
  }
}
