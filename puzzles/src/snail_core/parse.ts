import { MalformedInputError } from '@daily-puzzles/shared';
import { type SnailNumber, leaf, pair } from './types';

class Cursor {
  pos = 0;

  constructor(readonly text: string) {}

  skipSpace(): void {
    while (this.pos < this.text.length && /\s/.test(this.text[this.pos])) this.pos++;
  }

  peek(): string | undefined {
    this.skipSpace();
    return this.text[this.pos];
  }

  expect(ch: string): void {
    const got = this.peek();
    if (got !== ch) {
      throw new MalformedInputError(
        `expected '${ch}' at ${this.pos}, found ${got === undefined ? 'end of input' : `'${got}'`}`
      );
    }
    this.pos++;
  }
}

function element(c: Cursor): SnailNumber {
  const ch = c.peek();
  if (ch === '[') {
    c.pos++;
    const left = element(c);
    c.expect(',');
    const right = element(c);
    c.expect(']');
    return pair(left, right);
  }
  const m = /^\d+/.exec(c.text.slice(c.pos));
  if (!m) {
    throw new MalformedInputError(
      `expected a number or '[' at ${c.pos}, found ${ch === undefined ? 'end of input' : `'${ch}'`}`
    );
  }
  c.pos += m[0].length;
  return leaf(Number(m[0]));
}

// `[[1,2],[3, 4]]`; the top level must be a pair.
export function parseSnailNumber(text: string): SnailNumber {
  const c = new Cursor(text);
  if (c.peek() !== '[') throw new MalformedInputError(`snail number must start with '[': ${text}`);
  const n = element(c);
  if (c.peek() !== undefined) throw new MalformedInputError(`trailing input at ${c.pos}: ${text}`);
  return n;
}

export function parseSnailList(text: string): SnailNumber[] {
  return text
    .split(/\r?\n/)
    .filter((line) => line.trim() !== '')
    .map(parseSnailNumber);
}
