import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { MalformedInputError } from '@daily-puzzles/shared';
import { parseSnailNumber } from '../parse';
import { combine, countLeaves, magnitude, maxPairMagnitude, reduce, sumAll } from '../reduce';
import { formatSnailNumber, snailEquals } from '../types';

const p = parseSnailNumber;

describe('combine', () => {
  it('reduces the sum of two numbers to a fixed point', () => {
    const sum = combine(p('[[[[4,3],4],4],[7,[[8,4],9]]]'), p('[1,1]'));
    assert.equal(formatSnailNumber(sum), '[[[[0,7],4],[[7,8],[6,0]]],[8,1]]');
    assert.equal(magnitude(sum), 1384);
  });

  it('handles chains of explosions and splits', () => {
    const sum = combine(
      p('[[[0,[4,5]],[0,0]],[[[4,5],[2,6]],[9,5]]]'),
      p('[7,[[[3,7],[4,3]],[[6,3],[8,8]]]]')
    );
    assert.equal(formatSnailNumber(sum), '[[[[4,0],[5,4]],[[7,7],[6,0]]],[[8,[7,7]],[[7,9],[5,0]]]]');
  });

  it('does not mutate its inputs', () => {
    const a = p('[[[[4,3],4],4],[7,[[8,4],9]]]');
    combine(a, p('[1,1]'));
    assert.equal(formatSnailNumber(a), '[[[[4,3],4],4],[7,[[8,4],9]]]');
  });
});

describe('reduce', () => {
  it('is idempotent', () => {
    for (const text of ['[[[[[4,3],4],4],[7,[[8,4],9]]],[1,1]]', '[[1,[15,2]],3]', '[1,2]']) {
      const once = reduce(p(text));
      assert.ok(snailEquals(reduce(once), once));
    }
  });

  it('splits then explodes as needed', () => {
    assert.equal(formatSnailNumber(reduce(p('[[1,[15,2]],3]'))), '[[1,[[7,8],2]],3]');
  });
});

describe('magnitude', () => {
  it('matches worked values', () => {
    assert.equal(magnitude(p('[9,1]')), 29);
    assert.equal(magnitude(p('[[9,1],[1,9]]')), 129);
  });

  it('is at least the number of leaves when every leaf is positive', () => {
    for (const text of ['[1,1]', '[[1,1],[1,1]]', '[[1,2],[[3,4],5]]']) {
      const n = p(text);
      assert.ok(magnitude(n) >= countLeaves(n), text);
    }
  });
});

describe('sumAll', () => {
  it('folds from the left', () => {
    const total = sumAll([p('[1,2]'), p('[3,4]'), p('[5,6]')]);
    assert.equal(formatSnailNumber(total), '[[[1,2],[3,4]],[5,6]]');
    assert.equal(magnitude(total), 219);
  });

  it('returns a lone number unchanged', () => {
    assert.equal(formatSnailNumber(sumAll([p('[1,2]')])), '[1,2]');
  });

  it('rejects an empty list', () => {
    assert.throws(() => sumAll([]), MalformedInputError);
  });
});

describe('maxPairMagnitude', () => {
  it('tries both orders', () => {
    assert.equal(maxPairMagnitude([p('[1,2]'), p('[3,4]')]), 65);
  });

  it('skips pairs of equal numbers', () => {
    assert.equal(maxPairMagnitude([p('[9,9]'), p('[9,9]'), p('[1,1]')]), 145);
  });

  it('rejects a list with no two different numbers', () => {
    assert.throws(() => maxPairMagnitude([p('[1,1]'), p('[1,1]')]), /two different snail numbers/);
  });

  it('rejects fewer than two numbers', () => {
    assert.throws(() => maxPairMagnitude([p('[1,1]')]), MalformedInputError);
  });
});
