import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import {
  AppError,
  ERR,
  InvariantViolation,
  MalformedInputError,
  TruncatedStreamError,
  describeError,
  isAppError
} from '../index';

describe('error taxonomy', () => {
  it('gives each error its code and exit code', () => {
    const malformed = new MalformedInputError('bad row');
    assert.equal(malformed.code, ERR.MALFORMED_INPUT);
    assert.equal(malformed.exitCode, 1);

    const truncated = new TruncatedStreamError(15, 4);
    assert.equal(truncated.code, ERR.TRUNCATED_STREAM);
    assert.equal(truncated.message, 'wanted 15 bits, 4 left');

    const broken = new InvariantViolation('no path');
    assert.equal(broken.code, ERR.INVARIANT);
    assert.equal(broken.exitCode, 70);
  });

  it('keeps the subclass chain intact', () => {
    const e = new MalformedInputError('x');
    assert.ok(e instanceof AppError);
    assert.ok(e instanceof Error);
    assert.equal(isAppError(e), true);
    assert.equal(isAppError(new Error('x')), false);
  });
});

describe('describeError', () => {
  it('formats app errors with name and code', () => {
    assert.equal(describeError(new MalformedInputError('bad hex')), 'MalformedInputError(2001): bad hex');
    assert.equal(describeError(new AppError(42, 'custom')), 'AppError(42): custom');
  });

  it('falls back for other values', () => {
    assert.equal(describeError(new TypeError('nope')), 'TypeError: nope');
    assert.equal(describeError('plain'), 'plain');
  });
});
