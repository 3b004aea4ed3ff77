export class AppError extends Error {
  constructor(public code: number, message: string, public exitCode = 1) {
    super(message);
    this.name = 'AppError';
  }
}

export const ERR = {
  MALFORMED_INPUT: 2001,
  TRUNCATED_STREAM: 2002,
  INVARIANT: 2003
} as const;

// Structural parse failure; never retried.
export class MalformedInputError extends AppError {
  constructor(message: string) {
    super(ERR.MALFORMED_INPUT, message);
    this.name = 'MalformedInputError';
  }
}

export class TruncatedStreamError extends AppError {
  constructor(public wanted: number, public available: number) {
    super(ERR.TRUNCATED_STREAM, `wanted ${wanted} bits, ${available} left`);
    this.name = 'TruncatedStreamError';
  }
}

// A bug, not a bad input.
export class InvariantViolation extends AppError {
  constructor(message: string) {
    super(ERR.INVARIANT, message, 70);
    this.name = 'InvariantViolation';
  }
}

export const isAppError = (e: unknown): e is AppError => e instanceof AppError;

export function describeError(e: unknown): string {
  if (isAppError(e)) return `${e.name}(${e.code}): ${e.message}`;
  if (e instanceof Error) return `${e.name}: ${e.message}`;
  return String(e);
}
