import { Data } from 'effect';

/** Input uses a path form that is deliberately unsupported (long UNC `\\?\`). */
export class UnsupportedPathError extends Data.TaggedError('UnsupportedPathError')<{
  readonly message: string;
  readonly path: string;
}> {}

/** Caller-supplied role hints disagree with each other or with the text. */
export class ContradictionError extends Data.TaggedError('ContradictionError')<{
  readonly message: string;
  readonly node: string;
}> {}

/** A node is longer than the limit and truncation was not requested. */
export class LengthExceededError extends Data.TaggedError('LengthExceededError')<{
  readonly message: string;
  readonly node: string;
  readonly length: number;
}> {}

export type PathSanitizeError = UnsupportedPathError | ContradictionError | LengthExceededError;

export function isPathSanitizeError(u: unknown): u is PathSanitizeError {
  return (
    u instanceof UnsupportedPathError ||
    u instanceof ContradictionError ||
    u instanceof LengthExceededError
  );
}
