import { SequenceError, ErrorCode } from '../lib/errors.js';
import { debug } from '../lib/utils/debug.js';
import { SEQUENCE_LIMIT, integerSequenceSchema, type IntegerSequence } from './types.js';

/** Append 0 .. SEQUENCE_LIMIT - 1 to an empty sequence, in order */
export function buildSequence(): IntegerSequence {
  const sequence: IntegerSequence = [];
  for (let i = 0; i < SEQUENCE_LIMIT; i++) {
    sequence.push(i);
  }
  debug('sequence:build', `built ${sequence.length} elements`);
  return sequence;
}

/**
 * Check a value against the built-sequence invariant.
 * Throws SEQUENCE_INVALID listing the first zod issue.
 */
export function assertSequence(value: unknown): IntegerSequence {
  const result = integerSequenceSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at [${issue.path.join('.')}]` : '';
    throw new SequenceError(
      ErrorCode.SEQUENCE_INVALID,
      `Invalid sequence${where}: ${issue?.message ?? 'unknown issue'}`,
      `Expected exactly ${SEQUENCE_LIMIT} integers counting up from 0`,
    );
  }
  return result.data;
}
