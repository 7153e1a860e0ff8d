import { z } from 'zod';

/** Exclusive upper bound of the build loop */
export const SEQUENCE_LIMIT = 3;

/** Ordered, insertion-ordered list of integers */
export type IntegerSequence = number[];

/** Anything that accepts text chunks; `process.stdout` in production */
export interface LineSink {
  write(chunk: string): unknown;
}

/**
 * Shape of a fully built sequence: exactly SEQUENCE_LIMIT integers,
 * each equal to its position.
 */
export const integerSequenceSchema = z
  .array(z.number().int())
  .length(SEQUENCE_LIMIT)
  .refine((values) => values.every((value, index) => value === index), {
    message: 'element at position i must equal i',
  });
