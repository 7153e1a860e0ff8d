import { buildSequence, assertSequence } from './builder.js';
import { printSequence } from './printer.js';
import type { IntegerSequence, LineSink } from './types.js';

export { buildSequence, assertSequence } from './builder.js';
export { printSequence } from './printer.js';
export { SEQUENCE_LIMIT, integerSequenceSchema } from './types.js';
export type { IntegerSequence, LineSink } from './types.js';

/** Build, validate and print the sequence. Holds no state between calls. */
export function runSequence(sink: LineSink): IntegerSequence {
  const sequence = assertSequence(buildSequence());
  printSequence(sequence, sink);
  return sequence;
}
