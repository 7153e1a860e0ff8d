import { SequenceError, ErrorCode } from '../lib/errors.js';
import { debug } from '../lib/utils/debug.js';
import type { LineSink } from './types.js';

/**
 * Write each element's decimal text and a newline to the sink, first to last.
 *
 * A synchronous throw from the sink is rethrown as OUTPUT_STREAM_FAULT; nothing is retried.
 * Asynchronous stream errors (EPIPE on a closed pipe) are left to the runtime.
 */
export function printSequence(sequence: readonly number[], sink: LineSink): void {
  for (const value of sequence.values()) {
    try {
      sink.write(`${value.toString(10)}\n`);
    } catch (err) {
      throw new SequenceError(
        ErrorCode.OUTPUT_STREAM_FAULT,
        `Failed to write to output: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }
  debug('sequence:print', `wrote ${sequence.length} lines`);
}
