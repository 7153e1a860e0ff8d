/** Error categories for seqprint */
export const ErrorCode = {
  // Sequence errors
  SEQUENCE_INVALID: 'SEQUENCE_INVALID',

  // Output errors
  OUTPUT_STREAM_FAULT: 'OUTPUT_STREAM_FAULT',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/** Sequence error with code and optional remediation hint */
export class SequenceError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly hint?: string,
  ) {
    super(message);
    this.name = 'SequenceError';
  }
}
