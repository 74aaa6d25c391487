// Assignment Kernel - record construction errors
//
// A malformed box or tag record is fatal for that record. The kernel never
// repairs input; it raises a typed error and lets the caller decide.

/**
 * Raised when a Tag or Box cannot be built from its record.
 *
 * Message format: `INVALID_RECORD: <field> <reason> @ <context>`.
 */
export class InvalidRecordError extends Error {
  readonly code = "INVALID_RECORD" as const;

  constructor(
    readonly field: string,
    readonly reason: string,
    readonly context: string
  ) {
    super(`INVALID_RECORD: ${field} ${reason} @ ${context}`);
    this.name = "InvalidRecordError";
  }
}

export function isInvalidRecordError(err: unknown): err is InvalidRecordError {
  return err instanceof InvalidRecordError;
}
