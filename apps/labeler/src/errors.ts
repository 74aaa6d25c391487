// Labeler errors.
//
// Message format follows the kernel: `CODE: detail @ context`. The CLI prints
// the message after `FAIL:` and exits non-zero.

export type LabelerErrorCode =
  | "CONFIG_INVALID"
  | "INPUT_MISSING"
  | "INPUT_INVALID"
  | "UNSUPPORTED_LABEL_SIZE"
  | "LEDGER_INVALID"
  | "LABEL_COMPILE_FAILED"
  | "PRINT_FAILED";

export class LabelerError extends Error {
  constructor(
    readonly code: LabelerErrorCode,
    readonly detail: string,
    readonly context?: string
  ) {
    super(context ? `${code}: ${detail} @ ${context}` : `${code}: ${detail}`);
    this.name = "LabelerError";
  }
}

export class UnsupportedLabelSizeError extends LabelerError {
  constructor(
    readonly labelSize: string,
    supported: ReadonlyArray<string>
  ) {
    super("UNSUPPORTED_LABEL_SIZE", `"${labelSize}" (supported: ${supported.join(", ")})`, "label_size");
    this.name = "UnsupportedLabelSizeError";
  }
}

export function isLabelerError(err: unknown, code?: LabelerErrorCode): err is LabelerError {
  return err instanceof LabelerError && (code === undefined || err.code === code);
}
