import { InvalidRecordError } from "./errors";

/**
 * Depth as it arrives from ingestion: already numeric, or the raw cell text.
 */
export type DepthInput = number | string | null | undefined;

/**
 * Converts a depth field to metres.
 *
 * @param value - Raw depth value.
 * @param field - Field name used in the error (e.g. "starting_depth").
 * @param context - Human-friendly location string to aid debugging.
 */
export function parseDepth(value: DepthInput, field: string, context: string): number {
  if (value === null || value === undefined) {
    throw new InvalidRecordError(field, "is missing", context);
  }

  if (typeof value === "number") {
    if (!Number.isFinite(value)) throw new InvalidRecordError(field, `is not a finite number (${value})`, context);
    return value;
  }

  const s = value.trim();
  if (s.length === 0) throw new InvalidRecordError(field, "is empty", context);

  // Number("") and Number(" ") are 0, so emptiness is checked first.
  const n = Number(s);
  if (!Number.isFinite(n)) throw new InvalidRecordError(field, `is not a number ("${value}")`, context);
  return n;
}

/**
 * Formats metres with two decimals, as printed on labels and in QR payloads.
 *
 * Rounds the exact binary value; a true half-way value goes to the even
 * hundredth (12.125 -> "12.12"), where toFixed would round up.
 */
export function formatDepth(metres: number): string {
  // Only multiples of 1/8 with an odd numerator sit exactly half-way
  // between two hundredths.
  const eighths = metres * 8;
  if (Number.isInteger(eighths) && Math.abs(eighths % 2) === 1) {
    const below = Math.floor(metres * 100);
    const cents = below % 2 === 0 ? below : below + 1;
    return (cents / 100).toFixed(2);
  }
  return metres.toFixed(2);
}
