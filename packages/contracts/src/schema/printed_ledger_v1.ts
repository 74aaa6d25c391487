import { z } from "zod";

/**
 * PrintedLedgerV1: which boxes already have a printed label.
 *
 * File shape: `{ "<hole>": ["<box name>", ...] }`.
 */
export const PrintedLedgerV1Z = z.record(z.string().min(1), z.array(z.string()));

export type PrintedLedgerV1 = z.infer<typeof PrintedLedgerV1Z>;

export function parsePrintedLedgerV1(input: unknown): PrintedLedgerV1 {
  return PrintedLedgerV1Z.parse(input);
}
