import { JsonPrintedLedger } from "./json_ledger";
import { SqlitePrintedLedger } from "./sqlite_ledger";
import type { PrintedLedger, PrintedLedgerKind } from "./types";

export * from "./types";
export { JsonPrintedLedger, SqlitePrintedLedger };

export function openPrintedLedger(kind: PrintedLedgerKind, filePath: string): PrintedLedger {
  return kind === "sqlite" ? new SqlitePrintedLedger(filePath) : new JsonPrintedLedger(filePath);
}
