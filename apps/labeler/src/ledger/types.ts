import type { PrintedLedgerV1 } from "@coretag/contracts";

/**
 * Record of boxes whose labels were already printed.
 *
 * markPrinted persists immediately, so a run that stops halfway does not
 * reprint the boxes it finished.
 */
export interface PrintedLedger {
  has(hole: string, box: string): boolean;
  markPrinted(hole: string, box: string): void;
  snapshot(): PrintedLedgerV1;
  close(): void;
}

export type PrintedLedgerKind = "json" | "sqlite";
