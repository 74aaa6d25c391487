import fs from "node:fs";
import path from "node:path";

import { naturalSort } from "@coretag/assignment-kernel";
import { PrintedLedgerV1Z, type PrintedLedgerV1 } from "@coretag/contracts";

import { LabelerError } from "../errors";
import type { PrintedLedger } from "./types";

/**
 * JSON file ledger: `{ "<hole>": ["<box>", ...] }`, tab-indented.
 * Holes are written in code-point order, box names in natural order.
 */
export class JsonPrintedLedger implements PrintedLedger {
  private readonly printed = new Map<string, Set<string>>();

  constructor(readonly filePath: string) {
    const loaded = JsonPrintedLedger.load(filePath);
    for (const [hole, boxes] of Object.entries(loaded)) {
      this.printed.set(hole, new Set(boxes));
    }
  }

  private static load(filePath: string): PrintedLedgerV1 {
    if (!fs.existsSync(filePath)) return {};
    const text = fs.readFileSync(filePath, "utf8");
    if (text.trim().length === 0) return {};

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err: unknown) {
      throw new LabelerError("LEDGER_INVALID", `not valid JSON (${err instanceof Error ? err.message : String(err)})`, filePath);
    }
    const result = PrintedLedgerV1Z.safeParse(raw);
    if (!result.success) {
      throw new LabelerError("LEDGER_INVALID", "expected an object of hole -> box name list", filePath);
    }
    return result.data;
  }

  has(hole: string, box: string): boolean {
    return this.printed.get(hole)?.has(box) ?? false;
  }

  markPrinted(hole: string, box: string): void {
    const boxes = this.printed.get(hole) ?? new Set<string>();
    boxes.add(box);
    this.printed.set(hole, boxes);
    this.persist();
  }

  snapshot(): PrintedLedgerV1 {
    const out: PrintedLedgerV1 = {};
    for (const hole of [...this.printed.keys()].sort()) {
      out[hole] = naturalSort(this.printed.get(hole) ?? []);
    }
    return out;
  }

  close(): void {
    // Every mark is already on disk.
  }

  private persist(): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.tmp`;
    fs.writeFileSync(tmp, JSON.stringify(this.snapshot(), null, "\t") + "\n", "utf8");
    fs.renameSync(tmp, this.filePath);
  }
}
