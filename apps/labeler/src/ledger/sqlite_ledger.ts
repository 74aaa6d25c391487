import path from "node:path";
import fs from "node:fs";
import Database from "better-sqlite3";

import { naturalSort } from "@coretag/assignment-kernel";
import type { PrintedLedgerV1 } from "@coretag/contracts";

import { nowMs } from "../util";
import type { PrintedLedger } from "./types";

type PrintedRow = { hole: string; box_name: string };

/**
 * SQLite ledger, for label stations shared by several operators.
 * Pass ":memory:" for a throwaway ledger.
 */
export class SqlitePrintedLedger implements PrintedLedger {
  private db: Database.Database;

  constructor(readonly filePath: string) {
    if (filePath !== ":memory:") {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
    }
    this.db = new Database(filePath);
    if (filePath !== ":memory:") this.db.pragma("journal_mode = WAL");
    this.init();
  }

  private init(): void {
    // append-only: a printed box is never unmarked
    this.db.exec(`
      create table if not exists printed_boxes (
        hole text not null,
        box_name text not null,
        printed_at_ts integer not null,
        primary key (hole, box_name)
      );
    `);
  }

  has(hole: string, box: string): boolean {
    const stmt = this.db.prepare<[string, string], { hit: number }>(
      `select 1 as hit from printed_boxes where hole = ? and box_name = ?`
    );
    return stmt.get(hole, box) !== undefined;
  }

  markPrinted(hole: string, box: string): void {
    const stmt = this.db.prepare<[string, string, number]>(
      `insert or ignore into printed_boxes (hole, box_name, printed_at_ts) values (?, ?, ?)`
    );
    stmt.run(hole, box, nowMs());
  }

  snapshot(): PrintedLedgerV1 {
    const rows = this.db
      .prepare<[], PrintedRow>(`select hole, box_name from printed_boxes`)
      .all();

    const byHole = new Map<string, string[]>();
    for (const row of rows) {
      const list = byHole.get(row.hole) ?? [];
      list.push(row.box_name);
      byHole.set(row.hole, list);
    }

    const out: PrintedLedgerV1 = {};
    for (const hole of [...byHole.keys()].sort()) {
      out[hole] = naturalSort(byHole.get(hole) ?? []);
    }
    return out;
  }

  close(): void {
    this.db.close();
  }
}
