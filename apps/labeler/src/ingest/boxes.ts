import path from "node:path";

import { Box, sortBoxes } from "@coretag/assignment-kernel";
import type { BoxFieldMapV1, TagFieldMapV1 } from "@coretag/contracts";

import type { PrintedLedger } from "../ledger";
import { cell, requireColumns, type CsvTable } from "./csv_reader";

export const TAG_DELIMITER = "|";

export type BoxIngestOptions = {
  fields: BoxFieldMapV1;
  tagFields: TagFieldMapV1;
  tagsEnabled: boolean;
};

export type BoxIngestResult = {
  boxes: Box[]; // label order
  skippedPrinted: number;
  skippedBlank: number;
};

/**
 * "S-01 | S-02||" -> ["S-01", "S-02"]
 */
export function splitTagList(raw: string): string[] {
  return raw
    .split(TAG_DELIMITER)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/**
 * Builds boxes from the boxes CSV. Rows with a blank hole are spacer rows;
 * boxes already in the ledger are left out.
 */
export function ingestBoxes(
  table: CsvTable,
  opts: BoxIngestOptions,
  ledger: Pick<PrintedLedger, "has">
): BoxIngestResult {
  const f = opts.fields;
  const required = [f.hole, f.box, f.box_start, f.box_stop];
  if (opts.tagsEnabled) {
    required.push(f.tag_position);
    if (f.skipped_tags !== null) required.push(f.skipped_tags);
    if (f.forced_tags !== null) required.push(f.forced_tags);
  }
  requireColumns(table, required);

  const fileName = path.basename(table.file);
  const boxes: Box[] = [];
  let skippedPrinted = 0;
  let skippedBlank = 0;

  table.rows.forEach((row, i) => {
    const hole = cell(row, f.hole).trim();
    if (hole.length === 0) {
      skippedBlank += 1;
      return;
    }

    const box = new Box(
      {
        hole,
        name: cell(row, f.box).trim(),
        startingDepth: cell(row, f.box_start),
        endingDepth: cell(row, f.box_stop)
      },
      `${fileName}:${table.lineNumbers[i]}`
    );

    if (ledger.has(box.hole, box.name)) {
      skippedPrinted += 1;
      return;
    }

    if (opts.tagsEnabled) {
      box.configure({
        tagAtSampleStart: cell(row, f.tag_position).trim() === opts.tagFields.tag_start,
        skippedTags: f.skipped_tags === null ? [] : splitTagList(cell(row, f.skipped_tags)),
        forcedTags: f.forced_tags === null ? [] : splitTagList(cell(row, f.forced_tags))
      });
    }

    boxes.push(box);
  });

  return { boxes: sortBoxes(boxes), skippedPrinted, skippedBlank };
}
