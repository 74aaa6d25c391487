import path from "node:path";

import { Tag } from "@coretag/assignment-kernel";
import type { TagFieldMapV1 } from "@coretag/contracts";

import { cell, requireColumns, type CsvRow, type CsvTable } from "./csv_reader";

export type TagIngestResult = {
  tags: Tag[]; // file order
  skipped: number;
};

/**
 * Builds tags for holes that have a box to label. Other rows are counted
 * as skipped. A depth column missing from the header reads as 0.
 */
export function ingestTags(
  table: CsvTable,
  fields: TagFieldMapV1,
  labelledHoles: ReadonlySet<string>
): TagIngestResult {
  requireColumns(table, [fields.hole, fields.tag]);

  const depthOf = (row: CsvRow, column: string): string | number =>
    table.headers.includes(column) ? cell(row, column) : 0;

  const fileName = path.basename(table.file);
  const tags: Tag[] = [];
  let skipped = 0;

  table.rows.forEach((row, i) => {
    const hole = cell(row, fields.hole).trim();
    if (hole.length === 0 || !labelledHoles.has(hole)) {
      skipped += 1;
      return;
    }

    tags.push(
      new Tag(
        {
          hole,
          name: cell(row, fields.tag).trim(),
          startingDepth: depthOf(row, fields.tag_start),
          endingDepth: depthOf(row, fields.tag_stop)
        },
        `${fileName}:${table.lineNumbers[i]}`
      )
    );
  });

  return { tags, skipped };
}
