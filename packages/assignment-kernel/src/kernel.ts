// Assignment Kernel - assignment pass
//
// Offers every tag to every box of the same hole, in box order, then sorts the
// tags inside each box. The only pause is a boundary question to the resolver;
// pairs are awaited one at a time so there is never more than one open question.
//
// No IO. Nothing is logged here: a rejected tag is an expected outcome.

import type { BoundaryResolver } from "./boundary/resolver";
import type { Box } from "./records/box";
import type { Tag } from "./records/tag";

export type AssignmentSummary = {
  boxes: number;
  tags: number;
  // Tag references placed into boxes. A tag offered to overlapping boxes of one
  // hole may be counted more than once.
  assigned: number;
  boundaryPrompts: number;
};

/**
 * Runs the assignment pass.
 *
 * @param boxes - Boxes in label order (see sortBoxes), freshly configured.
 * @param tags - Tags in discovery order.
 * @param resolver - Decides boundary cases.
 * @returns Counts for reporting. The result itself lives in each box's tags.
 */
export async function assignTags(
  boxes: ReadonlyArray<Box>,
  tags: Iterable<Tag>,
  resolver: BoundaryResolver
): Promise<AssignmentSummary> {
  const boxesByHole = new Map<string, Box[]>();
  for (const box of boxes) {
    const list = boxesByHole.get(box.hole) ?? [];
    list.push(box);
    boxesByHole.set(box.hole, list);
  }

  let boundaryPrompts = 0;
  const counting: BoundaryResolver = {
    resolveBoundary: (tag, box) => {
      boundaryPrompts += 1;
      return resolver.resolveBoundary(tag, box);
    }
  };

  let tagCount = 0;
  for (const tag of tags) {
    tagCount += 1;
    for (const box of boxesByHole.get(tag.hole) ?? []) {
      await box.addTag(tag, counting);
    }
  }

  let assigned = 0;
  for (const box of boxes) {
    box.sortTags();
    assigned += box.tags.length;
  }

  return { boxes: boxes.length, tags: tagCount, assigned, boundaryPrompts };
}
