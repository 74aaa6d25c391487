import type { Box } from "../records/box";
import { compareNatural } from "./natural_key";

/**
 * Box total order: within a hole by starting depth, across holes by the
 * natural order of the hole ids (depth is ignored then).
 */
export function compareBoxes(a: Box, b: Box): number {
  if (a.hole === b.hole) {
    if (a.startingDepth < b.startingDepth) return -1;
    if (a.startingDepth > b.startingDepth) return 1;
    return 0;
  }
  return compareNatural(a.hole, b.hole);
}

/**
 * Returns a new array of boxes in label order. Array.prototype.sort is stable,
 * so equal boxes keep their input order.
 */
export function sortBoxes(boxes: Iterable<Box>): Box[] {
  return [...boxes].sort(compareBoxes);
}
