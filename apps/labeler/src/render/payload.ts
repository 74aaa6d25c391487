import type { Box } from "@coretag/assignment-kernel";
import type { LabelPayloadV1 } from "@coretag/contracts";

/**
 * Label payload for a box whose tags are assigned and sorted.
 * Each marker carries the depth the box matched the tag on.
 */
export function buildLabelPayload(box: Box): LabelPayloadV1 {
  return {
    hole: box.hole,
    box: box.name,
    starting_depth: box.startingDepth,
    ending_depth: box.endingDepth,
    tag_at_sample_start: box.tagAtSampleStart,
    markers: box.tags.map((t) => ({ name: t.name, depth: box.relevantDepth(t) }))
  };
}
