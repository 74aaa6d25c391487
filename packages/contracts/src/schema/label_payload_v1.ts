import { formatDepth } from "@coretag/assignment-kernel";
import { z } from "zod";

/**
 * LabelPayloadV1: the data a box label carries in its QR code.
 *
 * Encoded form (lines joined with CRLF):
 *   <hole>,<box>,<start>,<end>,<True|False>
 *   <tag name>,<tag depth>
 *   ...
 * Depths have two decimals (half-way values to the even hundredth). The flag is the box's tag position (True: tags
 * sit at sample starts). Each marker depth is the depth the box matched on.
 */
export const LabelMarkerV1Z = z
  .object({
    name: z.string(),
    depth: z.number().finite()
  })
  .strict();

export const LabelPayloadV1Z = z
  .object({
    hole: z.string().min(1),
    box: z.string(), // may be blank in the boxes file
    starting_depth: z.number().finite(),
    ending_depth: z.number().finite(),
    tag_at_sample_start: z.boolean(),
    markers: z.array(LabelMarkerV1Z)
  })
  .strict();

export type LabelMarkerV1 = z.infer<typeof LabelMarkerV1Z>;
export type LabelPayloadV1 = z.infer<typeof LabelPayloadV1Z>;

export const LABEL_PAYLOAD_LINE_BREAK = "\r\n";

export function encodeLabelPayloadV1(input: LabelPayloadV1): string {
  const p = LabelPayloadV1Z.parse(input);
  const header = [
    p.hole,
    p.box,
    formatDepth(p.starting_depth),
    formatDepth(p.ending_depth),
    p.tag_at_sample_start ? "True" : "False"
  ].join(",");
  const lines = p.markers.map((m) => `${m.name},${formatDepth(m.depth)}`);
  return [header, ...lines].join(LABEL_PAYLOAD_LINE_BREAK);
}
