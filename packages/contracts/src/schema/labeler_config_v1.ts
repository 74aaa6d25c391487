import { z } from "zod"; // zod: runtime schema validation for the config SSOT

const SemVerZ = z.string().regex(/^\d+\.\d+\.\d+$/); // SemVer: no free-text versions

export const BOUNDARY_POLICIES_V1 = ["prompt", "include", "exclude"] as const;

export type BoundaryPolicyV1 = (typeof BOUNDARY_POLICIES_V1)[number];

const FieldNameZ = z.string().min(1);

// Column names in the boxes CSV. Skip/force columns are optional features.
export const BoxFieldMapV1Z = z
  .object({
    hole: FieldNameZ,
    box: FieldNameZ,
    box_start: FieldNameZ,
    box_stop: FieldNameZ,
    tag_position: FieldNameZ,
    skipped_tags: FieldNameZ.nullable(),
    forced_tags: FieldNameZ.nullable()
  })
  .strict();

// Column names in the tags (samples) CSV.
export const TagFieldMapV1Z = z
  .object({
    hole: FieldNameZ,
    tag: FieldNameZ,
    tag_start: FieldNameZ,
    tag_stop: FieldNameZ
  })
  .strict();

export const LabelerConfigV1Z = z
  .object({
    schema_version: SemVerZ,

    // Label stock. Checked against the known label profiles at render time,
    // so an unknown size fails there with its own error.
    label_size: z.string().min(1),

    // false: boxes only, no samples file, no tag lines on labels.
    tags_enabled: z.boolean(),

    boundary_policy: z.enum(BOUNDARY_POLICIES_V1),

    fields: z
      .object({
        boxes: BoxFieldMapV1Z,
        tags: TagFieldMapV1Z
      })
      .strict(),

    latex: z
      .object({
        command: z.string().min(1),
        args: z.array(z.string())
      })
      .strict(),

    printer: z
      .object({
        name: z.string().min(1),
        // Relative paths resolve against the repo root.
        executable: z.string().min(1)
      })
      .strict(),

    ledger: z
      .object({
        kind: z.enum(["json", "sqlite"]),
        // Default ledger file, placed beside the boxes CSV.
        file_name: z.string().min(1)
      })
      .strict()
  })
  .strict();

export type LabelerConfigV1 = z.infer<typeof LabelerConfigV1Z>;
export type BoxFieldMapV1 = z.infer<typeof BoxFieldMapV1Z>;
export type TagFieldMapV1 = z.infer<typeof TagFieldMapV1Z>;

export function parseLabelerConfigV1(input: unknown): LabelerConfigV1 {
  return LabelerConfigV1Z.parse(input);
}
