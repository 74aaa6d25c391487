import { BOUNDARY_POLICIES_V1, type BoundaryPolicyV1 } from "@coretag/contracts";

import type { Env } from "../config";
import { LabelerError } from "../errors";

export type Args = {
  labelsPath: string; // boxes CSV
  tagsPath?: string; // samples CSV; required when tags are enabled
  ledgerPath?: string; // default: beside the boxes CSV
  profile: string;
  labelSize?: string;
  boundaryPolicy?: BoundaryPolicyV1;
  workDir?: string; // default: fresh temp dir
  dryRun: boolean;
};

export const USAGE =
  "usage: coretag-labels --labels <boxes.csv> [--tags <samples.csv>] [--ledger <file>] [--profile <name>]\n" +
  "                      [--label-size small|large] [--boundary prompt|include|exclude] [--workdir <dir>] [--dry-run]";

function isBoundaryPolicy(v: string): v is BoundaryPolicyV1 {
  return BOUNDARY_POLICIES_V1.some((p) => p === v);
}

export function parseArgs(argv: ReadonlyArray<string>, env: Env = process.env): Args {
  const get = (k: string): string | undefined => {
    const idx = argv.indexOf(`--${k}`);
    if (idx === -1) return undefined;
    const v = argv[idx + 1];
    if (!v || v.startsWith("--")) return undefined;
    return v;
  };

  const labelsPath = get("labels");
  if (!labelsPath) {
    throw new LabelerError("INPUT_MISSING", "missing boxes CSV (set --labels)", "argv");
  }

  const boundaryRaw = get("boundary");
  let boundaryPolicy: BoundaryPolicyV1 | undefined;
  if (boundaryRaw !== undefined) {
    if (!isBoundaryPolicy(boundaryRaw)) {
      throw new LabelerError("CONFIG_INVALID", `unknown boundary policy "${boundaryRaw}" (expected ${BOUNDARY_POLICIES_V1.join("|")})`, "--boundary");
    }
    boundaryPolicy = boundaryRaw;
  }

  return {
    labelsPath,
    tagsPath: get("tags"),
    ledgerPath: get("ledger") ?? env.CORETAG_LEDGER_PATH,
    profile: get("profile") ?? "default",
    labelSize: get("label-size"),
    boundaryPolicy,
    workDir: get("workdir"),
    dryRun: argv.includes("--dry-run")
  };
}
