// Labeler config: SSOT loader + validator.
//
// Source of truth:
//   config/labeler/<profile>.json   (default profile: default.json)
//
// Precedence: CLI flags > environment > profile file.

import fs from "node:fs";
import path from "node:path";

import { LabelerConfigV1Z, type LabelerConfigV1 } from "@coretag/contracts";
import type { ZodError } from "zod";

import { LabelerError } from "../errors";
import { assertString, findRepoRoot } from "../util";

const SSOT_DEFAULT = path.join("config", "labeler", "default.json");
const PROFILE_RE = /^[A-Za-z0-9_-]+$/;

export type Env = Readonly<Record<string, string | undefined>>;

// Raw override values; applyOverrides validates them with the rest of the config.
export type LabelerOverrides = {
  labelSize?: string;
  boundaryPolicy?: string;
  printerName?: string;
};

export function resolveRepoRoot(env: Env = process.env): string {
  // 1) explicit override (CI / dev convenience)
  if (env.CORETAG_REPO_ROOT) return path.resolve(env.CORETAG_REPO_ROOT);

  // 2) walk upward from cwd, then from this file (covers dist/ builds run elsewhere)
  try {
    return findRepoRoot(process.cwd(), SSOT_DEFAULT);
  } catch {
    return findRepoRoot(__dirname, SSOT_DEFAULT, 12);
  }
}

function describeIssues(err: ZodError): string {
  return err.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
}

export function validateLabelerConfig(input: unknown, context: string): LabelerConfigV1 {
  const result = LabelerConfigV1Z.safeParse(input);
  if (!result.success) {
    throw new LabelerError("CONFIG_INVALID", describeIssues(result.error), context);
  }
  return result.data;
}

/**
 * Environment overrides: CORETAG_LABEL_SIZE, CORETAG_BOUNDARY_POLICY,
 * CORETAG_PRINTER_NAME. The policy is validated with the rest of the config.
 */
export function overridesFromEnv(env: Env): LabelerOverrides {
  const out: LabelerOverrides = {};
  if (env.CORETAG_LABEL_SIZE) out.labelSize = env.CORETAG_LABEL_SIZE;
  if (env.CORETAG_BOUNDARY_POLICY) out.boundaryPolicy = env.CORETAG_BOUNDARY_POLICY;
  if (env.CORETAG_PRINTER_NAME) out.printerName = env.CORETAG_PRINTER_NAME;
  return out;
}

export function applyOverrides(
  cfg: LabelerConfigV1,
  overrides: LabelerOverrides,
  context = "overrides"
): LabelerConfigV1 {
  const { labelSize, boundaryPolicy, printerName } = overrides;
  return validateLabelerConfig(
    {
      ...cfg,
      label_size: labelSize ?? cfg.label_size,
      boundary_policy: boundaryPolicy ?? cfg.boundary_policy,
      printer: { ...cfg.printer, name: printerName ?? cfg.printer.name }
    },
    context
  );
}

export function loadLabelerConfig(profile = "default", env: Env = process.env): LabelerConfigV1 {
  let name: string;
  try {
    name = assertString(profile, "config_profile");
  } catch {
    throw new LabelerError("CONFIG_INVALID", "empty profile name", "--profile");
  }
  if (!PROFILE_RE.test(name)) {
    throw new LabelerError("CONFIG_INVALID", `profile name must match ${PROFILE_RE.source}: ${name}`, "--profile");
  }

  const repoRoot = resolveRepoRoot(env);
  const p = path.join(repoRoot, "config", "labeler", `${name}.json`);
  if (!fs.existsSync(p)) {
    throw new LabelerError("CONFIG_INVALID", `profile not found: ${name}`, p);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(p, "utf8"));
  } catch (err: unknown) {
    throw new LabelerError("CONFIG_INVALID", `not valid JSON (${err instanceof Error ? err.message : String(err)})`, p);
  }

  const cfg = validateLabelerConfig(raw, p);
  return applyOverrides(cfg, overridesFromEnv(env), "environment");
}
