import fs from "node:fs";
import path from "node:path";

export function nowMs(): number {
  return Date.now();
}

export function assertString(v: unknown, name: string): string {
  if (typeof v !== "string" || v.trim().length === 0) throw new Error(`invalid ${name}`);
  return v.trim();
}

/**
 * File-name-safe stem for a label ("Hole 2/B1" -> "Hole_2_B1").
 * Dots are replaced too: graphicx reads the first dot as the extension.
 */
export function fileStem(s: string): string {
  const stem = s.replace(/[^A-Za-z0-9_-]+/g, "_");
  return stem.length > 0 ? stem : "_";
}

/**
 * Find repo root by walking upward from `startDir` until `requiredRelativePath` exists.
 *
 * Why:
 * - In npm workspaces, process.cwd() may be either repo root or a package subdir.
 * - SSOT files (e.g., config/labeler/default.json) live at the repo root.
 *
 * Contract:
 * - Returns an absolute directory path.
 * - Throws if the root cannot be found within `maxHops`.
 */
export function findRepoRoot(startDir: string, requiredRelativePath: string, maxHops = 8): string {
  let cur = path.resolve(startDir);

  for (let hop = 0; hop <= maxHops; hop++) {
    const candidate = path.join(cur, requiredRelativePath);
    if (fs.existsSync(candidate)) return cur;

    const parent = path.dirname(cur);
    if (parent === cur) break; // reached filesystem root
    cur = parent;
  }

  throw new Error(`Cannot locate repo root from ${startDir}; missing ${requiredRelativePath}`);
}
