import assert from "node:assert";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import type { LabelerConfigV1 } from "@coretag/contracts";

import { loadLabelerConfig } from "../config";
import type { Logger } from "../log";
import type { CommandResult, CommandSpec } from "../output";

export const REPO_ROOT = path.resolve(__dirname, "..", "..", "..", "..");

export function fixturePath(name: string): string {
  return path.resolve(__dirname, "..", "..", "fixtures", name);
}

export function tempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `coretag-${prefix}-`));
}

export function defaultConfig(): LabelerConfigV1 {
  return loadLabelerConfig("default", { CORETAG_REPO_ROOT: REPO_ROOT });
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// Helper: expect a function to throw and match an error substring.
export function expectThrows(fn: () => unknown, contains: string): void {
  let threw = false;
  try {
    fn();
  } catch (err: unknown) {
    threw = true;
    const msg = messageOf(err);
    assert.ok(msg.includes(contains), `expected error containing "${contains}", got "${msg}"`);
  }
  assert.ok(threw, `expected throw containing "${contains}", but no error was thrown`);
}

// Helper: same as expectThrows for async functions.
export async function expectRejects(fn: () => Promise<unknown>, contains: string): Promise<void> {
  let threw = false;
  try {
    await fn();
  } catch (err: unknown) {
    threw = true;
    const msg = messageOf(err);
    assert.ok(msg.includes(contains), `expected rejection containing "${contains}", got "${msg}"`);
  }
  assert.ok(threw, `expected rejection containing "${contains}", but the promise resolved`);
}

export class MemoryLogger implements Logger {
  readonly lines: string[] = [];

  info(message: string): void {
    this.lines.push(`INFO: ${message}`);
  }

  warn(message: string): void {
    this.lines.push(`WARN: ${message}`);
  }
}

/**
 * Stand-in for lualatex and the print tool. A compile call writes
 * `<stem>.pdf` into its cwd unless `writePdf` is off.
 */
export class FakeRunner {
  readonly calls: CommandSpec[] = [];
  writePdf = true;
  compileResult: CommandResult = { exitCode: 0, stdoutTail: "", stderrTail: "" };
  printResults: CommandResult[] = [];

  readonly run = async (spec: CommandSpec): Promise<CommandResult> => {
    this.calls.push(spec);
    if (spec.command === "lualatex") {
      const stem = spec.args[spec.args.length - 1];
      if (this.writePdf && spec.cwd !== undefined) {
        fs.writeFileSync(path.join(spec.cwd, `${stem}.pdf`), "%PDF-1.5 test\n");
      }
      return this.compileResult;
    }
    return this.printResults.shift() ?? { exitCode: 0, stdoutTail: "", stderrTail: "" };
  };
}
