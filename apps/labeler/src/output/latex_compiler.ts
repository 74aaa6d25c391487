import fs from "node:fs";
import path from "node:path";

import type { LabelerConfigV1 } from "@coretag/contracts";

import { LabelerError } from "../errors";
import { kv, type Logger } from "../log";
import { formatCommand, type CommandRunner, type CommandSpec } from "./command_runner";

export function buildCompileCommand(latex: LabelerConfigV1["latex"], texPath: string): CommandSpec {
  return {
    command: latex.command,
    args: [...latex.args, path.basename(texPath, ".tex")],
    cwd: path.dirname(texPath)
  };
}

export class LatexCompiler {
  constructor(
    private readonly latex: LabelerConfigV1["latex"],
    private readonly runner: CommandRunner,
    private readonly log: Logger
  ) {}

  /**
   * Compiles a label and returns the PDF path. LuaLaTeX in nonstop mode exits
   * non-zero on recoverable warnings too, so only a missing PDF is fatal.
   */
  async compile(texPath: string): Promise<string> {
    const spec = buildCompileCommand(this.latex, texPath);
    const pdfPath = texPath.replace(/\.tex$/, "") + ".pdf";
    const result = await this.runner(spec);

    if (result.exitCode === 0) return pdfPath;

    if (fs.existsSync(pdfPath)) {
      this.log.warn(`latex exited non-zero ${kv({ exit: result.exitCode, cmd: formatCommand(spec), pdf: pdfPath })}`);
      return pdfPath;
    }

    const lastLine = result.stdoutTail.trim().split("\n").pop() ?? "";
    throw new LabelerError("LABEL_COMPILE_FAILED", `exit ${String(result.exitCode)}${lastLine ? `: ${lastLine}` : ""}`, texPath);
  }
}
