import path from "node:path";

import { LabelerError } from "../errors";
import { kv, type Logger } from "../log";
import type { CommandRunner, CommandSpec } from "./command_runner";

export type PrinterTarget = {
  executable: string; // SumatraPDF, absolute
  printerName: string;
  paper: string; // label profile paper name
};

export function buildPrintCommand(target: PrinterTarget, pdfPath: string): CommandSpec {
  return {
    command: target.executable,
    args: [
      "-print-to",
      target.printerName,
      "-print-settings",
      `noscale,paper=${target.paper}`,
      "-silent",
      "-exit-when-done",
      pdfPath
    ]
  };
}

export class LabelPrinter {
  constructor(
    readonly target: PrinterTarget,
    private readonly runner: CommandRunner,
    private readonly log: Logger
  ) {}

  async print(pdfPath: string): Promise<void> {
    const result = await this.runner(buildPrintCommand(this.target, pdfPath));
    if (result.exitCode !== 0) {
      const detail = result.stderrTail.trim() || `exit ${String(result.exitCode)}`;
      throw new LabelerError("PRINT_FAILED", `${this.target.printerName}: ${detail}`, pdfPath);
    }
    this.log.info(`printed ${kv({ pdf: path.basename(pdfPath), printer: this.target.printerName })}`);
  }
}
