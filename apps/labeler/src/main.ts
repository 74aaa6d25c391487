#!/usr/bin/env node
// coretag-labels: print QR box labels for core trays.
//
// Reads the boxes CSV (and samples CSV when tags are enabled), assigns each
// sample tag to its boxes, then prints one label per box not yet in the ledger.

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import process from "node:process";

import { createBoundaryResolver } from "./boundary";
import { parseArgs, USAGE } from "./cli/args";
import { applyOverrides, loadLabelerConfig, resolveRepoRoot } from "./config";
import { isLabelerError } from "./errors";
import { openPrintedLedger } from "./ledger";
import { consoleLogger, kv } from "./log";
import { LabelPrinter, LatexCompiler, spawnRunner } from "./output";
import { resolveLabelProfile } from "./render";
import { LabelRuntime } from "./runtime";

export async function main(argv: ReadonlyArray<string>): Promise<void> {
  const args = parseArgs(argv);
  const config = applyOverrides(
    loadLabelerConfig(args.profile),
    { labelSize: args.labelSize, boundaryPolicy: args.boundaryPolicy },
    "argv"
  );
  const profile = resolveLabelProfile(config.label_size);

  const labelsPath = path.resolve(args.labelsPath);
  const ledgerPath = path.resolve(args.ledgerPath ?? path.join(path.dirname(labelsPath), config.ledger.file_name));
  const workDir = args.workDir
    ? path.resolve(args.workDir)
    : fs.mkdtempSync(path.join(os.tmpdir(), "coretag-labels-"));
  const executable = path.isAbsolute(config.printer.executable)
    ? config.printer.executable
    : path.join(resolveRepoRoot(), config.printer.executable);

  const log = consoleLogger;
  log.info(
    `start ${kv({ profile: args.profile, label_size: profile.size, boundary: config.boundary_policy, ledger: ledgerPath, workdir: workDir, dry_run: args.dryRun })}`
  );

  const ledger = openPrintedLedger(config.ledger.kind, ledgerPath);
  const resolver = createBoundaryResolver(config.boundary_policy);
  try {
    const runtime = new LabelRuntime({
      config,
      ledger,
      resolver,
      compiler: new LatexCompiler(config.latex, spawnRunner, log),
      printer: new LabelPrinter({ executable, printerName: config.printer.name, paper: profile.paper }, spawnRunner, log),
      log
    });
    const result = await runtime.run({
      labelsPath,
      tagsPath: args.tagsPath ? path.resolve(args.tagsPath) : undefined,
      workDir,
      dryRun: args.dryRun
    });
    log.info(`done ${kv({ labels: result.labels.length, already_printed: result.skippedPrinted })}`);
  } finally {
    resolver.close();
    ledger.close();
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).catch((err: unknown) => {
    console.error(`FAIL: ${err instanceof Error ? err.message : String(err)}`);
    if (isLabelerError(err, "INPUT_MISSING") && err.context === "argv") console.error(USAGE);
    process.exitCode = 1;
  });
}
