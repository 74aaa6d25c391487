import fs from "node:fs";
import path from "node:path";

import { assignTags, type AssignmentSummary, type BoundaryResolver, type Tag } from "@coretag/assignment-kernel";
import { encodeLabelPayloadV1, type LabelerConfigV1 } from "@coretag/contracts";

import { LabelerError } from "./errors";
import { ingestBoxes, ingestTags, readCsvFile } from "./ingest";
import type { PrintedLedger } from "./ledger";
import { kv, type Logger } from "./log";
import type { LatexCompiler, LabelPrinter } from "./output";
import { buildLabelPayload, renderLabelTex, resolveLabelProfile, writeQrPng, type QrWriter } from "./render";
import { fileStem } from "./util";

export type LabelRuntimeDeps = {
  config: LabelerConfigV1;
  ledger: PrintedLedger;
  resolver: BoundaryResolver;
  compiler: Pick<LatexCompiler, "compile">;
  printer: Pick<LabelPrinter, "print">;
  log: Logger;
  writeQr?: QrWriter;
};

export type LabelRunInput = {
  labelsPath: string;
  tagsPath?: string;
  workDir: string;
  dryRun: boolean;
};

export type LabelOutcome = {
  hole: string;
  box: string;
  payload: string; // QR content
  texPath: string;
  pdfPath: string | null; // null on dry runs
};

export type LabelRunResult = {
  labels: LabelOutcome[];
  summary: AssignmentSummary;
  skippedPrinted: number;
  skippedBlankRows: number;
  skippedTags: number;
};

/**
 * One labelling run: ingest, assign, then render, compile, print and record
 * each box in label order. A box is recorded only after it printed, and the
 * ledger persists per box, so a failed run can be restarted.
 */
export class LabelRuntime {
  private readonly writeQr: QrWriter;

  constructor(private readonly deps: LabelRuntimeDeps) {
    this.writeQr = deps.writeQr ?? writeQrPng;
  }

  async run(input: LabelRunInput): Promise<LabelRunResult> {
    const { config, ledger, log } = this.deps;
    const profile = resolveLabelProfile(config.label_size);

    const boxIngest = ingestBoxes(
      readCsvFile(input.labelsPath),
      { fields: config.fields.boxes, tagFields: config.fields.tags, tagsEnabled: config.tags_enabled },
      ledger
    );
    const { boxes } = boxIngest;
    log.info(`boxes ${kv({ file: path.basename(input.labelsPath), pending: boxes.length, already_printed: boxIngest.skippedPrinted })}`);

    let tags: Tag[] = [];
    let skippedTags = 0;
    if (config.tags_enabled && boxes.length > 0) {
      if (!input.tagsPath) {
        throw new LabelerError("INPUT_MISSING", "samples CSV is required when tags are enabled (set --tags)", "tags_enabled");
      }
      const tagIngest = ingestTags(readCsvFile(input.tagsPath), config.fields.tags, new Set(boxes.map((b) => b.hole)));
      tags = tagIngest.tags;
      skippedTags = tagIngest.skipped;
    }

    const summary = await assignTags(boxes, tags, this.deps.resolver);
    log.info(`assigned ${kv(summary)}`);

    fs.mkdirSync(input.workDir, { recursive: true });
    const labels: LabelOutcome[] = [];

    for (const [i, box] of boxes.entries()) {
      const stem = `${String(i + 1).padStart(3, "0")}_${fileStem(box.toString())}`;
      const payloadRecord = buildLabelPayload(box);
      const payload = encodeLabelPayloadV1(payloadRecord);

      const imageFileName = `${stem}.png`;
      await this.writeQr(path.join(input.workDir, imageFileName), payload);

      const texPath = path.join(input.workDir, `${stem}.tex`);
      fs.writeFileSync(
        texPath,
        renderLabelTex({ payload: payloadRecord, imageFileName, profile, tagsEnabled: config.tags_enabled }),
        "utf8"
      );

      if (input.dryRun) {
        log.info(`dry-run ${kv({ box: box.describe(), tags: box.tags.length, tex: texPath })}`);
        labels.push({ hole: box.hole, box: box.name, payload, texPath, pdfPath: null });
        continue;
      }

      const pdfPath = await this.deps.compiler.compile(texPath);
      await this.deps.printer.print(pdfPath);
      ledger.markPrinted(box.hole, box.name);
      log.info(`label ${kv({ box: box.describe(), tags: box.tags.length })}`);
      labels.push({ hole: box.hole, box: box.name, payload, texPath, pdfPath });
    }

    return {
      labels,
      summary,
      skippedPrinted: boxIngest.skippedPrinted,
      skippedBlankRows: boxIngest.skippedBlank,
      skippedTags
    };
  }
}
