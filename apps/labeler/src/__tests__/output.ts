import assert from "node:assert";
import fs from "node:fs";
import path from "node:path";

import { buildCompileCommand, buildPrintCommand, formatCommand, LabelPrinter, LatexCompiler, spawnRunner } from "../output";
import { defaultConfig, expectRejects, FakeRunner, MemoryLogger, tempDir } from "./helpers";

const TARGET = { executable: "/opt/sumatra/SumatraPDF.exe", printerName: "DYMO LabelWriter 450", paper: "30252 Address" };

export async function testOutput(): Promise<void> {
  const cfg = defaultConfig();

  // --- Command construction ---
  assert.deepEqual(buildCompileCommand(cfg.latex, "/tmp/work/001_Hole-2-1.tex"), {
    command: "lualatex",
    args: ["--interaction=nonstopmode", "--enable-write18", "001_Hole-2-1"],
    cwd: "/tmp/work"
  });

  const print = buildPrintCommand(TARGET, "/tmp/work/001_Hole-2-1.pdf");
  assert.deepEqual(print.args, [
    "-print-to",
    "DYMO LabelWriter 450",
    "-print-settings",
    "noscale,paper=30252 Address",
    "-silent",
    "-exit-when-done",
    "/tmp/work/001_Hole-2-1.pdf"
  ]);
  assert.equal(
    formatCommand(print),
    '/opt/sumatra/SumatraPDF.exe -print-to "DYMO LabelWriter 450" -print-settings "noscale,paper=30252 Address" -silent -exit-when-done /tmp/work/001_Hole-2-1.pdf'
  );
  console.log("[OK] command construction");

  // --- Compiler ---
  {
    const dir = tempDir("compile");
    const texPath = path.join(dir, "001_a.tex");
    const runner = new FakeRunner();
    const log = new MemoryLogger();
    const compiler = new LatexCompiler(cfg.latex, runner.run, log);

    assert.equal(await compiler.compile(texPath), path.join(dir, "001_a.pdf"));
    assert.equal(runner.calls.length, 1);
    assert.deepEqual(log.lines, []);

    // Non-zero exit with a PDF: warning only.
    runner.compileResult = { exitCode: 1, stdoutTail: "", stderrTail: "" };
    assert.equal(await compiler.compile(texPath), path.join(dir, "001_a.pdf"));
    assert.deepEqual(log.lines, [
      `WARN: latex exited non-zero exit=1 cmd="lualatex --interaction=nonstopmode --enable-write18 001_a" pdf=${path.join(dir, "001_a.pdf")}`
    ]);

    // Non-zero exit without a PDF: fatal.
    fs.rmSync(path.join(dir, "001_a.pdf"));
    runner.writePdf = false;
    runner.compileResult = { exitCode: 1, stdoutTail: "This is LuaHBTeX\n! Emergency stop.\n", stderrTail: "" };
    await expectRejects(() => compiler.compile(texPath), `LABEL_COMPILE_FAILED: exit 1: ! Emergency stop. @ ${texPath}`);
  }
  console.log("[OK] latex compiler");

  // --- Printer ---
  {
    const runner = new FakeRunner();
    const log = new MemoryLogger();
    const printer = new LabelPrinter(TARGET, runner.run, log);

    await printer.print("/tmp/work/001_a.pdf");
    assert.equal(runner.calls[0].command, "/opt/sumatra/SumatraPDF.exe");
    assert.deepEqual(log.lines, ['INFO: printed pdf=001_a.pdf printer="DYMO LabelWriter 450"']);

    runner.printResults.push({ exitCode: 2, stdoutTail: "", stderrTail: "printer offline\n" });
    await expectRejects(
      () => printer.print("/tmp/work/001_a.pdf"),
      "PRINT_FAILED: DYMO LabelWriter 450: printer offline @ /tmp/work/001_a.pdf"
    );

    runner.printResults.push({ exitCode: null, stdoutTail: "", stderrTail: "" });
    await expectRejects(() => printer.print("/tmp/work/001_a.pdf"), "PRINT_FAILED: DYMO LabelWriter 450: exit null");
  }
  console.log("[OK] label printer");

  // --- Process runner ---
  {
    const result = await spawnRunner({
      command: process.execPath,
      args: ["-e", 'process.stdout.write("out"); process.stderr.write("err"); process.exitCode = 3']
    });
    assert.deepEqual(result, { exitCode: 3, stdoutTail: "out", stderrTail: "err" });

    await expectRejects(() => spawnRunner({ command: path.join(tempDir("spawn"), "no-such-tool"), args: [] }), "ENOENT");
  }
  console.log("[OK] spawn runner");
}
