import assert from "node:assert";
import { PassThrough, Writable } from "node:stream";

import { Box, Tag } from "@coretag/assignment-kernel";

import { createBoundaryResolver, parseYesNo, ReadlineBoundaryResolver } from "../boundary";
import { expectRejects } from "./helpers";

/**
 * Terminal stand-in: answers each prompt once it has been written, so no
 * line arrives before readline is waiting for it.
 */
function scriptedTerminal(answers: string[]) {
  const input = new PassThrough();
  const output = new PassThrough();
  const prompts: string[] = [];
  output.on("data", (chunk: Buffer) => {
    prompts.push(String(chunk));
    const next = answers.shift();
    setImmediate(() => {
      if (next === undefined) {
        if (!input.writableEnded) input.end();
      }
      else input.write(`${next}\n`);
    });
  });
  return { input, output, prompts };
}

export async function testReadline(): Promise<void> {
  assert.equal(parseYesNo("y"), true);
  assert.equal(parseYesNo(" YES "), true);
  assert.equal(parseYesNo("n"), false);
  assert.equal(parseYesNo("No"), false);
  assert.equal(parseYesNo(""), null);
  assert.equal(parseYesNo("maybe"), null);

  const b1 = new Box({ hole: "H1", name: "B1", startingDepth: 0, endingDepth: 2 });
  const t1 = new Tag({ hole: "H1", name: "T1", startingDepth: 0, endingDepth: 0.5 });
  const question = 'Edge Case: Include tag "H1-T1" in box "H1-B1"? [y/n] ';

  {
    const term = scriptedTerminal(["maybe", "Y", "no"]);
    const resolver = new ReadlineBoundaryResolver(term.input, term.output);
    assert.equal(await resolver.resolveBoundary(t1, b1), true);
    assert.equal(await resolver.resolveBoundary(t1, b1), false);
    assert.deepEqual(term.prompts, [question, question, question]);
    resolver.close();
  }

  {
    const term = scriptedTerminal([]);
    const resolver = new ReadlineBoundaryResolver(term.input, term.output);
    await expectRejects(
      async () => resolver.resolveBoundary(t1, b1),
      "INPUT_MISSING: input closed before a boundary question was answered @ stdin"
    );
    await expectRejects(async () => resolver.resolveBoundary(t1, b1), "INPUT_MISSING");
  }
  {
    // Answers already buffered before the first question: one per question.
    const input = new PassThrough();
    const prompts: string[] = [];
    const output = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        prompts.push(String(chunk));
        callback();
      }
    });
    input.write("y\nn\n");
    const resolver = new ReadlineBoundaryResolver(input, output);
    assert.equal(await resolver.resolveBoundary(t1, b1), true);
    assert.equal(await resolver.resolveBoundary(t1, b1), false);
    assert.deepEqual(prompts, [question, question]);
    resolver.close();
  }

  {
    // Piped answers followed by end of input: queued lines are still used.
    const input = new PassThrough();
    const output = new PassThrough();
    input.end("n\nmaybe\nyes\n");
    const resolver = new ReadlineBoundaryResolver(input, output);
    assert.equal(await resolver.resolveBoundary(t1, b1), false);
    assert.equal(await resolver.resolveBoundary(t1, b1), true);
    await expectRejects(async () => resolver.resolveBoundary(t1, b1), "INPUT_MISSING");
  }
  console.log("[OK] readline resolver");

  assert.equal(await createBoundaryResolver("include").resolveBoundary(t1, b1), true);
  assert.equal(await createBoundaryResolver("exclude").resolveBoundary(t1, b1), false);
  {
    const term = scriptedTerminal(["y"]);
    const prompt = createBoundaryResolver("prompt", term);
    assert.ok(prompt instanceof ReadlineBoundaryResolver);
    assert.equal(await prompt.resolveBoundary(t1, b1), true);
    prompt.close();
  }
  console.log("[OK] boundary policies");
}
