import * as readline from "node:readline";

import { describeBoundaryCase, type Box, type BoundaryResolver, type Tag } from "@coretag/assignment-kernel";

import { LabelerError } from "../errors";

/**
 * "y" / "yes" / "n" / "no", any case. Anything else is null and the
 * question is asked again.
 */
export function parseYesNo(answer: string): boolean | null {
  const a = answer.trim().toLowerCase();
  if (a === "y" || a === "yes") return true;
  if (a === "n" || a === "no") return false;
  return null;
}

/**
 * Asks the operator about each boundary case on a terminal. Questions are
 * serial: the assignment pass waits for the answer before the next pair.
 *
 * Lines are queued as readline emits them, so answers typed ahead or piped
 * in are consumed one per question.
 */
export class ReadlineBoundaryResolver implements BoundaryResolver {
  private rl: readline.Interface | null = null;
  private closed = false;
  private readonly lines: string[] = [];
  private waiter: { resolve: (line: string) => void; reject: (err: Error) => void } | null = null;

  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {}

  async resolveBoundary(tag: Tag, box: Box): Promise<boolean> {
    const query = `Edge Case: ${describeBoundaryCase(tag, box)} [y/n] `;
    for (;;) {
      const answer = parseYesNo(await this.ask(query));
      if (answer !== null) return answer;
    }
  }

  close(): void {
    this.rl?.close();
  }

  private open(): void {
    if (this.rl || this.closed) return;
    const rl = readline.createInterface({ input: this.input, output: this.output, terminal: false });
    rl.on("line", (line) => {
      const waiter = this.waiter;
      this.waiter = null;
      if (waiter) waiter.resolve(line);
      else this.lines.push(line);
    });
    rl.on("close", () => {
      this.rl = null;
      this.closed = true;
      const waiter = this.waiter;
      this.waiter = null;
      waiter?.reject(inputClosed());
    });
    this.rl = rl;
  }

  private ask(query: string): Promise<string> {
    this.open();
    this.output.write(query);

    const queued = this.lines.shift();
    if (queued !== undefined) return Promise.resolve(queued);
    if (this.closed) return Promise.reject(inputClosed());

    return new Promise((resolve, reject) => {
      this.waiter = { resolve, reject };
    });
  }
}

function inputClosed(): LabelerError {
  return new LabelerError("INPUT_MISSING", "input closed before a boundary question was answered", "stdin");
}
