import { spawn } from "node:child_process";

export type CommandSpec = {
  command: string;
  args: string[];
  cwd?: string;
};

export type CommandResult = {
  exitCode: number | null; // null: killed by a signal
  stdoutTail: string;
  stderrTail: string;
};

export type CommandRunner = (spec: CommandSpec) => Promise<CommandResult>;

const TAIL_MAX = 4000;

function tailAppend(prev: string, chunk: string): string {
  const next = prev + chunk;
  return next.length > TAIL_MAX ? next.slice(next.length - TAIL_MAX) : next;
}

/**
 * Runs a command without a shell; arguments are passed as-is, so paths
 * with spaces need no quoting. Rejects only when the process cannot start.
 */
export const spawnRunner: CommandRunner = (spec) =>
  new Promise((resolve, reject) => {
    const child = spawn(spec.command, spec.args, { cwd: spec.cwd, windowsHide: true });
    let stdoutTail = "";
    let stderrTail = "";
    child.stdout.on("data", (buf) => {
      stdoutTail = tailAppend(stdoutTail, String(buf));
    });
    child.stderr.on("data", (buf) => {
      stderrTail = tailAppend(stderrTail, String(buf));
    });
    child.on("error", reject);
    child.on("close", (code) => {
      resolve({ exitCode: typeof code === "number" ? code : null, stdoutTail, stderrTail });
    });
  });

export function formatCommand(spec: CommandSpec): string {
  return [spec.command, ...spec.args].map((a) => (/\s/.test(a) ? `"${a}"` : a)).join(" ");
}
