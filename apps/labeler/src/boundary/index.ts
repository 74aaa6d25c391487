import { FixedBoundaryResolver, type BoundaryResolver } from "@coretag/assignment-kernel";
import type { BoundaryPolicyV1 } from "@coretag/contracts";

import { ReadlineBoundaryResolver } from "./readline_resolver";

export * from "./readline_resolver";

export type ClosableResolver = BoundaryResolver & { close(): void };

/**
 * prompt: ask on stdin/stdout. include/exclude: answer every case the same.
 */
export function createBoundaryResolver(
  policy: BoundaryPolicyV1,
  io?: { input: NodeJS.ReadableStream; output: NodeJS.WritableStream }
): ClosableResolver {
  switch (policy) {
    case "prompt": {
      return io ? new ReadlineBoundaryResolver(io.input, io.output) : new ReadlineBoundaryResolver();
    }
    case "include":
    case "exclude": {
      const fixed = new FixedBoundaryResolver(policy === "include");
      return { resolveBoundary: () => fixed.resolveBoundary(), close: () => undefined };
    }
  }
}
