// Assignment Kernel - boundary resolution
//
// When a tag's matching depth sits exactly on a box edge, the box asks an
// injected resolver whether to include it. Production wiring supplies an
// operator prompt; the resolvers below are the non-interactive policies.

import type { Box } from "../records/box";
import type { Tag } from "../records/tag";

export interface BoundaryResolver {
  resolveBoundary(tag: Tag, box: Box): boolean | Promise<boolean>;
}

/**
 * Operator-facing question for a boundary case.
 */
export function describeBoundaryCase(tag: Tag, box: Box): string {
  return `Include tag "${tag.toString()}" in box "${box.toString()}"?`;
}

/**
 * Answers every boundary case the same way.
 */
export class FixedBoundaryResolver implements BoundaryResolver {
  constructor(private readonly answer: boolean) {}

  resolveBoundary(): boolean {
    return this.answer;
  }
}

export type BoundaryCall = {
  tag: string;
  box: string;
  message: string;
  answer: boolean;
};

/**
 * Replays a fixed sequence of answers and records each question asked.
 * Asking more often than scripted is a test bug and throws.
 */
export class ScriptedBoundaryResolver implements BoundaryResolver {
  readonly calls: BoundaryCall[] = [];
  private cursor = 0;

  constructor(private readonly answers: ReadonlyArray<boolean>) {}

  resolveBoundary(tag: Tag, box: Box): boolean {
    if (this.cursor >= this.answers.length) {
      throw new Error(
        `BOUNDARY_SCRIPT_EXHAUSTED: ${this.answers.length} answers scripted @ ${tag.toString()} in ${box.toString()}`
      );
    }

    const answer = this.answers[this.cursor];
    this.cursor += 1;
    this.calls.push({
      tag: tag.toString(),
      box: box.toString(),
      message: describeBoundaryCase(tag, box),
      answer
    });
    return answer;
  }

  get remaining(): number {
    return this.answers.length - this.cursor;
  }
}
