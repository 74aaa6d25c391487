import assert from "node:assert";

import { Box, Tag, type BoxConfigPatch } from "../index";

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// Helper: expect a function to throw and match an error substring.
export function expectThrows(fn: () => unknown, contains: string): void {
  let threw = false;
  try {
    fn();
  } catch (err: unknown) {
    threw = true;
    const msg = messageOf(err);
    assert.ok(msg.includes(contains), `expected error containing "${contains}", got "${msg}"`);
  }
  assert.ok(threw, `expected throw containing "${contains}", but no error was thrown`);
}

// Helper: same as expectThrows for async functions.
export async function expectRejects(fn: () => Promise<unknown>, contains: string): Promise<void> {
  let threw = false;
  try {
    await fn();
  } catch (err: unknown) {
    threw = true;
    const msg = messageOf(err);
    assert.ok(msg.includes(contains), `expected rejection containing "${contains}", got "${msg}"`);
  }
  assert.ok(threw, `expected rejection containing "${contains}", but the promise resolved`);
}

export function tag(hole: string, name: string, startingDepth: number, endingDepth: number): Tag {
  return new Tag({ hole, name, startingDepth, endingDepth });
}

export function box(
  hole: string,
  name: string,
  startingDepth: number,
  endingDepth: number,
  config: BoxConfigPatch = {}
): Box {
  const b = new Box({ hole, name, startingDepth, endingDepth });
  b.configure(config);
  return b;
}

export function tagNames(b: Box): string[] {
  return b.tags.map((t) => t.name);
}
