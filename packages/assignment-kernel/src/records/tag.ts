// Assignment Kernel - Tag
//
// A tag is a point sample in a hole, stamped with the depth interval it was
// taken from. Tags are immutable; boxes hold references to them.

import { formatDepth, parseDepth, type DepthInput } from "./depth";

export interface TagInit {
  hole: string;
  name: string;
  startingDepth: DepthInput;
  endingDepth: DepthInput;
}

export class Tag {
  readonly hole: string;
  readonly name: string;
  readonly startingDepth: number;
  readonly endingDepth: number;

  /**
   * @param init - Mapped record. Depths may still be raw cell text.
   * @param context - Location used in InvalidRecordError (defaults to the tag label).
   */
  constructor(init: TagInit, context?: string) {
    const where = context ?? `tag:${init.hole}-${init.name}`;
    this.hole = init.hole;
    this.name = init.name;
    this.startingDepth = parseDepth(init.startingDepth, "starting_depth", where);
    this.endingDepth = parseDepth(init.endingDepth, "ending_depth", where);
    Object.freeze(this);
  }

  toString(): string {
    return `${this.hole}-${this.name}`;
  }

  describe(): string {
    return `${this.hole}-${this.name} | ${formatDepth(this.startingDepth)} m - ${formatDepth(this.endingDepth)} m`;
  }
}

/**
 * Orders tags by starting depth only. Equal depths compare equal, so a stable
 * sort keeps their discovery order.
 */
export function compareTags(a: Tag, b: Tag): number {
  if (a.startingDepth < b.startingDepth) return -1;
  if (a.startingDepth > b.startingDepth) return 1;
  return 0;
}
