// Assignment Kernel - Box
//
// A box covers a depth interval of one hole and owns the tags accepted into it.
// Identity is fixed at construction. Configuration (skip/force lists and the
// tag-position flag) is a separate record that may change only until the first
// addTag call. sortTags() ends the box's assignment phase.

import type { BoundaryResolver } from "../boundary/resolver";
import { formatDepth, parseDepth, type DepthInput } from "./depth";
import { compareTags, type Tag } from "./tag";

export interface BoxInit {
  hole: string;
  name: string;
  startingDepth: DepthInput;
  endingDepth: DepthInput;
}

export interface BoxConfig {
  // Tag names always rejected. Checked before forcedTags.
  skippedTags: ReadonlySet<string>;

  // Tag names always accepted, whatever their depth.
  forcedTags: ReadonlySet<string>;

  // true: match on the tag's starting depth; false: on its ending depth.
  tagAtSampleStart: boolean;
}

export type BoxConfigPatch = {
  skippedTags?: Iterable<string>;
  forcedTags?: Iterable<string>;
  tagAtSampleStart?: boolean;
};

type BoxPhase = "configuring" | "assigning" | "frozen";

export class Box {
  readonly hole: string;
  readonly name: string;
  readonly startingDepth: number;
  readonly endingDepth: number;

  private config: BoxConfig = {
    skippedTags: new Set<string>(),
    forcedTags: new Set<string>(),
    tagAtSampleStart: true
  };
  private readonly accepted: Tag[] = [];
  private phase: BoxPhase = "configuring";

  constructor(init: BoxInit, context?: string) {
    const where = context ?? `box:${init.hole}-${init.name}`;
    this.hole = init.hole;
    this.name = init.name;
    this.startingDepth = parseDepth(init.startingDepth, "starting_depth", where);
    this.endingDepth = parseDepth(init.endingDepth, "ending_depth", where);
  }

  get skippedTags(): ReadonlySet<string> {
    return this.config.skippedTags;
  }

  get forcedTags(): ReadonlySet<string> {
    return this.config.forcedTags;
  }

  get tagAtSampleStart(): boolean {
    return this.config.tagAtSampleStart;
  }

  get tags(): ReadonlyArray<Tag> {
    return this.accepted;
  }

  /**
   * Merges a configuration patch. Only allowed before assignment starts.
   */
  configure(patch: BoxConfigPatch): void {
    if (this.phase !== "configuring") {
      throw new Error(`BOX_CONFIG_LOCKED: ${this.toString()} is ${this.phase}`);
    }

    this.config = Object.freeze({
      skippedTags: patch.skippedTags ? new Set(patch.skippedTags) : this.config.skippedTags,
      forcedTags: patch.forcedTags ? new Set(patch.forcedTags) : this.config.forcedTags,
      tagAtSampleStart: patch.tagAtSampleStart ?? this.config.tagAtSampleStart
    });
  }

  /**
   * The tag depth this box matches against its interval.
   */
  relevantDepth(tag: Tag): number {
    return this.config.tagAtSampleStart ? tag.startingDepth : tag.endingDepth;
  }

  /**
   * Offers a tag to this box.
   *
   * Order of checks: hole, skip list, force list, depth. A depth exactly on
   * either edge of the interval is a boundary case and is decided by the
   * resolver, which is consulted for nothing else. Rejection is silent.
   */
  async addTag(tag: Tag, resolver: BoundaryResolver): Promise<void> {
    if (this.phase === "frozen") {
      throw new Error(`BOX_FROZEN: ${this.toString()} no longer accepts tags`);
    }
    this.phase = "assigning";

    if (tag.hole !== this.hole) return;
    if (this.config.skippedTags.has(tag.name)) return;

    if (this.config.forcedTags.has(tag.name)) {
      this.accepted.push(tag);
      return;
    }

    const depth = this.relevantDepth(tag);
    if (depth < this.startingDepth || depth > this.endingDepth) return;

    if (depth === this.startingDepth || depth === this.endingDepth) {
      const include = await resolver.resolveBoundary(tag, this);
      if (!include) return;
    }

    this.accepted.push(tag);
  }

  /**
   * Sorts accepted tags by starting depth and freezes the box.
   */
  sortTags(): void {
    this.accepted.sort(compareTags);
    this.phase = "frozen";
  }

  toString(): string {
    return `${this.hole}-${this.name}`;
  }

  describe(): string {
    return `${this.hole}-${this.name} | ${formatDepth(this.startingDepth)} m - ${formatDepth(this.endingDepth)} m`;
  }
}
