/**
 * GroupingEngine - folds a flat leaf stream into a tree
 *
 * Drives a Cursor exactly once. One accumulator per level holds the nodes
 * built so far for the group currently open one level up. Per leaf:
 *
 *   1. group starts, coarse → fine: a start at L opens a fresh
 *      accumulator for L's child level
 *   2. the leaf itself is boxed into the base accumulator
 *   3. group ends, fine → coarse: an end at L boxes the child accumulator
 *      into one node and appends it to L's accumulator
 *
 * So a leaf that opens and closes several nested groups at once (a one-word
 * line that is the only line of its paragraph) lands inside every one of
 * them, innermost group closed first.
 *
 * Usage:
 *   const blocks = new GroupingEngine(cursor, spec).run();
 *   // or
 *   const blocks = nest(cursor, spec);
 */

import type { Cursor } from './types';
import type { LevelSpec } from './levels';
import { SessionConsumedError } from './errors';

interface GroupStep<TLevel extends string> {
  level: TLevel;
  child: TLevel;
}

export class GroupingEngine<TLevel extends string, TNode> {
  private consumed = false;
  private accumulators = new Map<TLevel, TNode[]>();
  /** Non-base levels, coarse → fine */
  private readonly steps: GroupStep<TLevel>[];

  constructor(
    private readonly cursor: Cursor<TLevel>,
    private readonly spec: LevelSpec<TLevel, TNode>
  ) {
    this.steps = spec.levels.slice(0, -1).map(level => ({
      level,
      child: spec.childOf(level),
    }));
  }

  /**
   * Consume the cursor and return the nodes of the coarsest level.
   * Errors from the cursor or a boxer propagate as-is.
   */
  run(): TNode[] {
    if (this.consumed) {
      throw new SessionConsumedError();
    }
    this.consumed = true;

    for (const level of this.spec.levels) {
      this.accumulators.set(level, []);
    }

    if (this.cursor.isEmpty()) {
      return this.accumulatorOf(this.spec.coarsestLevel);
    }

    do {
      this.visitLeaf();
    } while (this.cursor.advance());

    return this.accumulatorOf(this.spec.coarsestLevel);
  }

  private visitLeaf(): void {
    const { cursor, spec } = this;

    for (const { level, child } of this.steps) {
      if (cursor.isGroupStart(level)) {
        this.accumulators.set(child, []);
      }
    }

    const base = spec.baseLevel;
    const { text, confidence, box } = cursor.contentAt(base);
    this.accumulatorOf(base).push(spec.leafBoxer(text, confidence, box));

    for (let i = this.steps.length - 1; i >= 0; i--) {
      const { level, child } = this.steps[i];
      if (!cursor.isGroupEnd(level, child)) continue;

      const group = cursor.contentAt(level);
      const node = spec.groupBoxer(level)(
        this.accumulatorOf(child),
        group.text,
        group.box,
        group.confidence
      );
      this.accumulatorOf(level).push(node);
    }
  }

  private accumulatorOf(level: TLevel): TNode[] {
    let nodes = this.accumulators.get(level);
    if (!nodes) {
      nodes = [];
      this.accumulators.set(level, nodes);
    }
    return nodes;
  }
}

/**
 * One-shot grouping session
 */
export function nest<TLevel extends string, TNode>(
  cursor: Cursor<TLevel>,
  spec: LevelSpec<TLevel, TNode>
): TNode[] {
  return new GroupingEngine(cursor, spec).run();
}
