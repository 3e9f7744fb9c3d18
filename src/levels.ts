/**
 * LevelSpec - the shape of the tree
 *
 * Ordered coarse → fine. The last level is the base: its boxer turns leaf
 * content into nodes. Every other level folds the nodes of the next-finer
 * level into one group node.
 *
 * Usage:
 *   const spec = new LevelSpec(['line', 'word'], {
 *     leaf: (text) => text,
 *     group: (words) => words.join(' '),
 *   });
 */

import type { GroupBoxer, LeafBoxer, LevelBoxers } from './types';
import {
  DuplicateLevelError,
  EmptyLevelSpecError,
  InvalidLevelError,
  MissingBoxerError,
} from './errors';

export class LevelSpec<TLevel extends string, TNode> {
  readonly levels: readonly TLevel[];
  readonly leafBoxer: LeafBoxer<TNode>;
  private groupBoxers = new Map<TLevel, GroupBoxer<TNode>>();
  private index = new Map<TLevel, number>();
  private names = new Set<string>();

  constructor(levels: readonly TLevel[], boxers: LevelBoxers<TLevel, TNode>) {
    if (levels.length === 0) {
      throw new EmptyLevelSpecError();
    }

    levels.forEach((level, i) => {
      if (this.index.has(level)) {
        throw new DuplicateLevelError(level);
      }
      this.index.set(level, i);
      this.names.add(level);
    });

    for (const level of levels.slice(0, -1)) {
      const boxer = boxers.groups?.[level] ?? boxers.group;
      if (!boxer) {
        throw new MissingBoxerError(level);
      }
      this.groupBoxers.set(level, boxer);
    }

    this.levels = [...levels];
    this.leafBoxer = boxers.leaf;
  }

  get baseLevel(): TLevel {
    return this.levels[this.levels.length - 1];
  }

  get coarsestLevel(): TLevel {
    return this.levels[0];
  }

  has(level: string): level is TLevel {
    return this.names.has(level);
  }

  indexOf(level: TLevel): number {
    const i = this.index.get(level);
    if (i === undefined) {
      throw new InvalidLevelError(level);
    }
    return i;
  }

  /** Boxer of a non-base level */
  groupBoxer(level: TLevel): GroupBoxer<TNode> {
    const boxer = this.groupBoxers.get(level);
    if (!boxer) {
      throw new InvalidLevelError(level, `Not a group level: ${level}`);
    }
    return boxer;
  }

  /** Next-finer level of a non-base level */
  childOf(level: TLevel): TLevel {
    const i = this.indexOf(level);
    if (i === this.levels.length - 1) {
      throw new InvalidLevelError(level, `Base level has no child level: ${level}`);
    }
    return this.levels[i + 1];
  }
}
