/**
 * KeyedLeafCursor - in-memory Cursor over pre-flattened leaves
 *
 * Each leaf carries, for every declared level, the key of the group it
 * belongs to and that group's content. Boundaries fall out of comparing keys
 * with the neighbouring leaves:
 *   start at L: key differs from the previous leaf's key at L (or no previous)
 *   end at L:   key differs from the next leaf's key at L (or no next)
 *
 * Groups must be contiguous: a key that reappears after another key counts as
 * a new group.
 */

import type { Cursor, LeafContent } from '../types';
import type { PageNode, OcrLevel } from './types';
import { InvalidLevelError } from '../errors';

export interface KeyedGroup {
  key: string;
  content: LeafContent;
}

export type KeyedLeaf<TLevel extends string> = ReadonlyMap<TLevel, KeyedGroup>;

export class KeyedLeafCursor<TLevel extends string> implements Cursor<TLevel> {
  private position = 0;
  private readonly declared: Set<string>;

  constructor(
    readonly levels: readonly TLevel[],
    private readonly leaves: readonly KeyedLeaf<TLevel>[]
  ) {
    this.declared = new Set(levels);
  }

  get length(): number {
    return this.leaves.length;
  }

  isEmpty(): boolean {
    return this.leaves.length === 0;
  }

  contentAt(level: TLevel): LeafContent {
    this.check(level);
    return groupOf(this.current(), level).content;
  }

  isGroupStart(level: TLevel): boolean {
    this.check(level);
    const previous = this.leaves[this.position - 1];
    return !previous || groupOf(previous, level).key !== groupOf(this.current(), level).key;
  }

  isGroupEnd(level: TLevel, childLevel: TLevel): boolean {
    this.check(level);
    this.check(childLevel);
    const next = this.leaves[this.position + 1];
    return !next || groupOf(next, level).key !== groupOf(this.current(), level).key;
  }

  advance(): boolean {
    if (this.position >= this.leaves.length) return false;
    this.position++;
    return this.position < this.leaves.length;
  }

  private current(): KeyedLeaf<TLevel> {
    const leaf = this.leaves[this.position];
    if (!leaf) {
      throw new RangeError(`Cursor is past its last leaf (${this.leaves.length} leaves)`);
    }
    return leaf;
  }

  private check(level: TLevel): void {
    if (!this.declared.has(level)) {
      throw new InvalidLevelError(level, `Level not declared for this cursor: ${level}`);
    }
  }
}

/**
 * Flatten a page tree into keyed leaves.
 *
 * Leaves are the nodes of the finest declared level; each records its
 * ancestors at every declared level. Levels that are not declared are walked
 * through but not recorded. Groups without a leaf below them produce nothing.
 */
export function flattenPageTree<TLevel extends OcrLevel>(
  roots: readonly PageNode[],
  levels: readonly TLevel[]
): KeyedLeaf<TLevel>[] {
  const base = levels[levels.length - 1];
  const declared = new Set<OcrLevel>(levels);
  const leaves: KeyedLeaf<TLevel>[] = [];

  const traverse = (node: PageNode, path: Partial<Record<OcrLevel, KeyedGroup>>) => {
    let here = path;
    if (declared.has(node.level)) {
      here = { ...path };
      here[node.level] = { key: node.key, content: node.content };
    }

    if (node.level === base) {
      leaves.push(pickLevels(here, levels));
      return;
    }
    node.children.forEach(child => traverse(child, here));
  };

  roots.forEach(root => traverse(root, {}));
  return leaves;
}

function pickLevels<TLevel extends OcrLevel>(
  path: Partial<Record<OcrLevel, KeyedGroup>>,
  levels: readonly TLevel[]
): KeyedLeaf<TLevel> {
  const leaf = new Map<TLevel, KeyedGroup>();
  for (const level of levels) {
    const group = path[level];
    if (!group) {
      throw new InvalidLevelError(level, `Result has no ${level} above this leaf`);
    }
    leaf.set(level, group);
  }
  return leaf;
}

function groupOf<TLevel extends string>(leaf: KeyedLeaf<TLevel>, level: TLevel): KeyedGroup {
  const group = leaf.get(level);
  if (!group) {
    throw new InvalidLevelError(level, `Leaf carries no group for level: ${level}`);
  }
  return group;
}
