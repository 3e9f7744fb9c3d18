/**
 * Core Types
 *
 * A flat stream of leaves, folded into a tree:
 *   Cursor (leaf by leaf) → GroupingEngine → Node[]
 *
 * The engine knows nothing about the nodes it produces. Boxers build them,
 * the engine only stores them and hands them back as children.
 */

// ============================================================================
// Geometry
// ============================================================================

export type Point = [x: number, y: number];

/** Upper-left and lower-right corners, in the cursor's coordinate space */
export type BoundingBox = [topLeft: Point, bottomRight: Point];

// ============================================================================
// Leaf Content
// ============================================================================

export interface LeafContent {
  text: string;
  confidence: number;
  box: BoundingBox;
}

// ============================================================================
// Boxers
// ============================================================================

/** Reducer for the finest (base) level */
export type LeafBoxer<TNode> = (
  text: string,
  confidence: number,
  box: BoundingBox
) => TNode;

/**
 * Reducer for every coarser level.
 * `children` are the nodes built for the next-finer level, in visit order.
 */
export type GroupBoxer<TNode> = (
  children: TNode[],
  text: string,
  box: BoundingBox,
  confidence: number
) => TNode;

export interface LevelBoxers<TLevel extends string, TNode> {
  leaf: LeafBoxer<TNode>;
  /** Default boxer for every non-base level */
  group?: GroupBoxer<TNode>;
  /** Per-level overrides, checked before `group` */
  groups?: Partial<Record<TLevel, GroupBoxer<TNode>>>;
}

// ============================================================================
// Cursor
// ============================================================================

/**
 * One-directional stepper over leaves.
 *
 * Starts positioned on the first leaf. Every query may be repeated at every
 * declared level without moving the cursor; only `advance()` moves it.
 */
export interface Cursor<TLevel extends string> {
  /** True when there is no leaf at all. Checked once, before any other call. */
  isEmpty(): boolean;
  /** Content of the group (or leaf) the current leaf belongs to at `level` */
  contentAt(level: TLevel): LeafContent;
  /** Current leaf is the first leaf of a new group at `level` */
  isGroupStart(level: TLevel): boolean;
  /** Current leaf is the last leaf of its group at `level` */
  isGroupEnd(level: TLevel, childLevel: TLevel): boolean;
  /** Moves to the next leaf; false once the stream is exhausted */
  advance(): boolean;
}
