/**
 * Builders
 *
 * Ready-made level specs for the usual OCR outputs. A builder names the
 * levels it needs, the boxers that turn them into nodes, the page
 * segmentation mode to recognize with, and how to finish the coarsest nodes
 * into the value handed back to the caller.
 *
 * @example
 * const cursor = fromTesseractJs(page, lineBoxBuilder().levels);
 * const lines = buildFromCursor(cursor, lineBoxBuilder());
 * lines[0].content; // 'Total 12.50'
 */

import type { BoundingBox, Cursor, GroupBoxer, LevelBoxers } from './types';
import type { OcrLevel } from './adapters/types';
import { OCR_LEVELS, assertCanonicalOrder } from './adapters/types';
import { LevelSpec } from './levels';
import { nest } from './grouping';

// ============================================================================
// Builder Contract
// ============================================================================

/** Tesseract page segmentation mode, 0-13 */
export type PageSegMode = number;

export const PAGE_SEG_MODE = {
  OSD_ONLY: 0,
  AUTO_OSD: 1,
  AUTO: 3,
  SINGLE_COLUMN: 4,
  SINGLE_BLOCK: 6,
  SINGLE_LINE: 7,
  SINGLE_WORD: 8,
  SPARSE_TEXT: 11,
} as const;

export interface Builder<TLevel extends OcrLevel, TNode, TOut> {
  name: BuilderName;
  levels: readonly TLevel[];
  boxers: LevelBoxers<TLevel, TNode>;
  pageSegMode: PageSegMode;
  charWhitelist?: string;
  finish(nodes: TNode[]): TOut;
}

export type BuilderName = 'text' | 'digits' | 'word-box' | 'line-box' | 'layout';

export function getAvailableBuilders(): BuilderName[] {
  return ['text', 'digits', 'word-box', 'line-box', 'layout'];
}

/**
 * Run one grouping session over `cursor` and finish it with `builder`
 */
export function buildFromCursor<TLevel extends OcrLevel, TNode, TOut>(
  cursor: Cursor<TLevel>,
  builder: Builder<TLevel, TNode, TOut>
): TOut {
  const spec = new LevelSpec(builder.levels, builder.boxers);
  return builder.finish(nest(cursor, spec));
}

// ============================================================================
// Plain Text
// ============================================================================

type TextLevel = 'block' | 'paragraph' | 'line' | 'word';

const TEXT_LEVELS: readonly TextLevel[] = ['block', 'paragraph', 'line', 'word'];

/**
 * Words joined by spaces, lines and paragraphs by newlines, blocks by a
 * blank line.
 */
export function textBuilder(pageSegMode: PageSegMode = PAGE_SEG_MODE.AUTO): Builder<TextLevel, string, string> {
  return {
    name: 'text',
    levels: TEXT_LEVELS,
    pageSegMode,
    boxers: {
      leaf: text => text.trim(),
      groups: {
        line: words => words.filter(Boolean).join(' '),
        paragraph: lines => lines.filter(Boolean).join('\n'),
        block: paragraphs => paragraphs.filter(Boolean).join('\n'),
      },
    },
    finish: blocks => blocks.filter(Boolean).join('\n\n'),
  };
}

export function digitBuilder(pageSegMode: PageSegMode = PAGE_SEG_MODE.AUTO): Builder<TextLevel, string, string> {
  return {
    ...textBuilder(pageSegMode),
    name: 'digits',
    charWhitelist: '0123456789-.',
  };
}

// ============================================================================
// Word and Line Boxes
// ============================================================================

export interface WordBox {
  kind: 'word';
  content: string;
  position: BoundingBox;
  confidence: number;
}

export interface LineBox {
  kind: 'line';
  wordBoxes: WordBox[];
  content: string;
  position: BoundingBox;
  confidence: number;
}

function isWordBox(node: WordBox | LineBox): node is WordBox {
  return node.kind === 'word';
}

function wordBox(text: string, confidence: number, position: BoundingBox): WordBox {
  return { kind: 'word', content: text, position, confidence };
}

export function wordBoxBuilder(pageSegMode: PageSegMode = PAGE_SEG_MODE.AUTO): Builder<'word', WordBox, WordBox[]> {
  return {
    name: 'word-box',
    levels: ['word'],
    pageSegMode,
    boxers: { leaf: wordBox },
    finish: words => words.filter(w => w.content.trim() !== ''),
  };
}

export function lineBoxBuilder(
  pageSegMode: PageSegMode = PAGE_SEG_MODE.AUTO
): Builder<'line' | 'word', WordBox | LineBox, LineBox[]> {
  return {
    name: 'line-box',
    levels: ['line', 'word'],
    pageSegMode,
    boxers: {
      leaf: wordBox,
      group: (children, _text, position, confidence) => {
        const wordBoxes = children.filter(isWordBox).filter(w => w.content.trim() !== '');
        return {
          kind: 'line',
          wordBoxes,
          content: wordBoxes.map(w => w.content).join(' '),
          position,
          confidence,
        };
      },
    },
    finish: nodes => nodes.filter((n): n is LineBox => !isWordBox(n)),
  };
}

// ============================================================================
// Layout Tree
// ============================================================================

export interface LayoutLeaf<TLevel extends OcrLevel = OcrLevel> {
  level: TLevel;
  text: string;
  confidence: number;
  box: BoundingBox;
}

export interface LayoutGroup<TLevel extends OcrLevel = OcrLevel> {
  level: TLevel;
  children: LayoutNode<TLevel>[];
  text: string;
  confidence: number;
  box: BoundingBox;
}

export type LayoutNode<TLevel extends OcrLevel = OcrLevel> = LayoutLeaf<TLevel> | LayoutGroup<TLevel>;

export function isLayoutGroup<TLevel extends OcrLevel>(node: LayoutNode<TLevel>): node is LayoutGroup<TLevel> {
  return 'children' in node;
}

/**
 * Full tree over any ordered subset of the OCR levels (all five by default)
 */
export function layoutBuilder(
  levels: readonly OcrLevel[] = OCR_LEVELS,
  pageSegMode: PageSegMode = PAGE_SEG_MODE.AUTO
): Builder<OcrLevel, LayoutNode, LayoutNode[]> {
  assertCanonicalOrder(levels);
  const base = levels[levels.length - 1];
  const groups: Partial<Record<OcrLevel, GroupBoxer<LayoutNode>>> = {};
  for (const level of levels.slice(0, -1)) {
    groups[level] = (children, text, box, confidence) => ({ level, children, text, confidence, box });
  }

  return {
    name: 'layout',
    levels,
    pageSegMode,
    boxers: {
      leaf: (text, confidence, box) => ({ level: base, text, confidence, box }),
      groups,
    },
    finish: nodes => nodes,
  };
}

/**
 * Depth-first leaf texts of a layout tree, in document order
 */
export function layoutLeafTexts(nodes: LayoutNode[]): string[] {
  return nodes.flatMap(n => (isLayoutGroup(n) ? layoutLeafTexts(n.children) : [n.text]));
}
