import type { BoundingBox, LeafContent } from '../types';
import type { OcrLevel, PageNode } from './types';
import { assertCanonicalOrder } from './types';
import { KeyedLeafCursor, flattenPageTree } from './keyed';
import { InvalidLevelError, MalformedDataError } from '../errors';

/**
 * Tesseract adapters (tesseract.js or pytesseract)
 *
 * tesseract.js: recognize(image, {}, { blocks: true }) → data.blocks
 *   blocks → paragraphs → lines → words → symbols
 *   Bbox format: x0, y0, x1, y1 in PIXELS (already corner points)
 * pytesseract: image_to_data(output_type=Output.DICT)
 *   one row per element, level 1=page ... 5=word, no symbols
 *   Bbox format: left, top, width, height in PIXELS
 *
 * Confidence is passed through on the backend's own 0-100 scale.
 */

// tesseract.js output format (only the fields read here)
export interface TesseractJsBbox {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

export interface TesseractJsElement {
  text: string;
  confidence: number;
  bbox: TesseractJsBbox;
}

export type TesseractJsSymbol = TesseractJsElement;

export interface TesseractJsWord extends TesseractJsElement {
  symbols: TesseractJsSymbol[];
}

export interface TesseractJsLine extends TesseractJsElement {
  words: TesseractJsWord[];
}

export interface TesseractJsParagraph extends TesseractJsElement {
  lines: TesseractJsLine[];
}

export interface TesseractJsBlock extends TesseractJsElement {
  paragraphs: TesseractJsParagraph[];
}

export interface TesseractJsPage {
  text: string;
  confidence: number;
  blocks: TesseractJsBlock[] | null;
}

// pytesseract output format (image_to_data with DICT output)
export interface TesseractDataDict {
  level: number[];
  page_num: number[];
  block_num: number[];
  par_num: number[];
  line_num: number[];
  word_num: number[];
  left: number[];
  top: number[];
  width: number[];
  height: number[];
  conf: number[];  // -1 for non-text, 0-100 for text
  text: string[];
}

function toBox(bbox: TesseractJsBbox): BoundingBox {
  return [
    [bbox.x0, bbox.y0],
    [bbox.x1, bbox.y1],
  ];
}

function toContent(element: TesseractJsElement): LeafContent {
  return {
    text: element.text,
    confidence: element.confidence,
    box: toBox(element.bbox),
  };
}

function node(level: OcrLevel, key: string, element: TesseractJsElement, children: PageNode[]): PageNode {
  return { level, key, content: toContent(element), children };
}

/**
 * Normalize a tesseract.js page into the backend-neutral page tree
 */
export function tesseractJsPageTree(page: TesseractJsPage): PageNode[] {
  return (page.blocks ?? []).map((block, b) =>
    node('block', `${b}`, block, block.paragraphs.map((par, p) =>
      node('paragraph', `${b}.${p}`, par, par.lines.map((line, l) =>
        node('line', `${b}.${p}.${l}`, line, line.words.map((word, w) =>
          node('word', `${b}.${p}.${l}.${w}`, word, word.symbols.map((symbol, s) =>
            node('symbol', `${b}.${p}.${l}.${w}.${s}`, symbol, [])
          ))
        ))
      ))
    ))
  );
}

/**
 * Cursor over a tesseract.js recognize() page
 */
export function fromTesseractJs<TLevel extends OcrLevel>(
  page: TesseractJsPage,
  levels: readonly TLevel[]
): KeyedLeafCursor<TLevel> {
  assertCanonicalOrder(levels);
  return new KeyedLeafCursor<TLevel>(levels, flattenPageTree(tesseractJsPageTree(page), levels));
}

// ----------------------------------------------------------------------------
// pytesseract
// ----------------------------------------------------------------------------

const DATA_LEVELS: Record<number, OcrLevel> = {
  2: 'block',
  3: 'paragraph',
  4: 'line',
  5: 'word',
};

interface DataRow {
  level: OcrLevel;
  path: number[];
  content: LeafContent;
}

function readRows(data: TesseractDataDict): DataRow[] {
  const rows: DataRow[] = [];

  for (let i = 0; i < data.level.length; i++) {
    const level = DATA_LEVELS[data.level[i]];
    if (!level) continue; // page rows

    const left = data.left[i];
    const top = data.top[i];
    rows.push({
      level,
      path: [data.page_num[i], data.block_num[i], data.par_num[i], data.line_num[i], data.word_num[i]],
      content: {
        text: data.text[i]?.trim() ?? '',
        confidence: data.conf[i],
        box: [
          [left, top],
          [left + data.width[i], top + data.height[i]],
        ],
      },
    });
  }

  return rows;
}

/** Number of path segments that identify an element at `level` (page included) */
const PATH_DEPTH: Record<OcrLevel, number> = {
  block: 2,
  paragraph: 3,
  line: 4,
  word: 5,
  symbol: 6,
};

/**
 * Normalize image_to_data output into the backend-neutral page tree.
 *
 * Words with empty text or negative confidence are dropped, and so is every
 * group left without words. A group's confidence is the mean of its words'.
 */
export function pytesseractPageTree(data: TesseractDataDict): PageNode[] {
  const rows = readRows(data);
  const keyOf = (row: DataRow) => row.path.slice(0, PATH_DEPTH[row.level]).join('.');

  const roots: PageNode[] = [];
  const open = new Map<string, PageNode>();

  for (const row of rows) {
    if (row.level === 'word' && (!row.content.text || row.content.confidence < 0)) continue;

    const key = keyOf(row);
    const created: PageNode = { level: row.level, key, content: row.content, children: [] };
    open.set(key, created);

    if (row.level === 'block') {
      roots.push(created);
      continue;
    }
    const parentKey = row.path.slice(0, PATH_DEPTH[row.level] - 1).join('.');
    const parent = open.get(parentKey);
    if (!parent) {
      throw new MalformedDataError(`Orphan ${row.level} row: ${key}`, { level: row.level, key, parentKey });
    }
    parent.children.push(created);
  }

  return prune(roots);
}

function prune(nodes: PageNode[]): PageNode[] {
  const kept: PageNode[] = [];
  for (const n of nodes) {
    if (n.level === 'word') {
      kept.push(n);
      continue;
    }
    const children = prune(n.children);
    if (children.length === 0) continue;
    const words = collectWords(children);
    const confidence = words.reduce((sum, w) => sum + w.content.confidence, 0) / words.length;
    kept.push({ ...n, children, content: { ...n.content, confidence } });
  }
  return kept;
}

function collectWords(nodes: PageNode[]): PageNode[] {
  return nodes.flatMap(n => (n.level === 'word' ? [n] : collectWords(n.children)));
}

/**
 * Cursor over pytesseract image_to_data output. No symbol level.
 */
export function fromPytesseract<TLevel extends OcrLevel>(
  data: TesseractDataDict,
  levels: readonly TLevel[]
): KeyedLeafCursor<TLevel> {
  assertCanonicalOrder(levels);
  const symbol = levels.find(level => level === 'symbol');
  if (symbol) {
    throw new InvalidLevelError(symbol, 'image_to_data output has no symbol level');
  }
  return new KeyedLeafCursor<TLevel>(levels, flattenPageTree(pytesseractPageTree(data), levels));
}
