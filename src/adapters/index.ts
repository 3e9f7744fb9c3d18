/**
 * Backend adapters: recognition results → Cursor.
 *
 * Each adapter normalizes a vendor result into the canonical OCR hierarchy
 * and hands back an in-memory cursor over its leaves.
 */

// Shared types
export type { OcrLevel, PageNode } from './types';
export { OCR_LEVELS, isOcrLevel, assertCanonicalOrder, sortLevels } from './types';

// Keyed leaves (any flat-to-tree source)
export { KeyedLeafCursor, flattenPageTree } from './keyed';
export type { KeyedGroup, KeyedLeaf } from './keyed';

// Tesseract (tesseract.js and pytesseract)
export {
  fromTesseractJs,
  fromPytesseract,
  tesseractJsPageTree,
  pytesseractPageTree,
} from './tesseract';
export type {
  TesseractJsPage,
  TesseractJsBlock,
  TesseractJsParagraph,
  TesseractJsLine,
  TesseractJsWord,
  TesseractJsSymbol,
  TesseractJsBbox,
  TesseractDataDict,
} from './tesseract';
