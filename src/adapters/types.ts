/**
 * Shared types for backend adapters.
 *
 * Every adapter turns a backend's recognition result into a Cursor over the
 * canonical OCR hierarchy. Vendor result shapes are kept loose: only the
 * fields the adapters read are declared.
 */

import type { LeafContent } from '../types';
import { InvalidLevelError } from '../errors';

/** Canonical OCR hierarchy, coarsest first */
export const OCR_LEVELS = ['block', 'paragraph', 'line', 'word', 'symbol'] as const;

export type OcrLevel = (typeof OCR_LEVELS)[number];

export function isOcrLevel(level: string): level is OcrLevel {
  return OCR_LEVELS.some(l => l === level);
}

export function ocrLevelRank(level: OcrLevel): number {
  return OCR_LEVELS.indexOf(level);
}

/**
 * Reject unknown levels and subsets that are not coarse → fine.
 */
export function assertCanonicalOrder(levels: readonly string[]): void {
  let previous = -1;
  for (const level of levels) {
    if (!isOcrLevel(level)) {
      throw new InvalidLevelError(level, `Unknown OCR level: ${level}. Expected one of: ${OCR_LEVELS.join(', ')}`);
    }
    const rank = ocrLevelRank(level);
    if (rank <= previous) {
      throw new InvalidLevelError(level, `OCR levels must be ordered coarse to fine without repeats: ${levels.join(', ')}`);
    }
    previous = rank;
  }
}

/** Sort any subset of OCR levels coarse → fine */
export function sortLevels(levels: readonly OcrLevel[]): OcrLevel[] {
  return [...new Set(levels)].sort((a, b) => ocrLevelRank(a) - ocrLevelRank(b));
}

/**
 * Backend-neutral page tree, one node per recognized element.
 * `key` identifies the element across the whole result.
 */
export interface PageNode {
  level: OcrLevel;
  key: string;
  content: LeafContent;
  children: PageNode[];
}
