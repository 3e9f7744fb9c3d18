/**
 * Sample Fixtures
 *
 * Recognition results captured as JSON, for demos and tests that should not
 * start an OCR worker.
 *
 * @example
 * import { loadFixture, buildFromCursor, lineBoxBuilder } from 'ocrnest';
 *
 * const cursor = loadFixture('receipt', ['line', 'word']);
 * buildFromCursor(cursor, lineBoxBuilder()).map(l => l.content);
 * // ['CAFE LUNA', 'Total 12.50', 'Thanks!']
 */

import type { OcrLevel } from './adapters/types';
import type { TesseractDataDict, TesseractJsPage } from './adapters/tesseract';
import type { KeyedLeafCursor } from './adapters/keyed';
import { fromPytesseract, fromTesseractJs } from './adapters/tesseract';
import receiptPage from './fixtures/receipt.tesseractjs.json';
import invoiceData from './fixtures/invoice.pytesseract.json';

// ============================================================================
// Fixture Types
// ============================================================================

export type FixtureData =
  | { source: 'tesseract.js'; description: string; page: TesseractJsPage }
  | { source: 'pytesseract'; description: string; data: TesseractDataDict };

export type FixtureName = 'receipt' | 'invoice';

// ============================================================================
// Exports
// ============================================================================

/**
 * Raw fixture data by name
 */
export const fixtures: Record<FixtureName, FixtureData> = {
  receipt: {
    source: 'tesseract.js',
    description: 'Two-block receipt, all five levels, one empty paragraph',
    page: receiptPage,
  },
  invoice: {
    source: 'pytesseract',
    description: 'image_to_data rows for two invoice lines, blank words included',
    data: invoiceData,
  },
};

export function listFixtures(): FixtureName[] {
  return ['receipt', 'invoice'];
}

export function getFixture(name: FixtureName): FixtureData {
  const fixture = fixtures[name];
  if (!fixture) {
    throw new Error(`Unknown fixture: ${name}. Available: ${listFixtures().join(', ')}`);
  }
  return fixture;
}

/**
 * Open a fresh cursor over a fixture at the given levels
 */
export function loadFixture<TLevel extends OcrLevel>(
  name: FixtureName,
  levels: readonly TLevel[]
): KeyedLeafCursor<TLevel> {
  const fixture = getFixture(name);
  return fixture.source === 'tesseract.js'
    ? fromTesseractJs(fixture.page, levels)
    : fromPytesseract(fixture.data, levels);
}
