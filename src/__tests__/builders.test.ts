import { describe, it, expect } from 'vitest';
import {
  buildFromCursor,
  digitBuilder,
  getAvailableBuilders,
  isLayoutGroup,
  layoutBuilder,
  layoutLeafTexts,
  lineBoxBuilder,
  textBuilder,
  wordBoxBuilder,
} from '../builders';
import { loadFixture } from '../fixtures';
import { fromTesseractJs } from '../adapters/tesseract';
import { InvalidLevelError } from '../errors';

describe('textBuilder', () => {
  it('joins words, lines and blocks', () => {
    const builder = textBuilder();
    const text = buildFromCursor(loadFixture('receipt', builder.levels), builder);

    expect(text).toBe('CAFE LUNA\nTotal 12.50\n\nThanks!');
  });

  it('builds an empty string from an empty page', () => {
    const builder = textBuilder();
    const cursor = fromTesseractJs({ text: '', confidence: 0, blocks: [] }, builder.levels);

    expect(buildFromCursor(cursor, builder)).toBe('');
  });

  it('reads image_to_data rows', () => {
    const builder = textBuilder();

    expect(buildFromCursor(loadFixture('invoice', builder.levels), builder)).toBe('Invoice #12345\nDue 2025-02-14');
  });
});

describe('digitBuilder', () => {
  it('restricts recognition to digits', () => {
    const builder = digitBuilder();

    expect(builder.name).toBe('digits');
    expect(builder.charWhitelist).toBe('0123456789-.');
    expect(builder.levels).toEqual(textBuilder().levels);
  });
});

describe('wordBoxBuilder', () => {
  it('returns one box per word', () => {
    const builder = wordBoxBuilder();
    const words = buildFromCursor(loadFixture('receipt', builder.levels), builder);

    expect(words.map(w => w.content)).toEqual(['CAFE', 'LUNA', 'Total', '12.50', 'Thanks!']);
    expect(words[0]).toEqual({
      kind: 'word',
      content: 'CAFE',
      position: [[10, 10], [50, 30]],
      confidence: 93,
    });
  });
});

describe('lineBoxBuilder', () => {
  it('groups word boxes into lines with the line confidence', () => {
    const builder = lineBoxBuilder();
    const lines = buildFromCursor(loadFixture('receipt', builder.levels), builder);

    expect(lines.map(l => l.content)).toEqual(['CAFE LUNA', 'Total 12.50', 'Thanks!']);
    expect(lines.map(l => l.confidence)).toEqual([91.25, 85.75, 97]);
    expect(lines.map(l => l.wordBoxes.length)).toEqual([2, 2, 1]);
    expect(lines[1].position).toEqual([[10, 40], [120, 60]]);
  });

  it('leaves blank words out of the line text and word list', () => {
    const bbox = { x0: 0, y0: 0, x1: 10, y1: 10 };
    const word = (text: string) => ({ text, confidence: 70, bbox, symbols: [] });
    const builder = lineBoxBuilder();
    const cursor = fromTesseractJs({
      text: 'A  B\n',
      confidence: 70,
      blocks: [{
        text: 'A  B\n', confidence: 70, bbox,
        paragraphs: [{
          text: 'A  B\n', confidence: 70, bbox,
          lines: [{ text: 'A  B\n', confidence: 80, bbox, words: [word('A'), word(' '), word('B')] }],
        }],
      }],
    }, builder.levels);

    const [line] = buildFromCursor(cursor, builder);

    expect(line.content).toBe('A B');
    expect(line.wordBoxes.map(w => w.content)).toEqual(['A', 'B']);
    expect(line.confidence).toBe(80);
  });

  it('averages word confidence for image_to_data lines', () => {
    const builder = lineBoxBuilder();
    const lines = buildFromCursor(loadFixture('invoice', builder.levels), builder);

    expect(lines.map(l => [l.content, l.confidence])).toEqual([
      ['Invoice #12345', 93.5],
      ['Due 2025-02-14', 89],
    ]);
  });
});

describe('layoutBuilder', () => {
  it('builds the full five-level tree by default', () => {
    const builder = layoutBuilder();
    const blocks = buildFromCursor(loadFixture('receipt', builder.levels), builder);

    expect(blocks).toHaveLength(2);
    expect(layoutLeafTexts(blocks).join('')).toBe('CAFELUNATotal12.50Thanks!');

    const [first] = blocks;
    expect(first.level).toBe('block');
    expect(isLayoutGroup(first) && first.children.length).toBe(1);

    const paragraph = isLayoutGroup(first) ? first.children[0] : undefined;
    expect(paragraph && isLayoutGroup(paragraph) && paragraph.children.map(l => l.text)).toEqual([
      'CAFE LUNA\n',
      'Total 12.50\n',
    ]);
  });

  it('keeps the level on every node', () => {
    const builder = layoutBuilder(['line', 'word']);
    const lines = buildFromCursor(loadFixture('invoice', builder.levels), builder);

    expect(lines.map(l => l.level)).toEqual(['line', 'line']);
    const words = lines.flatMap(l => (isLayoutGroup(l) ? l.children : []));
    expect(words.map(w => [w.level, w.text])).toEqual([
      ['word', 'Invoice'],
      ['word', '#12345'],
      ['word', 'Due'],
      ['word', '2025-02-14'],
    ]);
  });

  it('rejects levels out of order', () => {
    expect(() => layoutBuilder(['word', 'block'])).toThrow(InvalidLevelError);
  });
});

describe('getAvailableBuilders', () => {
  it('lists every builder', () => {
    expect(getAvailableBuilders()).toEqual(['text', 'digits', 'word-box', 'line-box', 'layout']);
  });
});
