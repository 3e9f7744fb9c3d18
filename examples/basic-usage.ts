import { readFile } from 'node:fs/promises';
import {
  LevelSpec,
  buildFromCursor,
  imageToString,
  layoutBuilder,
  lineBoxBuilder,
  loadFixture,
  nest,
} from '../src';

/**
 * Basic usage example for ocrnest
 */
async function main() {
  // 1. Fold a captured recognition result with your own boxers
  const spec = new LevelSpec(['line', 'word'], {
    leaf: (text: string) => text,
    group: (words: string[]) => words.join(' '),
  });
  console.log('--- Lines (custom boxers) ---');
  console.log(nest(loadFixture('receipt', spec.levels), spec));

  // 2. Or use a ready-made builder
  const lines = buildFromCursor(loadFixture('receipt', lineBoxBuilder().levels), lineBoxBuilder());
  console.log('\n--- Line boxes ---');
  for (const line of lines) {
    console.log(`${line.content.padEnd(14)} conf=${line.confidence} box=${JSON.stringify(line.position)}`);
  }

  const layout = layoutBuilder(['block', 'line', 'word']);
  const blocks = buildFromCursor(loadFixture('invoice', layout.levels), layout);
  console.log('\n--- Layout tree (image_to_data rows) ---');
  console.log(JSON.stringify(blocks, null, 2).substring(0, 400) + '...');

  // 3. Recognize an image (needs language data for tesseract.js)
  const imagePath = process.argv[2];
  if (imagePath) {
    console.log('\n--- OCR ---');
    console.log(await imageToString(await readFile(imagePath)));
  }
}

main().catch(err => {
  console.error(err);
  process.exitCode = 1;
});
