/**
 * ocrnest
 *
 * Rebuilds the block → paragraph → line → word → symbol tree from the flat,
 * boundary-annotated leaf stream an OCR backend exposes.
 *
 * Structure: Cursor (leaf by leaf) → GroupingEngine → Node[]
 *
 * @example
 * const spec = new LevelSpec(['line', 'word'], {
 *   leaf: (text) => text,
 *   group: (words) => words.join(' '),
 * });
 * nest(fromTesseractJs(page, spec.levels), spec); // ['CAFE LUNA', ...]
 *
 * // Or let a builder pick levels and boxers
 * await imageToString(buffer);
 */

// Types
export type {
  Point,
  BoundingBox,
  LeafContent,
  LeafBoxer,
  GroupBoxer,
  LevelBoxers,
  Cursor,
} from './types';

// Errors
export {
  OcrNestError,
  InvalidLevelError,
  EmptyLevelSpecError,
  DuplicateLevelError,
  MissingBoxerError,
  SessionConsumedError,
  NoContentError,
  InvalidOptionsError,
  MalformedDataError,
  OcrBackendError,
} from './errors';
export type { ErrorCode, ErrorDetails } from './errors';

// Grouping core
export { LevelSpec } from './levels';
export { GroupingEngine, nest } from './grouping';

// Builders
export {
  PAGE_SEG_MODE,
  getAvailableBuilders,
  buildFromCursor,
  textBuilder,
  digitBuilder,
  wordBoxBuilder,
  lineBoxBuilder,
  layoutBuilder,
  isLayoutGroup,
  layoutLeafTexts,
} from './builders';
export type {
  Builder,
  BuilderName,
  PageSegMode,
  WordBox,
  LineBox,
  LayoutNode,
  LayoutLeaf,
  LayoutGroup,
} from './builders';

// Backend adapters (recognition result → Cursor)
export * from './adapters';

// OCR session (tesseract.js)
export {
  OcrOptionsZ,
  withWorker,
  imageToData,
  imageToString,
  imageToWordBoxes,
  imageToLineBoxes,
  detectOrientation,
  canDetectOrientation,
  getName,
  getVersion,
  isAvailable,
} from './ocr';
export type { OcrOptions, OcrImage, Orientation, Version, WorkerScopeOptions } from './ocr';

// Logging
export { createLogger } from './logger';
export type { Logger, LogLevel } from './logger';

// Sample fixtures (no OCR worker needed)
export { fixtures, listFixtures, getFixture, loadFixture } from './fixtures';
export type { FixtureData, FixtureName } from './fixtures';
