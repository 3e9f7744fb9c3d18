/**
 * OCR session over tesseract.js
 *
 * Every call owns one worker for its whole lifetime: created before the
 * image is submitted, terminated on every way out (result, thrown error,
 * empty page). The grouping engine runs inside that scope, on the page the
 * worker returned.
 *
 * @example
 * const text = await imageToString(buffer, { lang: 'eng' });
 * const lines = await imageToData(buffer, lineBoxBuilder());
 */

import Tesseract from 'tesseract.js';
import { z } from 'zod';
import tesseractPackage from 'tesseract.js/package.json';
import type { OcrLevel } from './adapters/types';
import type { Builder, LineBox, WordBox } from './builders';
import { buildFromCursor, lineBoxBuilder, textBuilder, wordBoxBuilder } from './builders';
import { fromTesseractJs } from './adapters/tesseract';
import { InvalidOptionsError, NoContentError, OcrBackendError } from './errors';
import { createLogger } from './logger';

const log = createLogger('ocrnest.ocr');

// ============================================================================
// Options
// ============================================================================

export const OcrOptionsZ = z.object({
  lang: z.union([z.string().min(1), z.array(z.string().min(1)).nonempty()]).default('eng'),
  /** Overrides the builder's page segmentation mode */
  pageSegMode: z.number().int().min(0).max(13).optional(),
  /** 0 legacy, 1 LSTM, 2 both, 3 default */
  oem: z.number().int().min(0).max(3).default(1),
  charWhitelist: z.string().optional(),
  langPath: z.string().min(1).optional(),
  cachePath: z.string().min(1).optional(),
});

export type OcrOptions = z.input<typeof OcrOptionsZ> & {
  /** Progress callback handed to the worker */
  logger?: (message: Tesseract.LoggerMessage) => void;
};

type ResolvedOptions = z.output<typeof OcrOptionsZ> & Pick<OcrOptions, 'logger'>;

export type OcrImage = Tesseract.ImageLike;

function resolveOptions(options: OcrOptions = {}): ResolvedOptions {
  const { logger, ...rest } = options;
  const parsed = OcrOptionsZ.safeParse(rest);
  if (!parsed.success) {
    throw new InvalidOptionsError('Invalid OCR options', { issues: parsed.error.issues });
  }
  return { ...parsed.data, logger };
}

function toPsm(mode: number): Tesseract.PSM {
  const psm = Object.values(Tesseract.PSM).find(value => value === String(mode));
  if (psm === undefined) {
    throw new InvalidOptionsError(`Unsupported page segmentation mode: ${mode}`);
  }
  return psm;
}

// ============================================================================
// Worker Scope
// ============================================================================

export interface WorkerScopeOptions {
  /** Load the legacy engine and models (needed for orientation detection) */
  legacy?: boolean;
}

/**
 * Run `fn` with a fresh worker and terminate the worker afterwards,
 * whether `fn` resolves or throws.
 */
export async function withWorker<T>(
  options: OcrOptions,
  fn: (worker: Tesseract.Worker) => Promise<T>,
  scope: WorkerScopeOptions = {}
): Promise<T> {
  const resolved = resolveOptions(options);
  const oem = scope.legacy ? Tesseract.OEM.TESSERACT_ONLY : resolved.oem;

  let worker: Tesseract.Worker;
  try {
    worker = await Tesseract.createWorker(resolved.lang, oem, {
      ...(resolved.langPath ? { langPath: resolved.langPath } : {}),
      ...(resolved.cachePath ? { cachePath: resolved.cachePath } : {}),
      ...(resolved.logger ? { logger: resolved.logger } : {}),
      ...(scope.legacy ? { legacyCore: true, legacyLang: true } : {}),
    });
  } catch (err) {
    log.error('Worker init failed:', err);
    throw new OcrBackendError('Failed to initialize Tesseract worker', err, { lang: resolved.lang });
  }

  log.debug(`Worker ready (lang=${String(resolved.lang)}, oem=${oem})`);
  try {
    return await fn(worker);
  } finally {
    await terminate(worker);
  }
}

async function terminate(worker: Tesseract.Worker): Promise<void> {
  try {
    await worker.terminate();
    log.debug('Worker terminated');
  } catch (err) {
    // The session result (or its error) wins over a failed cleanup
    log.warn('Worker terminate failed:', err);
  }
}

// ============================================================================
// Recognition
// ============================================================================

/**
 * Recognize `image` and fold the result with `builder`
 */
export async function imageToData<TLevel extends OcrLevel, TNode, TOut>(
  image: OcrImage,
  builder: Builder<TLevel, TNode, TOut>,
  options: OcrOptions = {}
): Promise<TOut> {
  const resolved = resolveOptions(options);
  const pageSegMode = toPsm(resolved.pageSegMode ?? builder.pageSegMode);
  const whitelist = resolved.charWhitelist ?? builder.charWhitelist;

  return withWorker(options, async worker => {
    let page: Tesseract.Page;
    try {
      await worker.setParameters({
        tessedit_pageseg_mode: pageSegMode,
        ...(whitelist !== undefined ? { tessedit_char_whitelist: whitelist } : {}),
      });
      const { data } = await worker.recognize(image, {}, { blocks: true });
      page = data;
    } catch (err) {
      log.error('Recognition failed:', err);
      throw new OcrBackendError('Tesseract recognition failed', err, { builder: builder.name });
    }

    if (!page.blocks) {
      throw new NoContentError('no script detected', { builder: builder.name });
    }
    return buildFromCursor(fromTesseractJs(page, builder.levels), builder);
  });
}

export function imageToString(image: OcrImage, options: OcrOptions = {}): Promise<string> {
  return imageToData(image, textBuilder(), options);
}

export function imageToWordBoxes(image: OcrImage, options: OcrOptions = {}): Promise<WordBox[]> {
  return imageToData(image, wordBoxBuilder(), options);
}

export function imageToLineBoxes(image: OcrImage, options: OcrOptions = {}): Promise<LineBox[]> {
  return imageToData(image, lineBoxBuilder(), options);
}

// ============================================================================
// Orientation
// ============================================================================

export interface Orientation {
  angle: 0 | 90 | 180 | 270;
  confidence: number;
  script?: string;
}

const ANGLES = [0, 90, 180, 270] as const;

// Detection reads only the osd model; caller languages ride along
function withOsd(lang: OcrOptions['lang']): string | [string, ...string[]] {
  if (lang === undefined) return 'osd';
  const langs = typeof lang === 'string' ? [lang] : lang;
  return ['osd', ...langs.filter(l => l !== 'osd')];
}

export function canDetectOrientation(): boolean {
  return true;
}

/**
 * Orientation and script detection (legacy engine, `osd` model by default)
 */
export async function detectOrientation(image: OcrImage, options: OcrOptions = {}): Promise<Orientation> {
  const osdOptions: OcrOptions = { ...options, lang: withOsd(options.lang) };

  return withWorker(osdOptions, async worker => {
    let detected: Tesseract.DetectResult;
    try {
      detected = await worker.detect(image);
    } catch (err) {
      log.error('Orientation detection failed:', err);
      throw new OcrBackendError('Tesseract orientation detection failed', err);
    }

    const { orientation_degrees: degrees, orientation_confidence: confidence, script } = detected.data;
    if (confidence === null || confidence <= 0) {
      throw new NoContentError('no script detected');
    }
    const angle = ANGLES.find(a => a === degrees);
    if (angle === undefined) {
      throw new OcrBackendError(`Unexpected orientation: ${String(degrees)}`, undefined, { degrees });
    }

    return { angle, confidence, ...(script ? { script } : {}) };
  }, { legacy: true });
}

// ============================================================================
// Backend Info
// ============================================================================

export type Version = [major: number, minor: number, patch: number];

/** First tesseract.js major with opt-in `blocks` output */
const MIN_MAJOR = 5;

export function getName(): string {
  return 'Tesseract (tesseract.js)';
}

/** Version of the installed tesseract.js package */
export function getVersion(): Version {
  const [major = 0, minor = 0, patch = 0] = tesseractPackage.version
    .split(/[.-]/)
    .map(part => Number.parseInt(part, 10));
  return [major, minor, patch];
}

export function isAvailable(): boolean {
  const [major] = getVersion();
  if (major < MIN_MAJOR) {
    log.warn(`tesseract.js ${getVersion().join('.')} has no block output; ${MIN_MAJOR}.x or later is required`);
    return false;
  }
  return true;
}
