/**
 * Label crop configuration: presets, merging and validation.
 *
 * Resolution order: preset -> config file -> command-line flags. Every layer is
 * a partial, untyped object (parsed JSON or flags); `resolveConfig` checks the
 * merged result and reports every problem at once.
 */

import { DEFAULT_MIN_BARCODE_DIGITS } from './BarcodeAnchorLocator';
import {
  DEFAULT_INTENSITY_THRESHOLD,
  DEFAULT_TARGET_RATIO,
} from './ContentMaskCropDetector';
import type { CropPolicy, CropPolicyKind } from './CropGeometryNormalizer';
import { LabelConfigError } from './errors';
import { isGrammarKind, type GrammarKind } from './IdentifierExtractor';
import type { DuplicatePolicy } from './PageGroupAggregator';
import type { ReferenceSize } from './types';

export type DetectionStrategy = 'text-columns' | 'content-mask';
export type OutputMode = 'render' | 'crop-in-place';
export type ArchiveCompression = 'deflate' | 'store';
export type PresetName = 'hangtag' | 'carton';

export interface LabelCropConfig {
  detection: DetectionStrategy;
  grammar: GrammarKind;
  /** Labels across the page (text-columns) */
  columns: number;
  paddingX: number;
  paddingY: number;
  minBarcodeDigits: number;
  /** width / height of the content-mask crop */
  targetAspectRatio: number;
  /** 0..255; darker pixels are content */
  intensityThreshold: number;
  /** Rasterization scale for content-mask detection */
  rasterZoom: number;
  cropPolicy: CropPolicy;
  /** Seeds the first-seen reference size instead of the first label */
  referenceSize: ReferenceSize | null;
  duplicates: DuplicatePolicy;
  output: OutputMode;
  /** Output files are named "<filePrefix> <identifier>.pdf" */
  filePrefix: string;
  /** Identical pages per output file */
  copies: number;
  copiesByIdentifier: Record<string, number>;
  archive: {
    fileName: string;
    compression: ArchiveCompression;
  };
}

/** Flat, JSON-friendly shape accepted from files and flags */
export interface LabelCropConfigInput {
  preset?: PresetName;
  detection?: DetectionStrategy;
  grammar?: GrammarKind;
  columns?: number;
  paddingX?: number;
  paddingY?: number;
  minBarcodeDigits?: number;
  targetAspectRatio?: number;
  intensityThreshold?: number;
  rasterZoom?: number;
  cropPolicy?: CropPolicyKind;
  referenceWidth?: number;
  referenceHeight?: number;
  duplicates?: DuplicatePolicy;
  output?: OutputMode;
  filePrefix?: string;
  copies?: number;
  copiesByIdentifier?: Record<string, number>;
  archiveName?: string;
  compression?: ArchiveCompression;
}

/** Size of the reference hang tag label (PDF points) */
export const HANGTAG_LABEL_WIDTH = 82.68998718261719;
export const HANGTAG_LABEL_HEIGHT = 78.56026458740234;

export const PRESETS: Readonly<Record<PresetName, Readonly<LabelCropConfigInput>>> = {
  // Three hang tags across each sheet; one PDF per SKU, barcode centered
  hangtag: {
    detection: 'text-columns',
    grammar: 'sku',
    columns: 3,
    paddingX: 5,
    paddingY: 8,
    cropPolicy: 'barcode-centered',
    referenceWidth: HANGTAG_LABEL_WIDTH,
    referenceHeight: HANGTAG_LABEL_HEIGHT,
    duplicates: 'drop',
    output: 'render',
    filePrefix: 'CHILE BARCODE HANGTAG',
    archiveName: 'labels_by_sku.zip',
    compression: 'deflate',
  },
  // One carton label per page; pages grouped by REFERENCIA and cropped in place
  carton: {
    detection: 'content-mask',
    grammar: 'referencia',
    cropPolicy: 'none',
    duplicates: 'merge',
    output: 'crop-in-place',
    filePrefix: 'CARTON BARCODE -',
    archiveName: 'carton_barcodes.zip',
    compression: 'store',
  },
};

const DEFAULTS: Required<Omit<LabelCropConfigInput, 'preset' | 'referenceWidth' | 'referenceHeight'>> = {
  detection: 'text-columns',
  grammar: 'sku',
  columns: 3,
  paddingX: 5,
  paddingY: 8,
  minBarcodeDigits: DEFAULT_MIN_BARCODE_DIGITS,
  targetAspectRatio: DEFAULT_TARGET_RATIO,
  intensityThreshold: DEFAULT_INTENSITY_THRESHOLD,
  rasterZoom: 2,
  cropPolicy: 'first-seen',
  duplicates: 'drop',
  output: 'render',
  filePrefix: 'LABEL',
  copies: 1,
  copiesByIdentifier: {},
  archiveName: 'labels.zip',
  compression: 'deflate',
};

const DETECTIONS: readonly DetectionStrategy[] = ['text-columns', 'content-mask'];
const CROP_POLICIES: readonly CropPolicyKind[] = ['barcode-centered', 'first-seen', 'none'];
const DUPLICATE_POLICIES: readonly DuplicatePolicy[] = ['drop', 'merge'];
const OUTPUT_MODES: readonly OutputMode[] = ['render', 'crop-in-place'];
const COMPRESSIONS: readonly ArchiveCompression[] = ['deflate', 'store'];
const PRESET_NAMES: readonly PresetName[] = ['hangtag', 'carton'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function oneOf<T extends string>(allowed: readonly T[], value: unknown): value is T {
  return typeof value === 'string' && allowed.some(a => a === value);
}

export function isPresetName(value: unknown): value is PresetName {
  return oneOf(PRESET_NAMES, value);
}

/**
 * Reads one untyped layer into a typed partial, collecting problems.
 * Unknown keys are reported so typos in config files do not pass silently.
 */
function readLayer(raw: unknown, source: string, problems: string[]): LabelCropConfigInput {
  if (raw === undefined || raw === null) return {};
  if (!isRecord(raw)) {
    problems.push(`${source}: expected an object`);
    return {};
  }

  const out: LabelCropConfigInput = {};
  const bad = (key: string, expected: string) =>
    problems.push(`${source}: "${key}" must be ${expected} (got ${JSON.stringify(raw[key])})`);

  const int = (key: string, min: number, max = Infinity): number | undefined => {
    const v = raw[key];
    if (v === undefined) return undefined;
    if (typeof v !== 'number' || !Number.isInteger(v) || v < min || v > max) {
      bad(key, max === Infinity ? `an integer >= ${min}` : `an integer in ${min}..${max}`);
      return undefined;
    }
    return v;
  };
  const positive = (key: string): number | undefined => {
    const v = raw[key];
    if (v === undefined) return undefined;
    if (typeof v !== 'number' || !Number.isFinite(v) || v <= 0) {
      bad(key, 'a positive number');
      return undefined;
    }
    return v;
  };
  const choice = <T extends string>(key: string, allowed: readonly T[]): T | undefined => {
    const v = raw[key];
    if (v === undefined) return undefined;
    if (!oneOf(allowed, v)) {
      bad(key, `one of ${allowed.join(', ')}`);
      return undefined;
    }
    return v;
  };

  for (const key of Object.keys(raw)) {
    if (!(key in DEFAULTS) && key !== 'preset' && key !== 'referenceWidth' && key !== 'referenceHeight') {
      problems.push(`${source}: unknown option "${key}"`);
    }
  }

  out.preset = choice('preset', PRESET_NAMES);
  out.detection = choice('detection', DETECTIONS);
  out.cropPolicy = choice('cropPolicy', CROP_POLICIES);
  out.duplicates = choice('duplicates', DUPLICATE_POLICIES);
  out.output = choice('output', OUTPUT_MODES);
  out.compression = choice('compression', COMPRESSIONS);

  const grammar = raw.grammar;
  if (grammar !== undefined) {
    if (typeof grammar === 'string' && isGrammarKind(grammar)) out.grammar = grammar;
    else bad('grammar', 'one of sku, referencia');
  }

  out.columns = int('columns', 1);
  out.paddingX = int('paddingX', 0);
  out.paddingY = int('paddingY', 0);
  out.minBarcodeDigits = int('minBarcodeDigits', 1);
  out.intensityThreshold = int('intensityThreshold', 0, 255);
  out.copies = int('copies', 1, 999);
  out.targetAspectRatio = positive('targetAspectRatio');
  out.rasterZoom = positive('rasterZoom');
  out.referenceWidth = positive('referenceWidth');
  out.referenceHeight = positive('referenceHeight');

  for (const key of ['filePrefix', 'archiveName'] as const) {
    const v = raw[key];
    if (v === undefined) continue;
    if (typeof v !== 'string' || v.trim() === '' || /[\\/]/.test(v)) {
      bad(key, 'a non-empty string without path separators');
    } else {
      out[key] = v;
    }
  }

  if (raw.copiesByIdentifier !== undefined) {
    const map = raw.copiesByIdentifier;
    if (!isRecord(map)) {
      bad('copiesByIdentifier', 'an object of identifier -> copies');
    } else {
      const copies: Record<string, number> = {};
      for (const [id, n] of Object.entries(map)) {
        if (typeof n === 'number' && Number.isInteger(n) && n >= 1 && n <= 999) copies[id] = n;
        else problems.push(`${source}: copies for "${id}" must be an integer in 1..999`);
      }
      out.copiesByIdentifier = copies;
    }
  }

  return out;
}

/**
 * Merge the layers over the chosen preset and validate the result.
 * The preset comes from the last layer that names one.
 */
export function resolveConfig(...layers: Array<{ source: string; raw: unknown }>): LabelCropConfig {
  const problems: string[] = [];
  const parsed = layers.map(l => readLayer(l.raw, l.source, problems));

  let preset: PresetName | undefined;
  for (const layer of parsed) {
    if (layer.preset) preset = layer.preset;
  }
  const presetLayer: Readonly<LabelCropConfigInput> = preset ? PRESETS[preset] : {};

  // Last layer that sets a key wins, then the preset
  const pick = <K extends keyof LabelCropConfigInput>(key: K): LabelCropConfigInput[K] => {
    for (let i = parsed.length - 1; i >= 0; i--) {
      const v = parsed[i][key];
      if (v !== undefined) return v;
    }
    return presetLayer[key];
  };
  // Same, ignoring the preset
  const pickGiven = <K extends keyof LabelCropConfigInput>(key: K): LabelCropConfigInput[K] => {
    for (let i = parsed.length - 1; i >= 0; i--) {
      const v = parsed[i][key];
      if (v !== undefined) return v;
    }
    return undefined;
  };

  const referenceWidth = pick('referenceWidth');
  const referenceHeight = pick('referenceHeight');
  const referenceSize =
    referenceWidth !== undefined && referenceHeight !== undefined
      ? { width: referenceWidth, height: referenceHeight }
      : null;
  if ((referenceWidth === undefined) !== (referenceHeight === undefined)) {
    problems.push('referenceWidth and referenceHeight must be given together');
  }

  const cropPolicyKind = pick('cropPolicy') ?? DEFAULTS.cropPolicy;
  let cropPolicy: CropPolicy;
  if (cropPolicyKind === 'barcode-centered') {
    if (referenceSize === null) {
      problems.push('cropPolicy "barcode-centered" needs referenceWidth and referenceHeight');
    }
    cropPolicy = {
      kind: 'barcode-centered',
      width: referenceSize?.width ?? 0,
      height: referenceSize?.height ?? 0,
    };
  } else {
    cropPolicy = { kind: cropPolicyKind };
  }

  const duplicates = pick('duplicates') ?? DEFAULTS.duplicates;
  const output = pick('output') ?? DEFAULTS.output;
  if (duplicates === 'merge' && output === 'render') {
    problems.push('duplicates "merge" needs output "crop-in-place"; render mode draws one page per identifier');
  }

  // A preset's size is its barcode window; only sizes given in a file or on
  // the command line seed the first-seen reference
  const seedWidth = pickGiven('referenceWidth');
  const seedHeight = pickGiven('referenceHeight');
  const seed = seedWidth !== undefined && seedHeight !== undefined
    ? { width: seedWidth, height: seedHeight }
    : null;

  if (problems.length > 0) throw new LabelConfigError(problems);

  return {
    detection: pick('detection') ?? DEFAULTS.detection,
    grammar: pick('grammar') ?? DEFAULTS.grammar,
    columns: pick('columns') ?? DEFAULTS.columns,
    paddingX: pick('paddingX') ?? DEFAULTS.paddingX,
    paddingY: pick('paddingY') ?? DEFAULTS.paddingY,
    minBarcodeDigits: pick('minBarcodeDigits') ?? DEFAULTS.minBarcodeDigits,
    targetAspectRatio: pick('targetAspectRatio') ?? DEFAULTS.targetAspectRatio,
    intensityThreshold: pick('intensityThreshold') ?? DEFAULTS.intensityThreshold,
    rasterZoom: pick('rasterZoom') ?? DEFAULTS.rasterZoom,
    cropPolicy,
    referenceSize: cropPolicy.kind === 'first-seen' ? seed : null,
    duplicates,
    output,
    filePrefix: pick('filePrefix') ?? DEFAULTS.filePrefix,
    copies: pick('copies') ?? DEFAULTS.copies,
    copiesByIdentifier: pick('copiesByIdentifier') ?? DEFAULTS.copiesByIdentifier,
    archive: {
      fileName: pick('archiveName') ?? DEFAULTS.archiveName,
      compression: pick('compression') ?? DEFAULTS.compression,
    },
  };
}

/** "<prefix> <identifier>.pdf" */
export function outputFileName(config: Pick<LabelCropConfig, 'filePrefix'>, identifier: string): string {
  return `${config.filePrefix} ${identifier}.pdf`;
}

export function copiesFor(config: Pick<LabelCropConfig, 'copies' | 'copiesByIdentifier'>, identifier: string): number {
  return config.copiesByIdentifier[identifier] ?? config.copies;
}
