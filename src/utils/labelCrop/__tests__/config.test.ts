import { describe, it, expect } from 'vitest';
import {
  HANGTAG_LABEL_HEIGHT,
  HANGTAG_LABEL_WIDTH,
  copiesFor,
  isPresetName,
  outputFileName,
  resolveConfig,
} from '../config';
import { LabelConfigError } from '../errors';

function problemsOf(...layers: Array<{ source: string; raw: unknown }>): string[] {
  try {
    resolveConfig(...layers);
  } catch (err) {
    if (err instanceof LabelConfigError) return err.problems;
    throw err;
  }
  return [];
}

describe('resolveConfig', () => {
  it('falls back to defaults', () => {
    const config = resolveConfig();
    expect(config.detection).toBe('text-columns');
    expect(config.grammar).toBe('sku');
    expect(config.cropPolicy).toEqual({ kind: 'first-seen' });
    expect(config.referenceSize).toBeNull();
    expect(config.minBarcodeDigits).toBe(8);
    expect(config.intensityThreshold).toBe(250);
    expect(config.archive).toEqual({ fileName: 'labels.zip', compression: 'deflate' });
  });

  it('applies the hangtag preset', () => {
    const config = resolveConfig({ source: 'flags', raw: { preset: 'hangtag' } });
    expect(config).toMatchObject({
      detection: 'text-columns',
      grammar: 'sku',
      columns: 3,
      paddingX: 5,
      paddingY: 8,
      duplicates: 'drop',
      output: 'render',
      filePrefix: 'CHILE BARCODE HANGTAG',
      archive: { fileName: 'labels_by_sku.zip', compression: 'deflate' },
    });
    expect(config.cropPolicy).toEqual({
      kind: 'barcode-centered',
      width: HANGTAG_LABEL_WIDTH,
      height: HANGTAG_LABEL_HEIGHT,
    });
    expect(config.referenceSize).toBeNull();
  });

  it('applies the carton preset', () => {
    const config = resolveConfig({ source: 'flags', raw: { preset: 'carton' } });
    expect(config).toMatchObject({
      detection: 'content-mask',
      grammar: 'referencia',
      cropPolicy: { kind: 'none' },
      duplicates: 'merge',
      output: 'crop-in-place',
      filePrefix: 'CARTON BARCODE -',
      archive: { fileName: 'carton_barcodes.zip', compression: 'store' },
    });
  });

  it('lets later layers override earlier ones and the preset', () => {
    const config = resolveConfig(
      { source: 'config file', raw: { preset: 'hangtag', columns: 4, paddingX: 2 } },
      { source: 'flags', raw: { columns: 5 } },
    );
    expect(config.columns).toBe(5);
    expect(config.paddingX).toBe(2);
    expect(config.paddingY).toBe(8);
  });

  it('takes the preset from the last layer that names one', () => {
    const config = resolveConfig(
      { source: 'config file', raw: { preset: 'hangtag' } },
      { source: 'flags', raw: { preset: 'carton' } },
    );
    expect(config.detection).toBe('content-mask');
  });

  it('seeds the first-seen size from a reference size', () => {
    const config = resolveConfig({ source: 'flags', raw: { referenceWidth: 100, referenceHeight: 50 } });
    expect(config.referenceSize).toEqual({ width: 100, height: 50 });
  });

  it('does not seed first-seen with a preset\'s barcode window', () => {
    const config = resolveConfig(
      { source: 'flags', raw: { preset: 'hangtag', cropPolicy: 'first-seen' } },
    );
    expect(config.cropPolicy).toEqual({ kind: 'first-seen' });
    expect(config.referenceSize).toBeNull();
  });

  it('seeds first-seen over a preset when the size is given', () => {
    const config = resolveConfig(
      { source: 'config file', raw: { preset: 'hangtag', referenceWidth: 90, referenceHeight: 45 } },
      { source: 'flags', raw: { cropPolicy: 'first-seen' } },
    );
    expect(config.referenceSize).toEqual({ width: 90, height: 45 });
  });

  it('rejects merged duplicates in render mode', () => {
    expect(problemsOf({ source: 'flags', raw: { duplicates: 'merge', output: 'render' } })).toEqual([
      'duplicates "merge" needs output "crop-in-place"; render mode draws one page per identifier',
    ]);
    expect(problemsOf({ source: 'flags', raw: { preset: 'carton', output: 'render' } })).toHaveLength(1);
  });

  it('reports every problem at once', () => {
    const problems = problemsOf({ source: 'flags', raw: { columns: 0, grammar: 'ean', bogus: 1 } });
    expect(problems).toEqual([
      'flags: unknown option "bogus"',
      'flags: "grammar" must be one of sku, referencia (got "ean")',
      'flags: "columns" must be an integer >= 1 (got 0)',
    ]);
  });

  it('requires a size for barcode-centered crops', () => {
    expect(problemsOf({ source: 'flags', raw: { cropPolicy: 'barcode-centered' } })).toEqual([
      'cropPolicy "barcode-centered" needs referenceWidth and referenceHeight',
    ]);
  });

  it('requires both reference dimensions', () => {
    expect(problemsOf({ source: 'flags', raw: { referenceWidth: 100 } })).toEqual([
      'referenceWidth and referenceHeight must be given together',
    ]);
  });

  it('rejects names that would escape the archive', () => {
    expect(problemsOf({ source: 'flags', raw: { filePrefix: '../x' } })).toEqual([
      'flags: "filePrefix" must be a non-empty string without path separators (got "../x")',
    ]);
  });

  it('rejects unparsable numbers', () => {
    expect(() => resolveConfig({ source: 'flags', raw: { copies: Number('two') } })).toThrow(LabelConfigError);
  });

  it('rejects a layer that is not an object', () => {
    expect(problemsOf({ source: 'config file', raw: [1, 2] })).toEqual(['config file: expected an object']);
  });

  it('validates per-identifier copies', () => {
    expect(problemsOf({ source: 'config file', raw: { copiesByIdentifier: { A: 2, B: 0 } } })).toEqual([
      'config file: copies for "B" must be an integer in 1..999',
    ]);
  });
});

describe('naming and copies', () => {
  it('names outputs "<prefix> <identifier>.pdf"', () => {
    const hangtag = resolveConfig({ source: 'flags', raw: { preset: 'hangtag' } });
    const carton = resolveConfig({ source: 'flags', raw: { preset: 'carton' } });
    expect(outputFileName(hangtag, 'C50039 0007 0001')).toBe('CHILE BARCODE HANGTAG C50039 0007 0001.pdf');
    expect(outputFileName(carton, 'C400080003XX')).toBe('CARTON BARCODE - C400080003XX.pdf');
  });

  it('uses per-identifier copies over the default', () => {
    const config = resolveConfig({ source: 'flags', raw: { copies: 2, copiesByIdentifier: { A: 5 } } });
    expect(copiesFor(config, 'A')).toBe(5);
    expect(copiesFor(config, 'B')).toBe(2);
  });

  it('recognizes preset names', () => {
    expect(isPresetName('carton')).toBe(true);
    expect(isPresetName('poster')).toBe(false);
  });
});
