import { describe, it, expect } from 'vitest';
import pako from 'pako';
import { ZipBuilder, buildArchive, crc32, toDosDateTime } from '../ZipBuilder';

const encode = (s: string) => new TextEncoder().encode(s);
const MODIFIED = new Date(2024, 0, 15, 10, 30, 20);

/** Entry names and methods from the central directory */
function listEntries(zip: Uint8Array): Array<{ name: string; method: number }> {
  const view = new DataView(zip.buffer, zip.byteOffset, zip.byteLength);
  const eocd = zip.length - 22;
  expect(view.getUint32(eocd, true)).toBe(0x06054B50);

  const count = view.getUint16(eocd + 10, true);
  let pos = view.getUint32(eocd + 16, true);
  const entries: Array<{ name: string; method: number }> = [];
  for (let i = 0; i < count; i++) {
    expect(view.getUint32(pos, true)).toBe(0x02014B50);
    const nameLength = view.getUint16(pos + 28, true);
    entries.push({
      method: view.getUint16(pos + 10, true),
      name: new TextDecoder().decode(zip.subarray(pos + 46, pos + 46 + nameLength)),
    });
    pos += 46 + nameLength;
  }
  return entries;
}

describe('crc32', () => {
  it('matches the standard check values', () => {
    expect(crc32(encode('hello'))).toBe(0x3610A686);
    expect(crc32(encode('123456789'))).toBe(0xCBF43926);
    expect(crc32(new Uint8Array(0))).toBe(0);
  });
});

describe('toDosDateTime', () => {
  it('packs local time at two-second resolution', () => {
    expect(toDosDateTime(MODIFIED)).toEqual({
      time: (10 << 11) | (30 << 5) | 10,
      date: (44 << 9) | (1 << 5) | 15,
    });
  });
});

describe('ZipBuilder', () => {
  it('writes a stored entry byte for byte', () => {
    const zip = new ZipBuilder('store', MODIFIED);
    zip.addFile('a.pdf', new Uint8Array([1, 2, 3]));
    const bytes = zip.build();
    const view = new DataView(bytes.buffer);

    expect(view.getUint32(0, true)).toBe(0x04034B50);
    expect(view.getUint16(6, true)).toBe(0x0800);
    expect(view.getUint16(8, true)).toBe(0);
    expect(view.getUint32(18, true)).toBe(3);
    expect(new TextDecoder().decode(bytes.subarray(30, 35))).toBe('a.pdf');
    expect(Array.from(bytes.subarray(35, 38))).toEqual([1, 2, 3]);
    // central directory starts right after the only entry
    expect(view.getUint32(bytes.length - 22 + 16, true)).toBe(38);
    expect(bytes.length).toBe(38 + 46 + 5 + 22);
  });

  it('deflates entries that pako can inflate back', () => {
    const data = encode('%PDF-1.7 '.repeat(50));
    const bytes = buildArchive([{ fileName: 'label.pdf', bytes: data }], 'deflate', MODIFIED);
    const view = new DataView(bytes.buffer);
    const compressedSize = view.getUint32(18, true);
    const payload = bytes.subarray(30 + 'label.pdf'.length, 30 + 'label.pdf'.length + compressedSize);

    expect(view.getUint16(8, true)).toBe(8);
    expect(compressedSize).toBeLessThan(data.length);
    expect(view.getUint32(22, true)).toBe(data.length);
    expect(pako.inflateRaw(payload)).toEqual(data);
  });

  it('keeps entries in insertion order with UTF-8 names', () => {
    const bytes = buildArchive(
      [
        { fileName: 'CHILE BARCODE HANGTAG C50039 0007 0002.pdf', bytes: encode('b') },
        { fileName: 'CHILE BARCODE HANGTAG C50039 0007 0001.pdf', bytes: encode('a') },
        { fileName: 'CARTON BARCODE - NIÑO1.pdf', bytes: encode('c') },
      ],
      'store',
    );

    expect(listEntries(bytes)).toEqual([
      { name: 'CHILE BARCODE HANGTAG C50039 0007 0002.pdf', method: 0 },
      { name: 'CHILE BARCODE HANGTAG C50039 0007 0001.pdf', method: 0 },
      { name: 'CARTON BARCODE - NIÑO1.pdf', method: 0 },
    ]);
  });

  it('refuses duplicate names', () => {
    const zip = new ZipBuilder();
    zip.addFile('a.pdf', encode('1'));
    expect(() => zip.addFile('a.pdf', encode('2'))).toThrow('Duplicate archive entry: a.pdf');
    expect(zip.size).toBe(1);
  });

  it('writes an empty archive as a bare end record', () => {
    const bytes = new ZipBuilder('store').build();
    expect(bytes.length).toBe(22);
    expect(listEntries(bytes)).toEqual([]);
  });
});
