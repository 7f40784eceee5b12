/**
 * Flat ZIP archive writer for label PDFs, pako raw deflate for compression.
 *
 * Layout: [local header + data]* → central directory → end of central directory.
 * Entries are either DEFLATE (method 8) or STORE (method 0); PDFs are already
 * mostly compressed, so STORE is a reasonable choice for large batches.
 */

import pako from 'pako';

export type ZipCompression = 'deflate' | 'store';

const METHOD_STORE = 0;
const METHOD_DEFLATE = 8;

/** Bit 11: file names are UTF-8 */
const FLAG_UTF8 = 0x0800;

interface ZipEntry {
  nameBytes: Uint8Array;
  method: number;
  crc32: number;
  size: number;
  payload: Uint8Array;
  dosTime: number;
  dosDate: number;
  /** Offset of the local file header in the output */
  localHeaderOffset: number;
}

// CRC-32 lookup table (polynomial 0xEDB88320)
const crcTable: Uint32Array = (() => {
  const table = new Uint32Array(256);
  for (let n = 0; n < 256; n++) {
    let c = n;
    for (let k = 0; k < 8; k++) {
      c = (c & 1) ? (0xEDB88320 ^ (c >>> 1)) : (c >>> 1);
    }
    table[n] = c;
  }
  return table;
})();

export function crc32(data: Uint8Array): number {
  let crc = 0xFFFFFFFF;
  for (let i = 0; i < data.length; i++) {
    crc = crcTable[(crc ^ data[i]) & 0xFF] ^ (crc >>> 8);
  }
  return (crc ^ 0xFFFFFFFF) >>> 0;
}

/** MS-DOS time/date fields (local time, 2-second resolution, years from 1980). */
export function toDosDateTime(date: Date): { time: number; date: number } {
  const year = Math.max(1980, date.getFullYear());
  return {
    time: (date.getHours() << 11) | (date.getMinutes() << 5) | Math.floor(date.getSeconds() / 2),
    date: ((year - 1980) << 9) | ((date.getMonth() + 1) << 5) | date.getDate(),
  };
}

export class ZipBuilder {
  private readonly entries: ZipEntry[] = [];
  private readonly names = new Set<string>();
  private readonly encoder = new TextEncoder();

  constructor(
    private readonly compression: ZipCompression = 'deflate',
    private readonly modified: Date = new Date(),
  ) {}

  /** Add a file. Names must be unique within the archive. */
  addFile(name: string, data: Uint8Array): void {
    if (this.names.has(name)) {
      throw new Error(`Duplicate archive entry: ${name}`);
    }
    this.names.add(name);

    const payload = this.compression === 'deflate' ? pako.deflateRaw(data) : data;
    const { time, date } = toDosDateTime(this.modified);
    this.entries.push({
      nameBytes: this.encoder.encode(name),
      method: this.compression === 'deflate' ? METHOD_DEFLATE : METHOD_STORE,
      crc32: crc32(data),
      size: data.length,
      payload,
      dosTime: time,
      dosDate: date,
      localHeaderOffset: 0,
    });
  }

  get size(): number {
    return this.entries.length;
  }

  /** Build the complete archive */
  build(): Uint8Array {
    const parts: Uint8Array[] = [];
    let offset = 0;

    for (const entry of this.entries) {
      entry.localHeaderOffset = offset;
      const header = this.localFileHeader(entry);
      parts.push(header, entry.payload);
      offset += header.length + entry.payload.length;
    }

    const centralDirStart = offset;
    for (const entry of this.entries) {
      const central = this.centralDirectoryEntry(entry);
      parts.push(central);
      offset += central.length;
    }

    parts.push(this.endOfCentralDirectory(this.entries.length, offset - centralDirStart, centralDirStart));

    const result = new Uint8Array(parts.reduce((sum, p) => sum + p.length, 0));
    let pos = 0;
    for (const part of parts) {
      result.set(part, pos);
      pos += part.length;
    }
    return result;
  }

  private localFileHeader(entry: ZipEntry): Uint8Array {
    const header = new Uint8Array(30 + entry.nameBytes.length);
    const view = new DataView(header.buffer);

    view.setUint32(0, 0x04034B50, true);           // signature
    view.setUint16(4, 20, true);                    // version needed (2.0)
    view.setUint16(6, FLAG_UTF8, true);
    view.setUint16(8, entry.method, true);
    view.setUint16(10, entry.dosTime, true);
    view.setUint16(12, entry.dosDate, true);
    view.setUint32(14, entry.crc32, true);
    view.setUint32(18, entry.payload.length, true); // compressed size
    view.setUint32(22, entry.size, true);           // uncompressed size
    view.setUint16(26, entry.nameBytes.length, true);
    view.setUint16(28, 0, true);                    // extra field length

    header.set(entry.nameBytes, 30);
    return header;
  }

  private centralDirectoryEntry(entry: ZipEntry): Uint8Array {
    const header = new Uint8Array(46 + entry.nameBytes.length);
    const view = new DataView(header.buffer);

    view.setUint32(0, 0x02014B50, true);           // signature
    view.setUint16(4, 20, true);                    // version made by
    view.setUint16(6, 20, true);                    // version needed
    view.setUint16(8, FLAG_UTF8, true);
    view.setUint16(10, entry.method, true);
    view.setUint16(12, entry.dosTime, true);
    view.setUint16(14, entry.dosDate, true);
    view.setUint32(16, entry.crc32, true);
    view.setUint32(20, entry.payload.length, true);
    view.setUint32(24, entry.size, true);
    view.setUint16(28, entry.nameBytes.length, true);
    // 30..41: extra/comment lengths, disk start, attributes, all zero
    view.setUint32(42, entry.localHeaderOffset, true);

    header.set(entry.nameBytes, 46);
    return header;
  }

  private endOfCentralDirectory(count: number, size: number, offset: number): Uint8Array {
    const eocd = new Uint8Array(22);
    const view = new DataView(eocd.buffer);

    view.setUint32(0, 0x06054B50, true);
    view.setUint16(8, count, true);   // entries on this disk
    view.setUint16(10, count, true);  // total entries
    view.setUint32(12, size, true);
    view.setUint32(16, offset, true);
    return eocd;
  }
}

/** Flat archive of named files, in the given order. */
export function buildArchive(
  files: Iterable<{ fileName: string; bytes: Uint8Array }>,
  compression: ZipCompression,
  modified?: Date,
): Uint8Array {
  const zip = new ZipBuilder(compression, modified);
  for (const file of files) zip.addFile(file.fileName, file.bytes);
  return zip.build();
}
