/**
 * Orientation in PNG files, stored in the eXIf chunk (PNG 1.5 extension).
 *
 * The chunk holds a bare TIFF-structured EXIF block. Only that chunk is
 * replaced or inserted; every other chunk is copied byte for byte.
 */

import * as CRC32 from 'crc-32';
import * as piexif from 'piexifjs';
import { ORIENTATION_TAG, isOrientationCode, type OrientationCode } from './orientation';

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
const EXIF_CHUNK = 'eXIf';
const EXIF_HEADER = 'Exif\x00\x00';

export interface PngChunk {
  type: string;
  /** Offset of the chunk's length field */
  start: number;
  /** Offset just past the chunk's CRC */
  end: number;
  data: Buffer;
}

function isPng(bytes: Buffer): boolean {
  return bytes.length >= PNG_SIGNATURE.length && bytes.subarray(0, PNG_SIGNATURE.length).equals(PNG_SIGNATURE);
}

export function readPngChunks(bytes: Buffer): PngChunk[] {
  if (!isPng(bytes)) {
    throw new Error('not a PNG file');
  }

  const chunks: PngChunk[] = [];
  let offset = PNG_SIGNATURE.length;
  while (offset < bytes.length) {
    if (offset + 12 > bytes.length) {
      throw new Error(`truncated chunk header at byte ${offset}`);
    }
    const length = bytes.readUInt32BE(offset);
    const type = bytes.toString('latin1', offset + 4, offset + 8);
    const end = offset + 12 + length;
    if (end > bytes.length) {
      throw new Error(`truncated ${type} chunk at byte ${offset}`);
    }
    chunks.push({ type, start: offset, end, data: bytes.subarray(offset + 8, offset + 8 + length) });
    offset = end;
    if (type === 'IEND') break;
  }

  if (chunks[0]?.type !== 'IHDR') {
    throw new Error('PNG does not start with an IHDR chunk');
  }
  return chunks;
}

export function encodePngChunk(type: string, data: Buffer): Buffer {
  const typeBytes = Buffer.from(type, 'latin1');
  const chunk = Buffer.alloc(12 + data.length);
  chunk.writeUInt32BE(data.length, 0);
  typeBytes.copy(chunk, 4);
  data.copy(chunk, 8);
  // crc-32 returns a signed int
  chunk.writeUInt32BE(CRC32.buf(Buffer.concat([typeBytes, data])) >>> 0, 8 + data.length);
  return chunk;
}

function loadExif(chunk: PngChunk): piexif.ExifDict {
  // Some writers keep the JPEG-style "Exif\0\0" prefix inside the chunk
  const payload = chunk.data.toString('binary');
  return piexif.load(payload.startsWith('Exif') ? payload : EXIF_HEADER + payload);
}

export function readPngOrientation(bytes: Buffer): OrientationCode | null {
  const chunk = readPngChunks(bytes).find((c) => c.type === EXIF_CHUNK);
  if (!chunk) return null;

  const value = loadExif(chunk)['0th']?.[ORIENTATION_TAG];
  return isOrientationCode(value) ? value : null;
}

/** Copy of `bytes` whose eXIf chunk carries `code`, added before the first IDAT when missing. */
export function writePngOrientation(bytes: Buffer, code: OrientationCode): Buffer {
  const chunks = readPngChunks(bytes);
  const existing = chunks.find((c) => c.type === EXIF_CHUNK);

  const exif: piexif.ExifDict = existing ? loadExif(existing) : {};
  exif['0th'] = { ...(exif['0th'] ?? {}), [ORIENTATION_TAG]: code };
  const dumped = piexif.dump(exif);
  const chunk = encodePngChunk(EXIF_CHUNK, Buffer.from(dumped.slice(EXIF_HEADER.length), 'binary'));

  if (existing) {
    return Buffer.concat([bytes.subarray(0, existing.start), chunk, bytes.subarray(existing.end)]);
  }

  const firstData = chunks.find((c) => c.type === 'IDAT');
  if (!firstData) {
    throw new Error('PNG has no IDAT chunk');
  }
  return Buffer.concat([bytes.subarray(0, firstData.start), chunk, bytes.subarray(firstData.start)]);
}
