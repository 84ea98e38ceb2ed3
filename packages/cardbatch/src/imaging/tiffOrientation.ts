/**
 * Orientation in baseline TIFF files, stored as tag 0x0112 of IFD0.
 *
 * An existing entry is patched where it lies. Without one, IFD0 is copied to
 * the end of the file with the entry added, and the header is pointed at the
 * copy. Image strips and all other values keep their offsets.
 */

import { ORIENTATION_TAG, isOrientationCode, type OrientationCode } from './orientation';

const TIFF_MAGIC = 42;
const BIGTIFF_MAGIC = 43;
const ENTRY_SIZE = 12;
const TYPE_SHORT = 3;

interface TiffLayout {
  littleEndian: boolean;
  ifdOffset: number;
  entryCount: number;
}

function u16(bytes: Buffer, offset: number, littleEndian: boolean): number {
  return littleEndian ? bytes.readUInt16LE(offset) : bytes.readUInt16BE(offset);
}

function u32(bytes: Buffer, offset: number, littleEndian: boolean): number {
  return littleEndian ? bytes.readUInt32LE(offset) : bytes.readUInt32BE(offset);
}

function putU16(bytes: Buffer, value: number, offset: number, littleEndian: boolean): void {
  if (littleEndian) bytes.writeUInt16LE(value, offset);
  else bytes.writeUInt16BE(value, offset);
}

function putU32(bytes: Buffer, value: number, offset: number, littleEndian: boolean): void {
  if (littleEndian) bytes.writeUInt32LE(value, offset);
  else bytes.writeUInt32BE(value, offset);
}

function readLayout(bytes: Buffer): TiffLayout {
  if (bytes.length < 8) {
    throw new Error('not a TIFF file');
  }
  const order = bytes.toString('latin1', 0, 2);
  if (order !== 'II' && order !== 'MM') {
    throw new Error('not a TIFF file');
  }
  const littleEndian = order === 'II';
  const magic = u16(bytes, 2, littleEndian);
  if (magic === BIGTIFF_MAGIC) {
    throw new Error('BigTIFF files are not supported');
  }
  if (magic !== TIFF_MAGIC) {
    throw new Error('not a TIFF file');
  }

  const ifdOffset = u32(bytes, 4, littleEndian);
  if (ifdOffset < 8 || ifdOffset + 2 > bytes.length) {
    throw new Error(`IFD0 offset ${ifdOffset} is outside the file`);
  }
  const entryCount = u16(bytes, ifdOffset, littleEndian);
  if (ifdOffset + 2 + entryCount * ENTRY_SIZE + 4 > bytes.length) {
    throw new Error('truncated IFD0');
  }
  return { littleEndian, ifdOffset, entryCount };
}

function entryOffset(layout: TiffLayout, index: number): number {
  return layout.ifdOffset + 2 + index * ENTRY_SIZE;
}

function findEntry(bytes: Buffer, layout: TiffLayout, tag: number): number | null {
  for (let i = 0; i < layout.entryCount; i++) {
    const offset = entryOffset(layout, i);
    if (u16(bytes, offset, layout.littleEndian) === tag) return offset;
  }
  return null;
}

export function readTiffOrientation(bytes: Buffer): OrientationCode | null {
  const layout = readLayout(bytes);
  const entry = findEntry(bytes, layout, ORIENTATION_TAG);
  if (entry === null) return null;

  if (u16(bytes, entry + 2, layout.littleEndian) !== TYPE_SHORT) return null;
  const value = u16(bytes, entry + 8, layout.littleEndian);
  return isOrientationCode(value) ? value : null;
}

function writeOrientationEntry(bytes: Buffer, offset: number, code: OrientationCode, littleEndian: boolean): void {
  putU16(bytes, ORIENTATION_TAG, offset, littleEndian);
  putU16(bytes, TYPE_SHORT, offset + 2, littleEndian);
  putU32(bytes, 1, offset + 4, littleEndian);
  // SHORT values sit left-justified in the 4-byte value field
  bytes.fill(0, offset + 8, offset + 12);
  putU16(bytes, code, offset + 8, littleEndian);
}

/** Copy of `bytes` whose IFD0 carries `code`. */
export function writeTiffOrientation(bytes: Buffer, code: OrientationCode): Buffer {
  const layout = readLayout(bytes);
  const { littleEndian } = layout;

  const existing = findEntry(bytes, layout, ORIENTATION_TAG);
  if (existing !== null) {
    const patched = Buffer.from(bytes);
    writeOrientationEntry(patched, existing, code, littleEndian);
    return patched;
  }

  // Entries must stay sorted by tag
  const entries: Buffer[] = [];
  for (let i = 0; i < layout.entryCount; i++) {
    const offset = entryOffset(layout, i);
    entries.push(bytes.subarray(offset, offset + ENTRY_SIZE));
  }
  const orientation = Buffer.alloc(ENTRY_SIZE);
  writeOrientationEntry(orientation, 0, code, littleEndian);
  const insertAt = entries.findIndex((entry) => u16(entry, 0, littleEndian) > ORIENTATION_TAG);
  entries.splice(insertAt === -1 ? entries.length : insertAt, 0, orientation);

  const nextIfd = u32(bytes, entryOffset(layout, layout.entryCount), littleEndian);
  const padding = bytes.length % 2;
  const newIfdOffset = bytes.length + padding;

  const ifd = Buffer.alloc(2 + entries.length * ENTRY_SIZE + 4);
  putU16(ifd, entries.length, 0, littleEndian);
  entries.forEach((entry, i) => entry.copy(ifd, 2 + i * ENTRY_SIZE));
  putU32(ifd, nextIfd, 2 + entries.length * ENTRY_SIZE, littleEndian);

  const updated = Buffer.concat([bytes, Buffer.alloc(padding), ifd]);
  putU32(updated, newIfdOffset, 4, littleEndian);
  return updated;
}
