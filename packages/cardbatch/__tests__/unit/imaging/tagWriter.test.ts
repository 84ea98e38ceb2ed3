import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { FileIOError } from '../../../src/errors';
import { ExifTagWriter } from '../../../src/imaging/tagWriter';
import { readTiffOrientation } from '../../../src/imaging/tiffOrientation';
import { PIXEL, listPngChunks, minimalPng, minimalTiff } from '../../fixtures/imageBytes';
import { makeImageFolder, removeImageFolder } from '../../fixtures/uploadFixtures';

// SOI, a 16-byte JFIF APP0 segment, a start-of-scan header with a few bytes of
// "entropy-coded" data, then EOI. Enough structure for the EXIF segment walk.
const SCAN = [0xff, 0xda, 0x00, 0x08, 0x01, 0x01, 0x00, 0x00, 0x3f, 0x00, 0x12, 0x34, 0x56, 0x78];
const MINIMAL_JPEG = Buffer.from([
  0xff, 0xd8,
  0xff, 0xe0, 0x00, 0x10, 0x4a, 0x46, 0x49, 0x46, 0x00, 0x01, 0x01, 0x00, 0x00, 0x01, 0x00, 0x01, 0x00, 0x00,
  ...SCAN,
  0xff, 0xd9,
]);

describe('ExifTagWriter', () => {
  let folder: string;
  const writer = new ExifTagWriter();

  beforeEach(async () => {
    folder = await makeImageFolder('jpegs', []);
  });

  afterEach(async () => {
    await removeImageFolder(folder);
  });

  test('a JPEG without EXIF reads as no tag', async () => {
    const file = path.join(folder, 'plain.jpg');
    await writeFile(file, MINIMAL_JPEG);

    expect(await writer.read(file)).toBeNull();
  });

  test('writes the orientation tag and reads it back', async () => {
    const file = path.join(folder, 'card_front.jpg');
    await writeFile(file, MINIMAL_JPEG);

    await writer.write(file, 8);

    expect(await writer.read(file)).toBe(8);
  });

  test('overwrites an existing tag', async () => {
    const file = path.join(folder, 'card_back.jpeg');
    await writeFile(file, MINIMAL_JPEG);

    await writer.write(file, 8);
    await writer.write(file, 6);

    expect(await writer.read(file)).toBe(6);
  });

  test('leaves the scan data untouched', async () => {
    const file = path.join(folder, 'card_front.jpg');
    await writeFile(file, MINIMAL_JPEG);

    await writer.write(file, 8);
    const updated = await readFile(file);

    const tail = Buffer.from([...SCAN, 0xff, 0xd9]);
    expect(updated.subarray(updated.length - tail.length)).toEqual(tail);
    expect(updated.subarray(0, 2)).toEqual(Buffer.from([0xff, 0xd8]));
  });

  test('tags a PNG through its eXIf chunk', async () => {
    const file = path.join(folder, 'card_front.png');
    await writeFile(file, minimalPng());

    await writer.write(file, 8);

    expect(await writer.read(file)).toBe(8);
    expect(listPngChunks(await readFile(file)).map((c) => c.type)).toEqual(['IHDR', 'eXIf', 'IDAT', 'IEND']);
  });

  test('tags a TIFF through IFD0', async () => {
    const file = path.join(folder, 'card_back.TIF');
    const { bytes, pixelOffset } = minimalTiff();
    await writeFile(file, bytes);

    await writer.write(file, 6);

    const updated = await readFile(file);
    expect(readTiffOrientation(updated)).toBe(6);
    expect(updated[pixelOffset]).toBe(PIXEL);
  });

  test('has no place for the tag in a BMP', async () => {
    const file = path.join(folder, 'card_front.bmp');
    await writeFile(file, Buffer.from('BM'));

    expect(writer.supports(file)).toBe(false);
    expect(writer.supports(path.join(folder, 'card_front.jpeg'))).toBe(true);
    await expect(writer.write(file, 8)).rejects.toThrow(`${file}: .bmp files cannot carry an orientation tag`);
  });

  test('reports a corrupt PNG as a FileIOError', async () => {
    const file = path.join(folder, 'broken_front.png');
    await writeFile(file, 'placeholder');

    await expect(writer.write(file, 8)).rejects.toThrow(FileIOError);
    await expect(writer.write(file, 8)).rejects.toThrow(`${file}: could not rewrite orientation: not a PNG file`);
  });

  test('reports unparseable JPEG data as a FileIOError', async () => {
    const file = path.join(folder, 'broken_front.jpg');
    await writeFile(file, 'not a jpeg');

    await expect(writer.write(file, 8)).rejects.toThrow(FileIOError);
  });

  test('reports a missing file as a FileIOError', async () => {
    await expect(writer.read(path.join(folder, 'missing.jpg'))).rejects.toThrow(FileIOError);
  });
});
