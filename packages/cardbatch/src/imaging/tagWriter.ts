import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import * as piexif from 'piexifjs';
import { FileIOError, toErrorMessage } from '../errors';
import { ORIENTATION_TAG, isOrientationCode, type OrientationCode } from './orientation';
import { readPngOrientation, writePngOrientation } from './pngExif';
import { readTiffOrientation, writeTiffOrientation } from './tiffOrientation';

/**
 * Reads and writes the orientation tag of a single image file.
 * The rewriter only talks to this interface; tests substitute an in-memory one.
 */
export interface OrientationTagWriter {
  /** False for formats that have nowhere to store the tag. */
  supports(filePath: string): boolean;
  write(filePath: string, code: OrientationCode): Promise<void>;
  /** Current tag value, or null when the file carries none. */
  read(filePath: string): Promise<OrientationCode | null>;
}

interface FormatCodec {
  read(bytes: Buffer): OrientationCode | null;
  write(bytes: Buffer, code: OrientationCode): Buffer;
}

const jpegCodec: FormatCodec = {
  read(bytes) {
    const value = piexif.load(bytes.toString('binary'))['0th']?.[ORIENTATION_TAG];
    return isOrientationCode(value) ? value : null;
  },
  write(bytes, code) {
    const jpeg = bytes.toString('binary');
    const exif = piexif.load(jpeg);
    exif['0th'] = { ...(exif['0th'] ?? {}), [ORIENTATION_TAG]: code };
    return Buffer.from(piexif.insert(piexif.dump(exif), jpeg), 'binary');
  },
};

const pngCodec: FormatCodec = { read: readPngOrientation, write: writePngOrientation };
const tiffCodec: FormatCodec = { read: readTiffOrientation, write: writeTiffOrientation };

// BMP has no metadata block, so it has no codec
const CODECS: Record<string, FormatCodec> = {
  '.jpg': jpegCodec,
  '.jpeg': jpegCodec,
  '.png': pngCodec,
  '.tif': tiffCodec,
  '.tiff': tiffCodec,
};

/**
 * Edits the orientation tag in place: the EXIF APP1 segment of JPEGs, the
 * eXIf chunk of PNGs and IFD0 of TIFFs. Pixel data is written back untouched.
 */
export class ExifTagWriter implements OrientationTagWriter {
  supports(filePath: string): boolean {
    return codecFor(filePath) !== undefined;
  }

  async write(filePath: string, code: OrientationCode): Promise<void> {
    const codec = this.requireCodec(filePath);
    const bytes = await readBytes(filePath);

    let updated: Buffer;
    try {
      updated = codec.write(bytes, code);
    } catch (err) {
      throw new FileIOError(filePath, `could not rewrite orientation: ${toErrorMessage(err)}`);
    }

    try {
      await writeFile(filePath, updated);
    } catch (err) {
      throw new FileIOError(filePath, toErrorMessage(err));
    }
  }

  async read(filePath: string): Promise<OrientationCode | null> {
    const codec = this.requireCodec(filePath);
    const bytes = await readBytes(filePath);

    try {
      return codec.read(bytes);
    } catch (err) {
      throw new FileIOError(filePath, `could not parse image metadata: ${toErrorMessage(err)}`);
    }
  }

  private requireCodec(filePath: string): FormatCodec {
    const codec = codecFor(filePath);
    if (!codec) {
      const ext = path.extname(filePath).toLowerCase();
      throw new FileIOError(filePath, `${ext || 'extensionless'} files cannot carry an orientation tag`);
    }
    return codec;
  }
}

function codecFor(filePath: string): FormatCodec | undefined {
  return CODECS[path.extname(filePath).toLowerCase()];
}

async function readBytes(filePath: string): Promise<Buffer> {
  try {
    return await readFile(filePath);
  } catch (err) {
    throw new FileIOError(filePath, toErrorMessage(err));
  }
}
