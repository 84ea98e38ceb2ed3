/**
 * OrientationRewriter: sets the EXIF orientation of card scans by file name.
 *
 * "front" files get Rotate270CW, "back" files get Rotate90CW; anything else is
 * left as it is. Existing tags are overwritten, never consulted. Files whose
 * format has no place for the tag (BMP) are skipped but still uploaded. A
 * failure on one file is recorded and the scan moves on.
 */

import { readdir, stat } from 'node:fs/promises';
import path from 'node:path';
import { FolderNotFoundError, toErrorMessage } from '../errors';
import { getLogger, type Logger } from '../monitoring/logger';
import { isOrientationCandidate, toImageFile, type ImageFile, type OrientationCode } from './orientation';
import { ExifTagWriter, type OrientationTagWriter } from './tagWriter';

export interface RotationFailure {
  path: string;
  error: string;
}

export interface RotationResult {
  folder: string;
  front: number;
  back: number;
  skipped: number;
  errors: number;
  total: number;
  failures: RotationFailure[];
  /** Files to upload: every discovered file that did not fail, in name order. */
  processable: ImageFile[];
  elapsedMs: number;
}

export interface InspectedImage extends ImageFile {
  current: OrientationCode | null;
  error?: string;
}

export interface OrientationRewriterOptions {
  writer?: OrientationTagWriter;
  logger?: Logger;
}

export class OrientationRewriter {
  private writer: OrientationTagWriter;
  private logger: Logger;

  constructor(options?: OrientationRewriterOptions) {
    this.writer = options?.writer ?? new ExifTagWriter();
    this.logger = options?.logger ?? getLogger();
  }

  /**
   * List supported image files in a folder, sorted by name.
   * Throws FolderNotFoundError when the folder is missing or not a directory.
   */
  async discover(folder: string): Promise<ImageFile[]> {
    const absolute = path.resolve(folder);
    await assertDirectory(absolute);

    const entries = await readdir(absolute, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && isOrientationCandidate(entry.name))
      .map((entry) => entry.name)
      .sort((a, b) => a.localeCompare(b))
      .map((name) => toImageFile(path.join(absolute, name)));
  }

  async rewrite(folder: string): Promise<RotationResult> {
    const startedAt = Date.now();
    const images = await this.discover(folder);
    const log = this.logger.child({ folder: path.basename(path.resolve(folder)) });

    const result: RotationResult = {
      folder: path.resolve(folder),
      front: 0,
      back: 0,
      skipped: 0,
      errors: 0,
      total: images.length,
      failures: [],
      processable: [],
      elapsedMs: 0,
    };

    if (images.length === 0) {
      log.warn('No supported images found', { path: result.folder });
    }

    for (const image of images) {
      if (image.category === 'unclassified' || image.targetOrientation === undefined) {
        result.skipped++;
        result.processable.push(image);
        log.debug('Skipped unclassified image', { file: path.basename(image.path) });
        continue;
      }

      if (!this.writer.supports(image.path)) {
        result.skipped++;
        result.processable.push(image);
        log.warn('Format cannot carry an orientation tag, uploading as is', { file: path.basename(image.path) });
        continue;
      }

      try {
        await this.writer.write(image.path, image.targetOrientation);
      } catch (err) {
        const error = toErrorMessage(err);
        result.errors++;
        result.failures.push({ path: image.path, error });
        log.error('Failed to write orientation', { file: image.path, error });
        continue;
      }

      result[image.category]++;
      result.processable.push(image);
      log.debug('Orientation written', {
        file: path.basename(image.path),
        category: image.category,
        orientation: image.targetOrientation,
      });
    }

    result.elapsedMs = Date.now() - startedAt;
    log.info('Rotation complete', {
      total: result.total,
      front: result.front,
      back: result.back,
      skipped: result.skipped,
      errors: result.errors,
      elapsedMs: result.elapsedMs,
    });
    return result;
  }

  /** Current tag of every supported file in a folder (null when absent or unreadable). */
  async inspect(folder: string): Promise<InspectedImage[]> {
    const images = await this.discover(folder);
    const rows: InspectedImage[] = [];

    for (const image of images) {
      try {
        rows.push({ ...image, current: await this.writer.read(image.path) });
      } catch (err) {
        rows.push({ ...image, current: null, error: toErrorMessage(err) });
      }
    }
    return rows;
  }
}

async function assertDirectory(folder: string): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(folder)).isDirectory();
  } catch {
    throw new FolderNotFoundError(folder);
  }
  if (!isDirectory) {
    throw new FolderNotFoundError(folder, 'Not a directory');
  }
}
