import path from 'node:path';
import { ORIENTATION_EXTENSIONS } from '../config/constants';

/** EXIF tag id for Orientation in IFD0. */
export const ORIENTATION_TAG = 0x0112;

/** EXIF Orientation (tag 0x0112) values. */
export const OrientationCode = {
  Normal: 1,
  MirrorHorizontal: 2,
  Rotate180: 3,
  MirrorVertical: 4,
  MirrorHorizontalRotate270CW: 5,
  Rotate90CW: 6,
  MirrorHorizontalRotate90CW: 7,
  Rotate270CW: 8,
} as const;

export type OrientationCode = (typeof OrientationCode)[keyof typeof OrientationCode];

export const ORIENTATION_LABELS: Record<OrientationCode, string> = {
  1: 'Normal',
  2: 'Mirrored',
  3: 'Rotated 180°',
  4: 'Mirrored and rotated 180°',
  5: 'Mirrored and rotated 90° CCW',
  6: 'Rotated 90° CW',
  7: 'Mirrored and rotated 90° CW',
  8: 'Rotated 270° CW',
};

export type ImageCategory = 'front' | 'back' | 'unclassified';

export interface ImageFile {
  path: string;
  category: ImageCategory;
  /** Code to write; undefined for unclassified files. */
  targetOrientation?: OrientationCode;
}

const CATEGORY_ORIENTATION: Record<Exclude<ImageCategory, 'unclassified'>, OrientationCode> = {
  front: OrientationCode.Rotate270CW,
  back: OrientationCode.Rotate90CW,
};

export function isOrientationCode(value: unknown): value is OrientationCode {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1 && value <= 8;
}

/**
 * Classify by file name. "front" is checked before "back", so a name
 * containing both is a front.
 */
export function classifyImage(fileName: string): ImageCategory {
  const lower = fileName.toLowerCase();
  if (lower.includes('front')) return 'front';
  if (lower.includes('back')) return 'back';
  return 'unclassified';
}

export function isOrientationCandidate(fileName: string): boolean {
  return ORIENTATION_EXTENSIONS.includes(path.extname(fileName).toLowerCase());
}

export function toImageFile(filePath: string): ImageFile {
  const category = classifyImage(path.basename(filePath));
  return category === 'unclassified'
    ? { path: filePath, category }
    : { path: filePath, category, targetOrientation: CATEGORY_ORIENTATION[category] };
}
