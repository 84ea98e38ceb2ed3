export {
  OrientationCode,
  ORIENTATION_LABELS,
  ORIENTATION_TAG,
  classifyImage,
  isOrientationCandidate,
  isOrientationCode,
  toImageFile,
} from './orientation';
export type { ImageCategory, ImageFile } from './orientation';
export { ExifTagWriter } from './tagWriter';
export type { OrientationTagWriter } from './tagWriter';
export { OrientationRewriter } from './OrientationRewriter';
export type {
  InspectedImage,
  OrientationRewriterOptions,
  RotationFailure,
  RotationResult,
} from './OrientationRewriter';
