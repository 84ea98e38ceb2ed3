/** Extensions the orientation rewriter enumerates (compared lower-cased). */
export const ORIENTATION_EXTENSIONS: readonly string[] = ['.jpg', '.jpeg', '.png', '.tiff', '.tif', '.bmp'];

export const DEFAULT_CONFIG_PATH = 'config/upload_config.json';

export const DEFAULT_ELEMENT_TIMEOUT_MS = 15_000;
export const DEFAULT_NAVIGATION_TIMEOUT_MS = 30_000;
export const DEFAULT_UPLOAD_SETTLE_MS = 3_000;

export const DEFAULT_RETRY_ATTEMPTS = 3;
export const DEFAULT_RETRY_DELAY_MS = 1_000;

export const DEFAULT_LOGIN_ATTEMPTS = 3;
export const DEFAULT_LOGIN_RETRY_DELAY_MS = 2_000;

// Current format: /batches/{batch_id}/add/types
export const DEFAULT_BATCH_ID_PATTERN = '/batches/([^/]+)/add';

export const DEFAULT_BATCH_ID_FALLBACK_SELECTORS: readonly string[] = [
  'input[name="batch_id"]',
  '[data-batch-id]',
  '.batch-info [data-id]',
  '#batch_id',
];

/** URL fragments that confirm each page transition. */
export const DEFAULT_URL_MARKERS = {
  general_settings: 'general-settings',
  optional_details: 'optional-details',
  batch_created: '/batches/',
  sides: '/sides',
  upload: '/upload',
} as const;

export const DEFAULT_BATCH_NAME_TEMPLATE = '{{folderName}}';
