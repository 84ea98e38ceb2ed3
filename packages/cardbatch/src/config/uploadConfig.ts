/**
 * Upload configuration: URLs, form values and the selector map for the
 * target site, read from a JSON file and validated with zod.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigurationError, toErrorMessage } from '../errors';
import {
  DEFAULT_BATCH_ID_FALLBACK_SELECTORS,
  DEFAULT_BATCH_ID_PATTERN,
  DEFAULT_ELEMENT_TIMEOUT_MS,
  DEFAULT_LOGIN_ATTEMPTS,
  DEFAULT_LOGIN_RETRY_DELAY_MS,
  DEFAULT_NAVIGATION_TIMEOUT_MS,
  DEFAULT_RETRY_ATTEMPTS,
  DEFAULT_RETRY_DELAY_MS,
  DEFAULT_UPLOAD_SETTLE_MS,
  DEFAULT_URL_MARKERS,
} from './constants';

// ── Sections ─────────────────────────────────────────────────────────────

export const SelectorKindSchema = z.enum(['native', 'custom']);
export type SelectorKind = z.infer<typeof SelectorKindSchema>;

/**
 * Selector map. Plain keys hold selector strings; a key ending in `_type`
 * marks its companion selector as a "native" or "custom" dropdown.
 */
export const SelectorMapSchema = z
  .record(z.string(), z.string().min(1))
  .superRefine((map, ctx) => {
    for (const [key, value] of Object.entries(map)) {
      if (!key.endsWith('_type')) continue;
      if (!SelectorKindSchema.safeParse(value).success) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `must be "native" or "custom", got "${value}"`,
        });
      }
    }
  });

export type SelectorMap = z.infer<typeof SelectorMapSchema>;

/** A regular expression source; the first capture group is the batch id. */
export const BatchIdPatternSchema = z
  .string()
  .min(1)
  .superRefine((source, ctx) => {
    try {
      new RegExp(source);
    } catch (err) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid regular expression: ${toErrorMessage(err)}` });
    }
  });

export const UploadConfigSchema = z
  .object({
    default_images_path: z.string().min(1),
    urls: z.object({
      login: z.string().url(),
      batches: z.string().url(),
    }),
    url_markers: z
      .object({
        login_success: z.string().min(1).optional(),
        general_settings: z.string().min(1).default(DEFAULT_URL_MARKERS.general_settings),
        optional_details: z.string().min(1).default(DEFAULT_URL_MARKERS.optional_details),
        batch_created: z.string().min(1).default(DEFAULT_URL_MARKERS.batch_created),
        sides: z.string().min(1).default(DEFAULT_URL_MARKERS.sides),
        upload: z.string().min(1).default(DEFAULT_URL_MARKERS.upload),
      })
      .default({}),
    general_settings: z.object({
      batch_name: z.string().min(1).optional(),
      batch_type: z.string().min(1),
      sport_type: z.string().min(1),
      title_template: z.string().min(1),
      description_template: z.string().min(1),
    }),
    optional_details: z.record(z.string(), z.string()).default({}),
    scan_options: z
      .object({
        card_type: z.string().min(1).optional(),
        sides: z.string().min(1).optional(),
      })
      .default({}),
    selectors: SelectorMapSchema,
    batch_id: z
      .object({
        url_pattern: BatchIdPatternSchema.default(DEFAULT_BATCH_ID_PATTERN),
        fallback_selectors: z.array(z.string().min(1)).default([...DEFAULT_BATCH_ID_FALLBACK_SELECTORS]),
      })
      .default({}),
    timeouts: z
      .object({
        element_ms: z.number().int().positive().default(DEFAULT_ELEMENT_TIMEOUT_MS),
        navigation_ms: z.number().int().positive().default(DEFAULT_NAVIGATION_TIMEOUT_MS),
        upload_settle_ms: z.number().int().nonnegative().default(DEFAULT_UPLOAD_SETTLE_MS),
      })
      .default({}),
    retry: z
      .object({
        max_attempts: z.number().int().min(1).default(DEFAULT_RETRY_ATTEMPTS),
        delay_ms: z.number().int().nonnegative().default(DEFAULT_RETRY_DELAY_MS),
      })
      .default({}),
    login: z
      .object({
        max_attempts: z.number().int().min(1).default(DEFAULT_LOGIN_ATTEMPTS),
        retry_delay_ms: z.number().int().nonnegative().default(DEFAULT_LOGIN_RETRY_DELAY_MS),
      })
      .default({}),
  })
  .strict();

export type UploadConfig = z.infer<typeof UploadConfigSchema>;
export type UploadConfigInput = z.input<typeof UploadConfigSchema>;

/** Selector keys every run needs. The remaining keys are optional. */
export const REQUIRED_SELECTORS = [
  'username_input',
  'password_input',
  'login_button',
  'create_batch_button',
  'batch_name_input',
  'batch_type_select',
  'sport_type_select',
  'title_template_select',
  'description_input',
  'continue_button_general',
  'create_batch_submit',
  'magic_scan_button',
  'sides_continue_button',
  'upload_file_input',
  'upload_continue_button',
] as const;

export type RequiredSelector = (typeof REQUIRED_SELECTORS)[number];

// ── Parsing ──────────────────────────────────────────────────────────────

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}

export function parseUploadConfig(raw: unknown): UploadConfig {
  const parsed = UploadConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigurationError(`Invalid upload configuration:\n  ${issues.join('\n  ')}`, issues);
  }

  const missing = REQUIRED_SELECTORS.filter((key) => !(key in parsed.data.selectors));
  if (missing.length > 0) {
    const issues = missing.map((key) => `selectors.${key}: required`);
    throw new ConfigurationError(`Invalid upload configuration:\n  ${issues.join('\n  ')}`, issues);
  }

  return parsed.data;
}

export async function loadUploadConfig(configPath: string): Promise<UploadConfig> {
  let text: string;
  try {
    text = await readFile(configPath, 'utf8');
  } catch (err) {
    throw new ConfigurationError(`Config file not found or unreadable: ${configPath} (${toErrorMessage(err)})`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError(`Invalid JSON in ${configPath}: ${toErrorMessage(err)}`);
  }

  return parseUploadConfig(raw);
}

// ── Selector lookup ──────────────────────────────────────────────────────

export function selectorFor(config: UploadConfig, key: RequiredSelector): string;
export function selectorFor(config: UploadConfig, key: string): string | undefined;
export function selectorFor(config: UploadConfig, key: string): string | undefined {
  return config.selectors[key];
}

/** How a dropdown selector should be driven, from its `<key>_type` companion. */
export function selectorKind(config: UploadConfig, key: string): SelectorKind {
  return config.selectors[`${key}_type`] === 'custom' ? 'custom' : 'native';
}
