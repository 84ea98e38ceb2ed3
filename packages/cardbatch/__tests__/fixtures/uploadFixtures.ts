/**
 * Shared fixtures: a parsed upload config with fast timeouts, a mock site whose
 * buttons move the URL through the batch flow, an in-memory tag writer, and
 * temporary image folders.
 */

import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { MockBrowserSession } from '../../src/adapters/mock';
import { parseUploadConfig, type UploadConfig, type UploadConfigInput } from '../../src/config/uploadConfig';
import type { OrientationCode } from '../../src/imaging/orientation';
import type { OrientationTagWriter } from '../../src/imaging/tagWriter';

export const SITE = 'https://cards.test';

export const TEST_CREDENTIALS = { username: 'test-user', password: 'test-secret' };

export const TEST_SELECTORS: Record<string, string> = {
  username_input: '#username',
  password_input: '#password',
  login_button: '#login',
  create_batch_button: '#create-batch',
  batch_name_input: '#batch-name',
  batch_type_select: '#batch-type',
  sport_type_select: '#sport',
  sport_type_select_type: 'custom',
  title_template_select: '#title-template',
  description_input: '#description',
  continue_button_general: '#continue-general',
  create_batch_submit: '#create-submit',
  magic_scan_button: '#magic-scan',
  scan_sides_option: '#sides-both',
  sides_continue_button: '#sides-continue',
  upload_file_input: '#file-input',
  upload_continue_button: '#upload-continue',
  inspector_view: '#inspector',
};

export function rawConfig(overrides: Partial<UploadConfigInput> = {}): UploadConfigInput {
  return {
    default_images_path: '/tmp/cards',
    urls: { login: `${SITE}/login`, batches: `${SITE}/batches` },
    general_settings: {
      batch_type: 'Standard',
      sport_type: 'Baseball',
      title_template: 'Default Title',
      description_template: 'Cards from {{folderName}}',
    },
    selectors: { ...TEST_SELECTORS },
    timeouts: { element_ms: 100, navigation_ms: 100, upload_settle_ms: 0 },
    retry: { max_attempts: 3, delay_ms: 0 },
    login: { max_attempts: 3, retry_delay_ms: 0 },
    ...overrides,
  };
}

export function makeConfig(overrides: Partial<UploadConfigInput> = {}): UploadConfig {
  return parseUploadConfig(rawConfig(overrides));
}

/** URL the batch form lands on after submit, carrying `batchId`. */
export function batchUrl(batchId: string, page = 'add/types'): string {
  return `${SITE}/batches/${batchId}/${page}`;
}

/** A mock site on which the whole 13-step flow succeeds, creating batch `batchId`. */
export function mockSite(batchId = 'B-100'): MockBrowserSession {
  return new MockBrowserSession({
    elements: {
      '#username': {},
      '#password': {},
      '#login': { navigatesTo: `${SITE}/batches` },
      '#create-batch': { navigatesTo: `${SITE}/batches/new/general-settings` },
      '#batch-name': {},
      '#batch-type': {},
      '#sport': {},
      '#title-template': {},
      '#description': {},
      '#continue-general': { navigatesTo: `${SITE}/batches/new/optional-details` },
      '#create-submit': { navigatesTo: batchUrl(batchId) },
      '#magic-scan': { navigatesTo: batchUrl(batchId, 'sides') },
      '#sides-both': {},
      '#sides-continue': { navigatesTo: batchUrl(batchId, 'upload') },
      '#file-input': {},
      '#upload-continue': { navigatesTo: batchUrl(batchId, 'inspector') },
      '#inspector': {},
    },
  });
}

/** Keeps tags in a map; files whose base name is in `failOn` throw. */
export class MemoryTagWriter implements OrientationTagWriter {
  readonly tags = new Map<string, OrientationCode>();

  constructor(private readonly failOn: string[] = []) {}

  supports(filePath: string): boolean {
    return path.extname(filePath).toLowerCase() !== '.bmp';
  }

  async write(filePath: string, code: OrientationCode): Promise<void> {
    if (this.failOn.includes(path.basename(filePath))) {
      throw new Error('unreadable image data');
    }
    this.tags.set(filePath, code);
  }

  async read(filePath: string): Promise<OrientationCode | null> {
    return this.tags.get(filePath) ?? null;
  }
}

/** Create a temp folder named `name` holding placeholder files. */
export async function makeImageFolder(name: string, files: string[]): Promise<string> {
  const root = await mkdtemp(path.join(os.tmpdir(), 'cardbatch-'));
  const folder = path.join(root, name);
  await mkdir(folder);
  for (const file of files) {
    await writeFile(path.join(folder, file), 'placeholder');
  }
  return folder;
}

export async function removeImageFolder(folder: string): Promise<void> {
  await rm(path.dirname(folder), { recursive: true, force: true });
}
