/**
 * buildPipeline: turns an UploadConfig into the fixed 13-step pipeline.
 *
 * Selectors and form values are resolved here, once. Optional selectors that
 * are absent from the config produce no action.
 */

import { DEFAULT_BATCH_NAME_TEMPLATE } from '../config/constants';
import { selectorFor, selectorKind, type UploadConfig } from '../config/uploadConfig';
import { ConfigurationError } from '../errors';
import type { Credentials } from '../config/env';
import { getLogger, type Logger } from '../monitoring/logger';
import type { PipelineStep, StepSpec } from './types';

type SpecExtra = Partial<Pick<StepSpec, 'continueOnError'>>;

interface SpecFactory {
  click(target: string, description: string, extra?: SpecExtra): StepSpec;
  fill(target: string, value: string, description: string, extra?: SpecExtra): StepSpec;
  select(target: string, value: string, description: string, extra?: SpecExtra): StepSpec;
  waitForUrl(fragment: string, description: string): StepSpec;
}

function specFactory(config: UploadConfig): SpecFactory {
  const elementMs = config.timeouts.element_ms;
  const navigationMs = config.timeouts.navigation_ms;
  const selector = (target: string): string => {
    const value = selectorFor(config, target);
    if (value === undefined) {
      throw new ConfigurationError(`Selector "${target}" is not configured`);
    }
    return value;
  };

  return {
    click: (target, description, extra) => ({
      action: 'click',
      selector: selector(target),
      target,
      description,
      timeoutMs: elementMs,
      ...extra,
    }),
    fill: (target, value, description, extra) => ({
      action: 'fill',
      selector: selector(target),
      target,
      value,
      description,
      timeoutMs: elementMs,
      ...extra,
    }),
    select: (target, value, description, extra) => ({
      action: 'select',
      selector: selector(target),
      target,
      value,
      mode: selectorKind(config, target),
      description,
      timeoutMs: elementMs,
      ...extra,
    }),
    waitForUrl: (fragment, description) => ({
      action: 'waitForUrl',
      fragment,
      description,
      timeoutMs: navigationMs,
    }),
  };
}

export function buildLoginActions(config: UploadConfig, credentials: Credentials): StepSpec[] {
  const spec = specFactory(config);

  return [
    {
      action: 'navigate',
      url: config.urls.login,
      description: 'Open login page',
      timeoutMs: config.timeouts.navigation_ms,
    },
    spec.fill('username_input', credentials.username, 'Fill username'),
    spec.fill('password_input', credentials.password, 'Fill password'),
    spec.click('login_button', 'Submit login'),
    spec.waitForUrl(config.url_markers.login_success ?? config.urls.batches, 'Wait for login redirect'),
  ];
}

function optionalDetailActions(config: UploadConfig, spec: SpecFactory, logger: Logger): StepSpec[] {
  const actions: StepSpec[] = [];

  for (const [field, value] of Object.entries(config.optional_details)) {
    const target = `optional_${field}`;
    if (selectorFor(config, target) === undefined) {
      logger.warn('No selector for optional detail, skipping', { field, target });
      continue;
    }
    const description = `Optional detail: ${field}`;
    // A field the page does not offer is logged and passed over
    actions.push(
      config.selectors[`${target}_type`] !== undefined
        ? spec.select(target, value, description, { continueOnError: true })
        : spec.fill(target, value, description, { continueOnError: true }),
    );
  }
  return actions;
}

function sideSelectionActions(config: UploadConfig, spec: SpecFactory): StepSpec[] {
  const actions: StepSpec[] = [];
  const { card_type: cardType, sides } = config.scan_options;

  if (selectorFor(config, 'scan_card_type_radio') !== undefined) {
    actions.push(
      spec.click('scan_card_type_radio', `Card type${cardType ? ` (${cardType})` : ''}`, {
        continueOnError: true,
      }),
    );
  }

  if (selectorFor(config, 'scan_sides_option') !== undefined) {
    actions.push(spec.click('scan_sides_option', `Sides${sides ? ` (${sides})` : ''}`));
  } else if (selectorFor(config, 'scan_sides_select') !== undefined && sides) {
    actions.push(spec.select('scan_sides_select', sides, 'Sides'));
  }

  actions.push(spec.click('sides_continue_button', 'Continue (sides)'));
  actions.push(spec.waitForUrl(config.url_markers.upload, 'Wait for upload page'));
  return actions;
}

/** The per-folder pipeline. `login` carries the credentials it will type. */
export function buildPipeline(
  config: UploadConfig,
  credentials: Credentials,
  logger: Logger = getLogger(),
): PipelineStep[] {
  const spec = specFactory(config);
  const general = config.general_settings;
  const markers = config.url_markers;
  const elementMs = config.timeouts.element_ms;
  const settleMs = config.timeouts.upload_settle_ms;

  const inspector = selectorFor(config, 'inspector_view');
  const validationActions: StepSpec[] =
    inspector !== undefined
      ? [
          {
            action: 'waitForElement',
            selector: inspector,
            target: 'inspector_view',
            description: 'Wait for inspector view',
            timeoutMs: config.timeouts.navigation_ms,
          },
        ]
      : [{ action: 'delay', ms: settleMs, description: 'Let inspector view settle', timeoutMs: settleMs }];

  return [
    { name: 'rotate-images', state: 'Rotating', kind: 'rotate' },
    {
      name: 'login',
      state: 'LoggingIn',
      kind: 'login',
      actions: buildLoginActions(config, credentials),
      maxAttempts: config.login.max_attempts,
      retryDelayMs: config.login.retry_delay_ms,
    },
    {
      name: 'open-batch-form',
      state: 'FillingSettings',
      kind: 'actions',
      actions: [
        {
          action: 'navigate',
          url: config.urls.batches,
          description: 'Open batches list',
          timeoutMs: config.timeouts.navigation_ms,
        },
        {
          action: 'waitForElement',
          selector: selectorFor(config, 'create_batch_button'),
          target: 'create_batch_button',
          description: 'Wait for create batch button',
          timeoutMs: elementMs,
        },
        spec.click('create_batch_button', 'Create batch'),
        spec.waitForUrl(markers.general_settings, 'Wait for general settings'),
      ],
    },
    {
      name: 'general-settings',
      state: 'FillingSettings',
      kind: 'actions',
      actions: [
        spec.fill('batch_name_input', general.batch_name ?? DEFAULT_BATCH_NAME_TEMPLATE, 'Batch name'),
        spec.select('batch_type_select', general.batch_type, 'Batch type'),
        spec.select('sport_type_select', general.sport_type, 'Sport type'),
        spec.select('title_template_select', general.title_template, 'Title template'),
        spec.fill('description_input', general.description_template, 'Description template'),
      ],
    },
    {
      name: 'continue-to-optional-details',
      state: 'FillingSettings',
      kind: 'actions',
      actions: [
        spec.click('continue_button_general', 'Continue (general settings)'),
        spec.waitForUrl(markers.optional_details, 'Wait for optional details'),
      ],
    },
    {
      name: 'optional-details',
      state: 'FillingSettings',
      kind: 'actions',
      actions: optionalDetailActions(config, spec, logger),
    },
    {
      name: 'create-batch',
      state: 'CreatingBatch',
      kind: 'actions',
      actions: [
        spec.click('create_batch_submit', 'Submit batch'),
        spec.waitForUrl(markers.batch_created, 'Wait for batch page'),
      ],
    },
    {
      name: 'extract-batch-id',
      state: 'ExtractingId',
      kind: 'actions',
      actions: [
        {
          action: 'extract',
          urlPattern: config.batch_id.url_pattern,
          fallbackSelectors: config.batch_id.fallback_selectors,
          description: 'Extract batch id',
          timeoutMs: Math.min(elementMs, 2000),
        },
      ],
    },
    {
      name: 'magic-scan',
      state: 'SelectingSides',
      kind: 'actions',
      actions: [
        spec.click('magic_scan_button', 'Magic scan'),
        spec.waitForUrl(markers.sides, 'Wait for sides page'),
      ],
    },
    {
      name: 'select-sides',
      state: 'SelectingSides',
      kind: 'actions',
      actions: sideSelectionActions(config, spec),
    },
    {
      name: 'upload-images',
      state: 'Uploading',
      kind: 'actions',
      actions: [
        {
          action: 'upload',
          selector: selectorFor(config, 'upload_file_input'),
          target: 'upload_file_input',
          description: 'Set files on upload input',
          timeoutMs: elementMs,
        },
      ],
    },
    {
      name: 'continue-after-upload',
      state: 'Uploading',
      kind: 'actions',
      actions: [
        { action: 'delay', ms: settleMs, description: 'Let uploads settle', timeoutMs: settleMs },
        spec.click('upload_continue_button', 'Continue (upload)'),
      ],
    },
    {
      name: 'await-validation',
      state: 'AwaitingValidation',
      kind: 'validation',
      actions: validationActions,
    },
  ];
}
