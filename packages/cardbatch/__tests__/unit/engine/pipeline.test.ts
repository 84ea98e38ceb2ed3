import { describe, expect, test } from 'vitest';
import { buildPipeline } from '../../../src/engine/pipeline';
import { STEP_NAMES, type PipelineStep, type StepSpec } from '../../../src/engine/types';
import { Logger } from '../../../src/monitoring/logger';
import { TEST_CREDENTIALS, TEST_SELECTORS, makeConfig } from '../../fixtures/uploadFixtures';

const quiet = new Logger({ level: 'error' });

function actionsOf(steps: PipelineStep[], name: string): StepSpec[] {
  const step = steps.find((s) => s.name === name);
  if (!step || step.kind === 'rotate') return [];
  return step.actions;
}

describe('buildPipeline', () => {
  test('has the 13 steps in order with their states', () => {
    const steps = buildPipeline(makeConfig(), TEST_CREDENTIALS, quiet);

    expect(steps.map((s) => s.name)).toEqual([...STEP_NAMES]);
    expect(steps.map((s) => s.state)).toEqual([
      'Rotating',
      'LoggingIn',
      'FillingSettings',
      'FillingSettings',
      'FillingSettings',
      'FillingSettings',
      'CreatingBatch',
      'ExtractingId',
      'SelectingSides',
      'SelectingSides',
      'Uploading',
      'Uploading',
      'AwaitingValidation',
    ]);
  });

  test('login fills the credentials and waits for the batches URL', () => {
    const steps = buildPipeline(makeConfig(), TEST_CREDENTIALS, quiet);
    const login = steps[1];

    expect(login).toMatchObject({ kind: 'login', maxAttempts: 3, retryDelayMs: 0 });
    expect(actionsOf(steps, 'login').map((a) => a.action)).toEqual([
      'navigate',
      'fill',
      'fill',
      'click',
      'waitForUrl',
    ]);
    expect(actionsOf(steps, 'login')[2]).toMatchObject({ selector: '#password', value: 'test-secret' });
    expect(actionsOf(steps, 'login')[4]).toMatchObject({ fragment: 'https://cards.test/batches' });
  });

  test('a login_success marker overrides the redirect fragment', () => {
    const steps = buildPipeline(
      makeConfig({ url_markers: { login_success: '/dashboard' } }),
      TEST_CREDENTIALS,
      quiet,
    );

    expect(actionsOf(steps, 'login')[4]).toMatchObject({ fragment: '/dashboard' });
  });

  test('general settings default the batch name to the folder name and honour custom dropdowns', () => {
    const actions = actionsOf(buildPipeline(makeConfig(), TEST_CREDENTIALS, quiet), 'general-settings');

    expect(actions[0]).toMatchObject({ action: 'fill', selector: '#batch-name', value: '{{folderName}}' });
    expect(actions[1]).toMatchObject({ action: 'select', selector: '#batch-type', mode: 'native' });
    expect(actions[2]).toMatchObject({ action: 'select', selector: '#sport', mode: 'custom', value: 'Baseball' });
    expect(actions[4]).toMatchObject({ action: 'fill', value: 'Cards from {{folderName}}' });
  });

  test('optional details without a selector are skipped', () => {
    const config = makeConfig({
      optional_details: { year: '1989', brand: 'Example Brand', grade: '9' },
      selectors: { ...TEST_SELECTORS, optional_year: '#year', optional_grade: '#grade', optional_grade_type: 'native' },
    });

    const actions = actionsOf(buildPipeline(config, TEST_CREDENTIALS, quiet), 'optional-details');

    expect(actions).toEqual([
      expect.objectContaining({ action: 'fill', selector: '#year', value: '1989', continueOnError: true }),
      expect.objectContaining({ action: 'select', selector: '#grade', value: '9', mode: 'native', continueOnError: true }),
    ]);
  });

  test('side selection uses the tile when configured', () => {
    const actions = actionsOf(buildPipeline(makeConfig(), TEST_CREDENTIALS, quiet), 'select-sides');

    expect(actions.map((a) => a.target ?? a.action)).toEqual(['scan_sides_option', 'sides_continue_button', 'waitForUrl']);
  });

  test('side selection falls back to the dropdown and tolerates a missing card-type radio', () => {
    const { scan_sides_option, ...selectors } = TEST_SELECTORS;
    const config = makeConfig({
      scan_options: { card_type: 'Raw', sides: 'Front & Back' },
      selectors: { ...selectors, scan_card_type_radio: '#raw', scan_sides_select: '#sides', scan_sides_select_type: 'custom' },
    });

    const actions = actionsOf(buildPipeline(config, TEST_CREDENTIALS, quiet), 'select-sides');

    expect(actions[0]).toMatchObject({ action: 'click', selector: '#raw', continueOnError: true });
    expect(actions[1]).toMatchObject({ action: 'select', selector: '#sides', value: 'Front & Back', mode: 'custom' });
  });

  test('the validation step waits for the inspector view when configured', () => {
    const withInspector = actionsOf(buildPipeline(makeConfig(), TEST_CREDENTIALS, quiet), 'await-validation');
    const { inspector_view, ...selectors } = TEST_SELECTORS;
    const without = actionsOf(buildPipeline(makeConfig({ selectors }), TEST_CREDENTIALS, quiet), 'await-validation');

    expect(withInspector).toEqual([expect.objectContaining({ action: 'waitForElement', selector: '#inspector' })]);
    expect(without).toEqual([expect.objectContaining({ action: 'delay', ms: 0 })]);
  });
});
