/**
 * Core types for the upload sequencer.
 *
 * StepSpec, PipelineStep, RunContext and RunSummary, used by StepExecutor,
 * buildPipeline and UploadSequencer.
 */

import { z } from 'zod';
import type { ElementState, SelectMode } from '../adapters/types';
import type { ImageFile, RotationResult } from '../imaging';

// ── Folder state machine ─────────────────────────────────────────────────

export const FolderStateSchema = z.enum([
  'Pending',
  'Rotating',
  'LoggingIn',
  'FillingSettings',
  'CreatingBatch',
  'ExtractingId',
  'SelectingSides',
  'Uploading',
  'AwaitingValidation',
  'Done',
  'Failed',
]);

export type FolderState = z.infer<typeof FolderStateSchema>;

export type TerminalState = Extract<FolderState, 'Done' | 'Failed'>;

export type RunStatus = 'pending' | 'success' | 'failed';

// ── StepSpec ─────────────────────────────────────────────────────────────
// One browser action. `value` fields may hold {{variable}} templates that are
// resolved against the folder's RunContext when the action runs.

interface StepSpecBase {
  description: string;
  /** Logical selector name from the config's selector map, for logs */
  target?: string;
  timeoutMs: number;
  /** Log and carry on when the action fails instead of failing the folder */
  continueOnError?: boolean;
}

export interface NavigateSpec extends StepSpecBase {
  action: 'navigate';
  url: string;
}

export interface WaitForElementSpec extends StepSpecBase {
  action: 'waitForElement';
  selector: string;
  state?: ElementState;
}

export interface WaitForUrlSpec extends StepSpecBase {
  action: 'waitForUrl';
  fragment: string;
}

export interface FillSpec extends StepSpecBase {
  action: 'fill';
  selector: string;
  value: string;
}

export interface SelectSpec extends StepSpecBase {
  action: 'select';
  selector: string;
  value: string;
  mode: SelectMode;
}

export interface ClickSpec extends StepSpecBase {
  action: 'click';
  selector: string;
}

/** Sets every processable image of the folder on a file input. */
export interface UploadSpec extends StepSpecBase {
  action: 'upload';
  selector: string;
}

/** Reads the batch id: regex over the URL first, then the fallback selectors in order. */
export interface ExtractSpec extends StepSpecBase {
  action: 'extract';
  urlPattern: string;
  fallbackSelectors: string[];
}

export interface DelaySpec extends StepSpecBase {
  action: 'delay';
  ms: number;
}

export type StepSpec =
  | NavigateSpec
  | WaitForElementSpec
  | WaitForUrlSpec
  | FillSpec
  | SelectSpec
  | ClickSpec
  | UploadSpec
  | ExtractSpec
  | DelaySpec;

export type StepAction = StepSpec['action'];

// ── PipelineStep ─────────────────────────────────────────────────────────

export const STEP_NAMES = [
  'rotate-images',
  'login',
  'open-batch-form',
  'general-settings',
  'continue-to-optional-details',
  'optional-details',
  'create-batch',
  'extract-batch-id',
  'magic-scan',
  'select-sides',
  'upload-images',
  'continue-after-upload',
  'await-validation',
] as const;

export type StepName = (typeof STEP_NAMES)[number];

interface PipelineStepBase {
  name: StepName;
  state: FolderState;
}

/** Runs the orientation rewriter on the folder. No browser work. */
export interface RotateStep extends PipelineStepBase {
  kind: 'rotate';
}

/** Once per invocation; the whole action list is retried with backoff. */
export interface LoginStep extends PipelineStepBase {
  kind: 'login';
  actions: StepSpec[];
  maxAttempts: number;
  retryDelayMs: number;
}

export interface ActionsStep extends PipelineStepBase {
  kind: 'actions';
  actions: StepSpec[];
}

/** Runs its actions, then blocks on the human validation gate. */
export interface ValidationStep extends PipelineStepBase {
  kind: 'validation';
  actions: StepSpec[];
}

export type PipelineStep = RotateStep | LoginStep | ActionsStep | ValidationStep;

// ── Run state ────────────────────────────────────────────────────────────

export interface RunContext {
  folder: string;
  folderName: string;
  images: ImageFile[];
  rotation: RotationResult | null;
  batchId: string | null;
  stepIndex: number;
  state: FolderState;
  lastStep: StepName | null;
  startedAt: number;
  elapsedMs: number;
  status: RunStatus;
  failureReason: string | null;
}

export interface RotationCounts {
  front: number;
  back: number;
  skipped: number;
  errors: number;
}

export interface RunSummary {
  folder: string;
  folderName: string;
  imageCount: number;
  rotation: RotationCounts | null;
  batchId: string | null;
  elapsedMs: number;
  state: TerminalState;
  status: Exclude<RunStatus, 'pending'>;
  /** State the folder was in when it failed */
  failurePoint: FolderState | null;
  lastStep: StepName | null;
  error: string | null;
}

export interface InvocationResult {
  summaries: RunSummary[];
  /** Set when the run stopped early (login failure) */
  fatalError: string | null;
  exitCode: 0 | 1;
}
