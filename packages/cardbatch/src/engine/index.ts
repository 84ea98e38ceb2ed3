export { UploadSequencer, exitCodeFor } from './UploadSequencer';
export type {
  FolderStartEvent,
  SequencerEvents,
  StepEvent,
  StepFailedEvent,
  StepRetryEvent,
  UploadSequencerOptions,
} from './UploadSequencer';
export { StepExecutor, selectorOf } from './StepExecutor';
export type { ActionRetryEvent, ExecuteAllResult, ExecuteStepResult, StepExecutorOptions } from './StepExecutor';
export { buildLoginActions, buildPipeline } from './pipeline';
export { batchIdFromUrl, extractBatchId } from './batchId';
export type { BatchIdResult } from './batchId';
export { elementRetryPolicy, isTransientElementError, sleep, withRetry } from './retry';
export type { RetryInfo, RetryPolicy } from './retry';
export { resolveTemplate, templateVarsFor } from './templateResolver';
export type { TemplateVars } from './templateResolver';
export { ConsoleValidationGate, formatValidationPrompt } from './validationGate';
export type { ValidationGate, ValidationPrompt } from './validationGate';
export { FolderStateSchema, STEP_NAMES } from './types';
export type {
  FolderState,
  InvocationResult,
  PipelineStep,
  RotationCounts,
  RunContext,
  RunStatus,
  RunSummary,
  StepAction,
  StepName,
  StepSpec,
} from './types';
