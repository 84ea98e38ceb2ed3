/**
 * UploadSequencer: drives every folder through the 13-step pipeline over one
 * browser session.
 *
 * Login happens once per invocation. A failed step fails its folder and the
 * next folder starts again at rotate-images. A failed login, or input that
 * closes during the validation pause, stops the run.
 * Progress is published on `events`.
 */

import path from 'node:path';
import EventEmitter from 'eventemitter3';
import type { BrowserSession } from '../adapters/types';
import type { Credentials } from '../config/env';
import type { UploadConfig } from '../config/uploadConfig';
import {
  CardBatchError,
  LoginError,
  StepFailedError,
  ValidationAbortedError,
  toErrorMessage,
} from '../errors';
import { OrientationRewriter } from '../imaging/OrientationRewriter';
import { getLogger, type Logger } from '../monitoring/logger';
import { buildPipeline } from './pipeline';
import { elementRetryPolicy, sleep } from './retry';
import { StepExecutor, selectorOf, type ActionRetryEvent } from './StepExecutor';
import type {
  FolderState,
  InvocationResult,
  LoginStep,
  PipelineStep,
  RunContext,
  RunSummary,
  StepName,
  StepSpec,
} from './types';
import type { ValidationGate } from './validationGate';

// ── Events ───────────────────────────────────────────────────────────────

export interface FolderStartEvent {
  folder: string;
  folderName: string;
  index: number;
  total: number;
}

export interface StepEvent {
  folderName: string;
  step: StepName;
  state: FolderState;
}

export interface StepRetryEvent extends StepEvent {
  attempt: number;
  maxAttempts: number;
  target?: string;
  error: string;
}

export interface StepFailedEvent extends StepEvent {
  error: string;
}

export type SequencerEvents = {
  'folder:start': (event: FolderStartEvent) => void;
  'step:start': (event: StepEvent) => void;
  'step:retry': (event: StepRetryEvent) => void;
  'step:complete': (event: StepEvent) => void;
  'step:failed': (event: StepFailedEvent) => void;
  'folder:complete': (summary: RunSummary) => void;
};

// ── Sequencer ────────────────────────────────────────────────────────────

export interface UploadSequencerOptions {
  config: UploadConfig;
  credentials: Credentials;
  /** Owned by the sequencer from here on; closed by runAll() or close(). */
  session: BrowserSession;
  gate: ValidationGate;
  rewriter?: OrientationRewriter;
  logger?: Logger;
}

/** 0 only when every folder finished Done and the run was not cut short. */
export function exitCodeFor(summaries: RunSummary[], fatalError: string | null = null): 0 | 1 {
  if (fatalError !== null) return 1;
  return summaries.every((summary) => summary.state === 'Done') ? 0 : 1;
}

export class UploadSequencer {
  readonly events = new EventEmitter<SequencerEvents>();
  private readonly config: UploadConfig;
  private readonly session: BrowserSession;
  private readonly gate: ValidationGate;
  private readonly rewriter: OrientationRewriter;
  private readonly logger: Logger;
  private readonly pipeline: PipelineStep[];
  private authenticated = false;
  private abortReason: LoginError | ValidationAbortedError | null = null;

  constructor(options: UploadSequencerOptions) {
    this.config = options.config;
    this.session = options.session;
    this.gate = options.gate;
    this.logger = options.logger ?? getLogger();
    this.rewriter = options.rewriter ?? new OrientationRewriter({ logger: this.logger });
    this.pipeline = buildPipeline(options.config, options.credentials, this.logger);
  }

  get isAuthenticated(): boolean {
    return this.authenticated;
  }

  get steps(): readonly PipelineStep[] {
    return this.pipeline;
  }

  /** Run the folders in order, then close the session. */
  async runAll(folders: string[]): Promise<InvocationResult> {
    const summaries: RunSummary[] = [];

    try {
      for (let i = 0; i < folders.length; i++) {
        summaries.push(await this.runFolder(folders[i], i, folders.length));

        if (this.abortReason) {
          const remaining = folders.length - i - 1;
          this.logger.error('Aborting run', {
            error: this.abortReason.message,
            foldersNotRun: remaining,
          });
          break;
        }
      }
    } finally {
      await this.close();
    }

    const fatalError = this.abortReason?.message ?? null;
    return { summaries, fatalError, exitCode: exitCodeFor(summaries, fatalError) };
  }

  async runFolder(folder: string, index = 0, total = 1): Promise<RunSummary> {
    const ctx = this.createContext(folder);
    const log = this.logger.child({ folder: ctx.folderName });

    this.events.emit('folder:start', { folder: ctx.folder, folderName: ctx.folderName, index, total });
    log.info('Folder started', { path: ctx.folder, index: index + 1, total });

    for (let i = 0; i < this.pipeline.length; i++) {
      const step = this.pipeline[i];
      if (step.kind === 'login' && this.authenticated) continue;

      ctx.stepIndex = i;
      ctx.state = step.state;
      ctx.lastStep = step.name;
      const event: StepEvent = { folderName: ctx.folderName, step: step.name, state: step.state };
      this.events.emit('step:start', event);

      try {
        await this.runStep(step, ctx, log.child({ step: step.name }));
      } catch (err) {
        const error = toErrorMessage(err);
        ctx.status = 'failed';
        ctx.failureReason = error;
        log.error('Step failed', { step: step.name, state: step.state, error });
        this.events.emit('step:failed', { ...event, error });
        return this.finish(ctx, log);
      }

      this.events.emit('step:complete', event);
    }

    ctx.status = 'success';
    return this.finish(ctx, log);
  }

  async close(): Promise<void> {
    await this.session.close();
  }

  private createContext(folder: string): RunContext {
    const absolute = path.resolve(folder);
    return {
      folder: absolute,
      folderName: path.basename(absolute),
      images: [],
      rotation: null,
      batchId: null,
      stepIndex: 0,
      state: 'Pending',
      lastStep: null,
      startedAt: Date.now(),
      elapsedMs: 0,
      status: 'pending',
      failureReason: null,
    };
  }

  private async runStep(step: PipelineStep, ctx: RunContext, log: Logger): Promise<void> {
    switch (step.kind) {
      case 'rotate':
        return this.rotate(step.name, ctx);
      case 'login':
        return this.login(step, ctx, log);
      case 'actions':
        return this.runActions(step.name, step.actions, ctx, log);
      case 'validation':
        await this.runActions(step.name, step.actions, ctx, log);
        try {
          await this.gate.acknowledge({
            folder: ctx.folder,
            folderName: ctx.folderName,
            batchId: ctx.batchId,
            imageCount: ctx.images.length,
            rotation: ctx.rotation,
            currentUrl: await this.session.currentUrl(),
          });
        } catch (err) {
          if (err instanceof ValidationAbortedError) this.abortReason = err;
          throw err;
        }
        return;
      default: {
        const exhaustive: never = step;
        throw new Error(`Unknown step kind: ${JSON.stringify(exhaustive)}`);
      }
    }
  }

  private async rotate(name: StepName, ctx: RunContext): Promise<void> {
    try {
      const result = await this.rewriter.rewrite(ctx.folder);
      ctx.rotation = result;
      ctx.images = result.processable;
    } catch (err) {
      throw new StepFailedError(name, undefined, err);
    }

    if (ctx.images.length === 0) {
      throw new StepFailedError(name, undefined, new CardBatchError('No images to upload', 'step_failed'));
    }
  }

  /** Whole login sequence, retried with a backoff that grows with each attempt. */
  private async login(step: LoginStep, ctx: RunContext, log: Logger): Promise<void> {
    const maxAttempts = Math.max(1, step.maxAttempts);
    let lastError = 'unknown error';

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const executor = this.executorFor(step.name, ctx, log);
      const result = await executor.executeAll(this.session, step.actions, ctx);
      if (result.success) {
        this.authenticated = true;
        log.info('Logged in', { attempts: attempt });
        return;
      }

      lastError = describeFailure(result.failedAction, result.error);
      if (attempt < maxAttempts) {
        const delayMs = step.retryDelayMs * attempt;
        log.warn('Login attempt failed, retrying', { attempt, maxAttempts, delayMs, error: lastError });
        this.events.emit('step:retry', {
          folderName: ctx.folderName,
          step: step.name,
          state: step.state,
          attempt,
          maxAttempts,
          error: lastError,
        });
        if (delayMs > 0) await sleep(delayMs);
      }
    }

    const failure = new LoginError(maxAttempts, lastError);
    this.abortReason = failure;
    throw failure;
  }

  private async runActions(name: StepName, actions: StepSpec[], ctx: RunContext, log: Logger): Promise<void> {
    const executor = this.executorFor(name, ctx, log);
    const result = await executor.executeAll(this.session, actions, ctx);
    if (!result.success) {
      throw new StepFailedError(
        name,
        result.failedAction ? selectorOf(result.failedAction) : undefined,
        result.error,
      );
    }
  }

  private executorFor(name: StepName, ctx: RunContext, log: Logger): StepExecutor {
    return new StepExecutor({
      retry: elementRetryPolicy(this.config.retry.max_attempts, this.config.retry.delay_ms),
      logger: log,
      onRetry: (retry: ActionRetryEvent) => {
        this.events.emit('step:retry', {
          folderName: ctx.folderName,
          step: name,
          state: ctx.state,
          attempt: retry.attempt,
          maxAttempts: retry.maxAttempts,
          target: retry.action.target,
          error: toErrorMessage(retry.error),
        });
      },
    });
  }

  private finish(ctx: RunContext, log: Logger): RunSummary {
    ctx.elapsedMs = Date.now() - ctx.startedAt;
    const failed = ctx.status !== 'success';
    const rotation = ctx.rotation;

    const summary: RunSummary = {
      folder: ctx.folder,
      folderName: ctx.folderName,
      imageCount: ctx.images.length,
      rotation: rotation
        ? { front: rotation.front, back: rotation.back, skipped: rotation.skipped, errors: rotation.errors }
        : null,
      batchId: ctx.batchId,
      elapsedMs: ctx.elapsedMs,
      state: failed ? 'Failed' : 'Done',
      status: failed ? 'failed' : 'success',
      failurePoint: failed ? ctx.state : null,
      lastStep: ctx.lastStep,
      error: failed ? ctx.failureReason : null,
    };

    if (failed) {
      ctx.state = 'Failed';
      log.error('Folder failed', { failurePoint: summary.failurePoint, lastStep: summary.lastStep });
    } else {
      ctx.state = 'Done';
      log.info('Folder done', { batchId: summary.batchId, images: summary.imageCount, elapsedMs: summary.elapsedMs });
    }

    this.events.emit('folder:complete', summary);
    return summary;
  }
}

function describeFailure(action: StepSpec | undefined, error: unknown): string {
  const message = toErrorMessage(error);
  return action ? `${action.description}: ${message}` : message;
}
