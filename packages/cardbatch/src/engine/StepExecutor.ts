/**
 * StepExecutor: replays a list of StepSpecs against a BrowserSession.
 *
 * Element actions re-locate their element on every attempt, so a retry after
 * a stale or intercepted click starts from a fresh lookup. Stops on the first
 * action that fails.
 */

import type { BrowserSession } from '../adapters/types';
import { CardBatchError, toErrorMessage } from '../errors';
import { getLogger, type Logger } from '../monitoring/logger';
import { extractBatchId } from './batchId';
import { elementRetryPolicy, sleep, withRetry, type RetryInfo, type RetryPolicy } from './retry';
import { resolveTemplate, templateVarsFor } from './templateResolver';
import type { RunContext, StepSpec } from './types';

export interface ExecuteAllResult {
  success: boolean;
  actionsCompleted: number;
  failedActionIndex?: number;
  failedAction?: StepSpec;
  error?: unknown;
}

export interface ExecuteStepResult {
  success: boolean;
  attempts: number;
  /** The action failed but was marked continueOnError */
  tolerated?: boolean;
  error?: unknown;
}

export interface ActionRetryEvent extends RetryInfo {
  action: StepSpec;
}

export interface StepExecutorOptions {
  retry?: RetryPolicy;
  logger?: Logger;
  /** Called before each re-attempt of an action */
  onRetry?: (event: ActionRetryEvent) => void;
}

/** Selector an action works on, for logs and error reports. */
export function selectorOf(spec: StepSpec): string | undefined {
  switch (spec.action) {
    case 'waitForElement':
    case 'fill':
    case 'select':
    case 'click':
    case 'upload':
      return spec.selector;
    default:
      return undefined;
  }
}

export class StepExecutor {
  private retry: RetryPolicy;
  private logger: Logger;
  private onRetry: ((event: ActionRetryEvent) => void) | null;

  constructor(options?: StepExecutorOptions) {
    this.retry = options?.retry ?? elementRetryPolicy(3, 1000);
    this.logger = options?.logger ?? getLogger();
    this.onRetry = options?.onRetry ?? null;
  }

  /**
   * Execute the actions in order against one folder's context.
   * Stops on first failure and returns the failed action.
   */
  async executeAll(session: BrowserSession, actions: StepSpec[], ctx: RunContext): Promise<ExecuteAllResult> {
    for (let i = 0; i < actions.length; i++) {
      const action = actions[i];
      const result = await this.executeStep(session, action, ctx);

      if (!result.success) {
        return {
          success: false,
          actionsCompleted: i,
          failedActionIndex: i,
          failedAction: action,
          error: result.error,
        };
      }
    }

    return { success: true, actionsCompleted: actions.length };
  }

  /** Execute one action with the element retry policy. */
  async executeStep(session: BrowserSession, spec: StepSpec, ctx: RunContext): Promise<ExecuteStepResult> {
    let attempts = 0;

    try {
      await withRetry(
        async (attempt) => {
          attempts = attempt;
          await this.performAction(session, spec, ctx);
        },
        this.retry,
        (info) => {
          this.logger.warn('Retrying action', {
            action: spec.action,
            target: spec.target,
            selector: selectorOf(spec),
            attempt: info.attempt,
            maxAttempts: info.maxAttempts,
            error: toErrorMessage(info.error),
          });
          this.onRetry?.({ ...info, action: spec });
        },
      );
    } catch (err) {
      if (spec.continueOnError) {
        this.logger.warn(`${spec.description} failed, continuing`, {
          target: spec.target,
          error: toErrorMessage(err),
        });
        return { success: true, attempts, tolerated: true, error: err };
      }
      return { success: false, attempts, error: err };
    }

    this.logger.debug(spec.description, { action: spec.action, target: spec.target, attempts });
    return { success: true, attempts };
  }

  private async performAction(session: BrowserSession, spec: StepSpec, ctx: RunContext): Promise<void> {
    const vars = templateVarsFor(ctx);

    switch (spec.action) {
      case 'navigate':
        await session.navigate(resolveTemplate(spec.url, vars), spec.timeoutMs);
        break;
      case 'waitForElement':
        await session.find(spec.selector, { timeoutMs: spec.timeoutMs, state: spec.state });
        break;
      case 'waitForUrl':
        await session.waitForUrl(spec.fragment, spec.timeoutMs);
        break;
      case 'fill': {
        const element = await session.find(spec.selector, { timeoutMs: spec.timeoutMs });
        await session.type(element, resolveTemplate(spec.value, vars));
        break;
      }
      case 'select': {
        const element = await session.find(spec.selector, { timeoutMs: spec.timeoutMs });
        await session.select(element, resolveTemplate(spec.value, vars), spec.mode);
        break;
      }
      case 'click': {
        const element = await session.find(spec.selector, { timeoutMs: spec.timeoutMs });
        await session.click(element);
        break;
      }
      case 'upload': {
        const files = ctx.images.map((image) => image.path);
        if (files.length === 0) {
          throw new CardBatchError('No images to upload', 'step_failed');
        }
        const element = await session.find(spec.selector, { timeoutMs: spec.timeoutMs, state: 'attached' });
        await session.upload(element, files);
        break;
      }
      case 'extract': {
        const found = await extractBatchId(session, {
          urlPattern: spec.urlPattern,
          fallbackSelectors: spec.fallbackSelectors,
          timeoutMs: spec.timeoutMs,
          logger: this.logger,
        });
        ctx.batchId = found.batchId;
        this.logger.info('Batch id extracted', { batchId: found.batchId, source: found.source });
        break;
      }
      case 'delay':
        if (spec.ms > 0) await sleep(spec.ms);
        break;
      default: {
        const exhaustive: never = spec;
        throw new Error(`Unsupported action: ${JSON.stringify(exhaustive)}`);
      }
    }
  }
}
