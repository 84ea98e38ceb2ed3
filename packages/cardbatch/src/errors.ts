// --------------------------------------------------------------------------
// Error types
// --------------------------------------------------------------------------

export type ErrorCode =
  | 'configuration_error'
  | 'folder_not_found'
  | 'element_not_found'
  | 'timeout'
  | 'stale_element'
  | 'click_intercepted'
  | 'extraction_failed'
  | 'login_failed'
  | 'validation_aborted'
  | 'file_io_failed'
  | 'step_failed';

export class CardBatchError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'CardBatchError';
  }
}

/** Missing or invalid configuration or credentials. Aborts the invocation. */
export class ConfigurationError extends CardBatchError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message, 'configuration_error', issues);
    this.name = 'ConfigurationError';
  }
}

export class FolderNotFoundError extends CardBatchError {
  constructor(public readonly folderPath: string, reason = 'Folder not found') {
    super(`${reason}: ${folderPath}`, 'folder_not_found');
    this.name = 'FolderNotFoundError';
  }
}

export class ElementNotFoundError extends CardBatchError {
  constructor(
    public readonly selector: string,
    public readonly timeoutMs: number,
  ) {
    super(`Timed out after ${timeoutMs}ms waiting for element: ${selector}`, 'element_not_found');
    this.name = 'ElementNotFoundError';
  }
}

/** A bounded wait (URL change, page load) ran out. */
export class WaitTimeoutError extends CardBatchError {
  constructor(
    public readonly waitingFor: string,
    public readonly timeoutMs: number,
    public readonly currentUrl?: string,
  ) {
    super(
      `Timed out after ${timeoutMs}ms waiting for ${waitingFor}${currentUrl ? ` (current URL: ${currentUrl})` : ''}`,
      'timeout',
    );
    this.name = 'WaitTimeoutError';
  }
}

export class StaleElementError extends CardBatchError {
  constructor(public readonly selector: string, message?: string) {
    super(message ?? `Element is no longer attached to the page: ${selector}`, 'stale_element');
    this.name = 'StaleElementError';
  }
}

export class ClickInterceptedError extends CardBatchError {
  constructor(public readonly selector: string, message?: string) {
    super(message ?? `Another element received the click: ${selector}`, 'click_intercepted');
    this.name = 'ClickInterceptedError';
  }
}

export class ExtractionError extends CardBatchError {
  constructor(
    public readonly url: string,
    public readonly triedSelectors: string[],
  ) {
    super(
      `Could not extract batch id from ${url} or selectors [${triedSelectors.join(', ')}]`,
      'extraction_failed',
    );
    this.name = 'ExtractionError';
  }
}

export class LoginError extends CardBatchError {
  constructor(
    public readonly attempts: number,
    public readonly lastError: string,
  ) {
    super(`Login failed after ${attempts} attempt(s): ${lastError}`, 'login_failed');
    this.name = 'LoginError';
  }
}

/** The operator's input closed before the upload was acknowledged. Aborts the invocation. */
export class ValidationAbortedError extends CardBatchError {
  constructor(public readonly folderName: string) {
    super(`Input closed before the upload of ${folderName} was acknowledged`, 'validation_aborted');
    this.name = 'ValidationAbortedError';
  }
}

export class FileIOError extends CardBatchError {
  constructor(public readonly filePath: string, message: string) {
    super(`${filePath}: ${message}`, 'file_io_failed');
    this.name = 'FileIOError';
  }
}

/** A pipeline step gave up. Carries the step name and selector for diagnosis. */
export class StepFailedError extends CardBatchError {
  constructor(
    public readonly stepName: string,
    public readonly selector: string | undefined,
    public readonly failure: unknown,
  ) {
    super(
      `Step "${stepName}" failed${selector ? ` on ${selector}` : ''}: ${toErrorMessage(failure)}`,
      'step_failed',
    );
    this.name = 'StepFailedError';
  }
}

export function toErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
