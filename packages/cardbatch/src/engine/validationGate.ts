import { createInterface } from 'node:readline/promises';
import { ValidationAbortedError } from '../errors';
import type { RotationCounts } from './types';

/** What the operator is shown before confirming a folder's upload. */
export interface ValidationPrompt {
  folder: string;
  folderName: string;
  batchId: string | null;
  imageCount: number;
  rotation: RotationCounts | null;
  currentUrl: string;
}

/**
 * Blocks the sequencer at the inspector view until a human has checked the
 * uploaded batch. The sequencer never times this wait out.
 */
export interface ValidationGate {
  acknowledge(prompt: ValidationPrompt): Promise<void>;
}

export function formatValidationPrompt(prompt: ValidationPrompt): string {
  const lines = [
    '',
    '='.repeat(60),
    'PAUSED FOR MANUAL VALIDATION',
    '='.repeat(60),
    `Folder:   ${prompt.folderName}`,
    `Batch id: ${prompt.batchId ?? '(unknown)'}`,
    `Images:   ${prompt.imageCount}`,
  ];
  if (prompt.rotation) {
    const { front, back, skipped, errors } = prompt.rotation;
    lines.push(`Rotation: front=${front} back=${back} skipped=${skipped} errors=${errors}`);
  }
  lines.push(`Page:     ${prompt.currentUrl}`, '', 'Review the upload in the browser window.');
  return lines.join('\n');
}

/**
 * Prints the folder state and waits for Enter on stdin. Rejects with
 * ValidationAbortedError when stdin closes first (EOF, piped input).
 */
export class ConsoleValidationGate implements ValidationGate {
  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout,
  ) {}

  async acknowledge(prompt: ValidationPrompt): Promise<void> {
    this.output.write(`${formatValidationPrompt(prompt)}\n`);
    const rl = createInterface({ input: this.input, output: this.output });
    try {
      await new Promise<void>((resolve, reject) => {
        rl.once('close', () => reject(new ValidationAbortedError(prompt.folderName)));
        rl.question('Press Enter to continue...').then(() => resolve(), reject);
      });
    } finally {
      rl.close();
    }
  }
}
