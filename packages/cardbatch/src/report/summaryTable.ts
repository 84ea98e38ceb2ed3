import path from 'node:path';
import type { RunSummary } from '../engine/types';
import { ORIENTATION_LABELS, type InspectedImage, type RotationResult } from '../imaging';

// ── Helpers ──

function seconds(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}

function truncate(text: string, width: number): string {
  return text.length <= width ? text : `${text.slice(0, width - 3)}...`;
}

interface Column<T> {
  header: string;
  width: number;
  value: (row: T) => string;
}

function renderTable<T>(columns: Column<T>[], rows: T[]): string[] {
  const header = columns.map((c) => c.header.padEnd(c.width)).join('');
  const lines = [header.trimEnd(), '-'.repeat(header.length)];
  for (const row of rows) {
    lines.push(
      columns
        .map((c) => truncate(c.value(row), c.width - 1).padEnd(c.width))
        .join('')
        .trimEnd(),
    );
  }
  return lines;
}

// ── Upload summary ──

const SUMMARY_COLUMNS: Column<RunSummary>[] = [
  { header: 'FOLDER', width: 24, value: (s) => s.folderName },
  { header: 'IMAGES', width: 8, value: (s) => String(s.imageCount) },
  { header: 'BATCH', width: 14, value: (s) => s.batchId ?? '-' },
  { header: 'ELAPSED', width: 9, value: (s) => seconds(s.elapsedMs) },
  { header: 'STATUS', width: 22, value: (s) => (s.state === 'Done' ? 'Done' : `Failed/${s.failurePoint ?? '?'}`) },
  { header: 'LAST STEP', width: 30, value: (s) => s.lastStep ?? '-' },
  { header: 'ERROR', width: 60, value: (s) => s.error ?? '' },
];

/** One row per folder, in run order, followed by a totals line. */
export function formatSummaryTable(summaries: RunSummary[], fatalError: string | null = null): string {
  if (summaries.length === 0) {
    return 'No folders were processed.';
  }

  const lines = renderTable(SUMMARY_COLUMNS, summaries);
  const done = summaries.filter((s) => s.state === 'Done').length;
  lines.push('', `${done}/${summaries.length} folder(s) done`);
  if (fatalError) {
    lines.push(`Run aborted: ${fatalError}`);
  }
  return lines.join('\n');
}

// ── Rotation and inspection ──

export function formatRotationResult(result: RotationResult): string {
  const lines = [
    `${path.basename(result.folder)}: ${result.total} image(s), ` +
      `front=${result.front} back=${result.back} skipped=${result.skipped} errors=${result.errors} ` +
      `(${seconds(result.elapsedMs)})`,
  ];
  for (const failure of result.failures) {
    lines.push(`  ! ${path.basename(failure.path)}: ${failure.error}`);
  }
  return lines.join('\n');
}

const INSPECT_COLUMNS: Column<InspectedImage>[] = [
  { header: 'FILE', width: 36, value: (r) => path.basename(r.path) },
  { header: 'CATEGORY', width: 14, value: (r) => r.category },
  { header: 'CURRENT', width: 9, value: (r) => (r.current === null ? '-' : String(r.current)) },
  {
    header: 'LABEL',
    width: 30,
    value: (r) => (r.error ? `error: ${r.error}` : r.current === null ? '(no tag)' : ORIENTATION_LABELS[r.current]),
  },
];

export function formatInspection(rows: InspectedImage[]): string {
  if (rows.length === 0) {
    return 'No supported images found.';
  }
  return renderTable(INSPECT_COLUMNS, rows).join('\n');
}
