/* src/runner/run/summary.ts
 * Timing summary of a batch as CSV (one row per run, dispatch order).
 */
import { writeFile } from 'node:fs/promises';
import path from 'node:path';

import { ensureDir } from 'fs-extra';

import type { RunRecord, RunStatus } from '@/runner/run/types';

export type SummaryStatus =
  | 'ok'
  | 'fail'
  | 'timeout'
  | 'launch-failure'
  | 'cancelled';

export const SUMMARY_HEADER = 'input,status,exit_code,seconds,run_dir';

export const summaryStatus = (s: RunStatus): SummaryStatus => {
  switch (s.kind) {
    case 'exited':
      return s.exitCode === 0 ? 'ok' : 'fail';
    case 'timed-out':
      return 'timeout';
    case 'launch-failure':
      return 'launch-failure';
    case 'cancelled':
      return 'cancelled';
  }
};

/** RFC 4180 quoting, only when needed. */
export const csvField = (v: string): string =>
  /[",\r\n]/.test(v) ? `"${v.replace(/"/g, '""')}"` : v;

export const renderSummaryCsv = (runs: readonly RunRecord[]): string => {
  const rows = runs.map((r) =>
    [
      csvField(r.relInput),
      summaryStatus(r.status),
      r.status.kind === 'exited' ? String(r.status.exitCode) : '',
      (r.elapsedMs / 1000).toFixed(3),
      csvField(path.basename(r.runDir)),
    ].join(','),
  );
  return [SUMMARY_HEADER, ...rows].join('\n') + '\n';
};

export const writeSummaryCsv = async (
  file: string,
  runs: readonly RunRecord[],
): Promise<string> => {
  const abs = path.resolve(file);
  await ensureDir(path.dirname(abs));
  await writeFile(abs, renderSummaryCsv(runs), 'utf8');
  return abs;
};
