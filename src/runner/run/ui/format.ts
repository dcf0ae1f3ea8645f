// src/runner/run/ui/format.ts
import path from 'node:path';

import { table } from 'table';

import { summaryStatus } from '@/runner/run/summary';
import type { RunRecord, RunStatus } from '@/runner/run/types';
import {
  bold,
  cancel,
  error,
  ok,
  warn,
} from '@/runner/util/color';

export const fmtSeconds = (ms: number): string =>
  `${(Math.max(0, ms) / 1000).toFixed(2)}s`;

export const stripAnsi = (s: string): string =>
  // eslint-disable-next-line no-control-regex
  s.replace(/\x1B\[[0-?]*[ -/]*[@-~]/g, '');

/** Symbol + word for a finished run, colored by meaning. */
export const statusLabel = (s: RunStatus): string => {
  switch (s.kind) {
    case 'exited':
      return s.exitCode === 0 ? ok('✔ ok') : error('✖ fail');
    case 'timed-out':
      return warn('⏱ timeout');
    case 'launch-failure':
      return error('✖ launch-failure');
    case 'cancelled':
      return cancel('◼ cancelled');
  }
};

/** Short trailing detail: exit code, signal or failure message. */
export const statusDetail = (s: RunStatus): string => {
  switch (s.kind) {
    case 'exited':
      if (s.signal) return `(exit ${String(s.exitCode)}, ${s.signal})`;
      return s.exitCode === 0 ? '' : `(exit ${String(s.exitCode)})`;
    case 'launch-failure':
      return `(${s.message})`;
    default:
      return '';
  }
};

export const headerCells = (): string[] =>
  ['Input', 'Status', 'Exit', 'Time', 'Run dir'].map((h) => bold(h));

/** Borderless, left-aligned summary table of a batch. */
export const renderSummaryTable = (runs: readonly RunRecord[]): string => {
  const rows = runs.map((r) => [
    r.relInput,
    summaryStatus(r.status),
    r.status.kind === 'exited' ? String(r.status.exitCode) : '',
    fmtSeconds(r.elapsedMs),
    path.basename(r.runDir),
  ]);
  return table([headerCells(), ...rows], {
    stringLength: (s) => stripAnsi(s).length,
    border: {
      topBody: ``,
      topJoin: ``,
      topLeft: ``,
      topRight: ``,
      bottomBody: ``,
      bottomJoin: ``,
      bottomLeft: ``,
      bottomRight: ``,
      bodyLeft: ``,
      bodyRight: ``,
      bodyJoin: ``,
      joinBody: ``,
      joinLeft: ``,
      joinRight: ``,
      joinJoin: ``,
    },
    drawHorizontalLine: () => false,
  });
};

/** One-line tally, e.g. "3 runs: 2 ok, 1 timeout". */
export const renderTally = (runs: readonly RunRecord[]): string => {
  const counts = new Map<string, number>();
  for (const r of runs) {
    const k = summaryStatus(r.status);
    counts.set(k, (counts.get(k) ?? 0) + 1);
  }
  const parts = [...counts.entries()].map(([k, n]) => `${String(n)} ${k}`);
  const noun = runs.length === 1 ? 'run' : 'runs';
  return `${String(runs.length)} ${noun}${parts.length ? `: ${parts.join(', ')}` : ''}`;
};
