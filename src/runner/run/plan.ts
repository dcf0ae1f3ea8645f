// src/runner/run/plan.ts
import type { PendingRun, ResolvedBatch } from '@/runner/run/types';
import { bold as styleBold } from '@/runner/util/color';
import { formatDuration } from '@/runner/util/duration';

/** Files listed by name before the plan falls back to a count. */
const MAX_LISTED = 8;

/**
 * Render a readable, multi‑line summary of the batch plan (pure).
 *
 * @param batch - Validated batch inputs.
 * @param files - Pending runs, in dispatch order.
 * @returns A human‑friendly summary printed by the CLI.
 */
export const renderBatchPlan = (
  batch: ResolvedBatch,
  files: readonly PendingRun[],
): string => {
  const header = styleBold('bench-docker plan');
  const pattern =
    batch.match.kind === 'glob'
      ? `glob ${batch.match.pattern}`
      : `regex ${batch.match.pattern}${batch.match.recursive ? ' (recursive)' : ''}`;
  const listed = files.slice(0, MAX_LISTED).map((f) => f.relInput);
  const more =
    files.length > MAX_LISTED
      ? `, … ${String(files.length - MAX_LISTED)} more`
      : '';

  const lines = [
    header,
    `image: ${batch.image}`,
    `folder: ${batch.folder}`,
    `match: ${pattern}`,
    `timeout: ${formatDuration(batch.timeoutMs)}`,
    `parallel: ${String(batch.parallelism)}`,
    `kill grace: ${formatDuration(batch.killGraceMs)}`,
    `output: ${batch.outDir}`,
    `files: ${String(files.length)}${listed.length ? ` (${listed.join(', ')}${more})` : ''}`,
    `command: ${[...batch.extraArgs, '<input>'].join(' ')}`,
  ];
  return `bench:\n  ${lines.join('\n  ')}`;
};
