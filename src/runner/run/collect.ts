/* src/runner/run/collect.ts
 * Relocate a batch's run directories into a results tree under a prefix.
 */
import path from 'node:path';

import { ensureDir, move, pathExists } from 'fs-extra';

import { errorMessage } from '@/runner/errors';
import type { RunRecord } from '@/runner/run/types';

export type CollectOutcome = {
  moved: Array<{ from: string; to: string }>;
  /** Run directories left in place, with the reason. */
  skipped: Array<{ from: string; reason: string }>;
};

/** Destination for a run directory: <resultsDir>/<prefix>_<run dir name>. */
export const collectedName = (runDir: string, prefix?: string): string => {
  const base = path.basename(runDir);
  return prefix ? `${prefix}_${base}` : base;
};

/**
 * Move every run directory of a batch to resultsDir. Existing destinations
 * are never overwritten; such runs are skipped and reported.
 */
export const collectRuns = async (
  runs: readonly RunRecord[],
  resultsDir: string,
  prefix?: string,
): Promise<CollectOutcome> => {
  const root = path.resolve(resultsDir);
  await ensureDir(root);
  const out: CollectOutcome = { moved: [], skipped: [] };
  for (const r of runs) {
    const to = path.join(root, collectedName(r.runDir, prefix));
    if (!(await pathExists(r.runDir))) {
      out.skipped.push({ from: r.runDir, reason: 'run directory missing' });
      continue;
    }
    if (await pathExists(to)) {
      out.skipped.push({ from: r.runDir, reason: `${to} already exists` });
      continue;
    }
    try {
      await move(r.runDir, to, { overwrite: false });
      out.moved.push({ from: r.runDir, to });
    } catch (e) {
      out.skipped.push({ from: r.runDir, reason: errorMessage(e) });
    }
  }
  return out;
};
