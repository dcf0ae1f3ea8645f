/* src/runner/run/service.ts
 * Batch driver: validate, enumerate, dispatch, collect.
 */
import path from 'node:path';

import { ensureDir } from 'fs-extra';

import { ConfigError } from '@/runner/errors';
import {
  assertFolder,
  compileMatch,
  enumerateInputs,
  type MatchSpec,
} from '@/runner/run/enumerate';
import { callHook } from '@/runner/run/exec/run-one';
import { runQueued } from '@/runner/run/exec/runner';
import { DockerLauncher } from '@/runner/run/launch/docker';
import {
  type BatchState,
  createBatchState,
  highestRunId,
} from '@/runner/run/queue';
import { CancelController } from '@/runner/run/session/cancel-controller';
import type {
  BatchOptions,
  BatchResult,
  PendingRun,
  ResolvedBatch,
} from '@/runner/run/types';

export const DEFAULT_KILL_GRACE_MS = 5000;

const positiveMs = (v: number, label: string): number => {
  if (!Number.isFinite(v) || v <= 0) {
    throw new ConfigError(`${label}: must be a positive duration`);
  }
  return Math.round(v);
};

/**
 * Check every batch input before anything runs.
 *
 * @throws ConfigError on a missing folder, bad timeout/parallelism/pattern or empty image.
 */
export const resolveBatch = async (
  opts: BatchOptions,
): Promise<ResolvedBatch> => {
  const folder = await assertFolder(opts.folder);
  if (!opts.image.trim())
    throw new ConfigError('docker image: must be non-empty');
  const timeoutMs = positiveMs(opts.timeoutMs, 'timeout');
  const killGraceMs = positiveMs(
    opts.killGraceMs ?? DEFAULT_KILL_GRACE_MS,
    'kill grace',
  );
  const parallelism = opts.parallelism ?? 1;
  if (!Number.isInteger(parallelism) || parallelism < 1) {
    throw new ConfigError(
      `parallel: must be an integer >= 1, got ${String(parallelism)}`,
    );
  }
  if (opts.match !== undefined && opts.glob !== undefined) {
    throw new ConfigError('match and glob are mutually exclusive');
  }
  let match: MatchSpec;
  if (opts.glob !== undefined) {
    if (!opts.glob.trim()) throw new ConfigError('glob: must be non-empty');
    match = { kind: 'glob', pattern: opts.glob };
  } else {
    const pattern = opts.match ?? '.*';
    compileMatch(pattern);
    match = { kind: 'regex', pattern, recursive: opts.recursive };
  }
  return {
    folder,
    match,
    image: opts.image,
    timeoutMs,
    parallelism,
    extraArgs: [...(opts.extraArgs ?? [])],
    outDir: path.resolve(opts.outDir ?? process.cwd()),
    killGraceMs,
  };
};

/** Validate, enumerate and reserve run ids; creates nothing on disk. */
const prepareBatch = async (
  opts: BatchOptions,
): Promise<{ batch: ResolvedBatch; state: BatchState }> => {
  const batch = await resolveBatch(opts);
  const files = await enumerateInputs(batch.folder, batch.match);
  // Continue numbering after run directories left by earlier batches.
  const state = createBatchState(
    batch.outDir,
    files,
    await highestRunId(batch.outDir),
  );
  return { batch, state };
};

/** Validate and enumerate without running anything (used by --plan). */
export const planBatch = async (
  opts: BatchOptions,
): Promise<{ batch: ResolvedBatch; runs: readonly PendingRun[] }> => {
  const { batch, state } = await prepareBatch(opts);
  return { batch, runs: state.queue.snapshot() };
};

/**
 * Run the solver image once per matching input file.
 *
 * Per-run failures (launch failure, timeout, interrupt) are recorded on the
 * runs and never reject the batch; only pre-flight ConfigError does.
 *
 * @returns Runs in enumeration order, the match count, and whether an interrupt cut the batch short.
 */
export const runAll = async (opts: BatchOptions): Promise<BatchResult> => {
  const { batch, state } = await prepareBatch(opts);
  const pending = state.queue.snapshot();
  await ensureDir(batch.outDir);
  callHook('onPlan', opts.hooks?.onPlan, batch, pending);

  const cancel = new CancelController(opts.hooks);
  const unfollow = cancel.follow(opts.signal);
  try {
    const target = { image: batch.image, extraArgs: batch.extraArgs };
    const launcher = opts.createLauncher
      ? opts.createLauncher(target)
      : new DockerLauncher({ ...opts.docker, ...target });
    const runs = await runQueued(state, batch.parallelism, {
      launcher,
      image: batch.image,
      timeoutMs: batch.timeoutMs,
      killGraceMs: batch.killGraceMs,
      signal: cancel.signal,
      hooks: opts.hooks,
    });
    return { runs, matched: pending.length, cancelled: cancel.isCancelled() };
  } finally {
    unfollow();
  }
};
