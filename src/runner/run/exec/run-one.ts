/* src/runner/run/exec/run-one.ts
 * Single-run execution: run directory, stdout/stderr capture, wall-clock
 * deadline, interrupt handling, status record.
 */
import { type ChildProcess, spawn } from 'node:child_process';
import { createWriteStream, type WriteStream } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { constants as osConstants } from 'node:os';
import path from 'node:path';
import type { Readable } from 'node:stream';

import treeKill from 'tree-kill';

import { errorMessage } from '@/runner/errors';
import { artifactPaths, writeStatus } from '@/runner/run/artifacts';
import {
  CappedCapture,
  waitAtMost,
  waitForStreamClose,
} from '@/runner/run/exec/util';
import type { LaunchSpec, Launcher } from '@/runner/run/launch/types';
import type {
  PendingRun,
  RunHooks,
  RunRecord,
  RunStatus,
} from '@/runner/run/types';
import { debugLog } from '@/runner/util/debug';
import {
  DBG_SCOPE_EXEC_KILL,
  DBG_SCOPE_LAUNCH_TERMINATE,
} from '@/runner/util/debug-scopes';

/** In-memory capture cap per stream. */
export const MAX_CAPTURE_BYTES = 1024 * 1024;

export type RunContext = {
  launcher: Launcher;
  /** Recorded in status.json. */
  image: string;
  timeoutMs: number;
  killGraceMs: number;
  signal?: AbortSignal;
  hooks?: RunHooks;
};

type Outcome =
  | { kind: 'close'; code: number | null; signal: NodeJS.Signals | null }
  | { kind: 'error'; error: Error };

type StopReason = 'timeout' | 'cancel';

/** Invoke a lifecycle hook; a throwing hook never affects the run. */
export const callHook = <A extends unknown[]>(
  name: string,
  fn: ((...args: A) => void) | undefined,
  ...args: A
): void => {
  if (!fn) return;
  try {
    fn(...args);
  } catch (e) {
    debugLog(`hooks:${name}`, errorMessage(e));
  }
};

/** Shell convention for a process killed by a signal: 128 + signal number. */
const signalExitCode = (sig: NodeJS.Signals): number => {
  const n = Object.entries(osConstants.signals).find(([k]) => k === sig)?.[1];
  return 128 + (n ?? 0);
};

const killTree = (pid: number, sig: NodeJS.Signals): void => {
  treeKill(pid, sig, (err) => {
    if (err)
      debugLog(DBG_SCOPE_EXEC_KILL, `${sig} ${String(pid)}: ${err.message}`);
  });
};

const finalize = async (
  run: PendingRun,
  ctx: RunContext,
  fields: {
    status: RunStatus;
    command: string[];
    startedAt: number;
    stdout?: CappedCapture;
    stderr?: CappedCapture;
    /** False when the run directory could not be created. */
    writable: boolean;
  },
): Promise<RunRecord> => {
  const finishedAt = Date.now();
  const record: RunRecord = {
    ...run,
    status: fields.status,
    command: fields.command,
    startedAt: fields.startedAt,
    finishedAt,
    elapsedMs: finishedAt - fields.startedAt,
    stdout: fields.stdout?.text() ?? '',
    stderr: fields.stderr?.text() ?? '',
    stdoutTruncated: fields.stdout?.truncated ?? false,
    stderrTruncated: fields.stderr?.truncated ?? false,
  };
  if (fields.writable) {
    try {
      await writeStatus(record, ctx.image);
    } catch (e) {
      console.error(
        `bench: warn: could not write status for ${run.runDir}: ${errorMessage(e)}`,
      );
    }
  }
  callHook('onEnd', ctx.hooks?.onEnd, record);
  return record;
};

/** Stop the runtime-side workload; failures are only logged. */
const terminateQuietly = (
  launcher: Launcher,
  spec: LaunchSpec,
): Promise<void> =>
  Promise.resolve()
    .then(() => launcher.terminate?.(spec))
    .catch((e: unknown) => {
      debugLog(DBG_SCOPE_LAUNCH_TERMINATE, errorMessage(e));
    });

/**
 * Copy a child's output into its file and the in-memory capture. The source
 * pauses while the file is behind and resumes on 'drain', or for good once
 * the file has failed.
 */
const tee = (
  source: Readable | null,
  sink: WriteStream,
  capture: CappedCapture,
): void => {
  if (!source) return;
  sink.once('error', () => source.resume());
  source.on('data', (d: Buffer) => {
    capture.push(d);
    if (sink.destroyed) return;
    if (!sink.write(d)) {
      source.pause();
      sink.once('drain', () => source.resume());
    }
  });
};

const execute = async (
  run: PendingRun,
  ctx: RunContext,
  startedAt: number,
): Promise<RunRecord> => {
  try {
    await mkdir(run.runDir);
  } catch (e) {
    return finalize(run, ctx, {
      status: {
        kind: 'launch-failure',
        message: `cannot create run directory: ${errorMessage(e)}`,
      },
      command: [],
      startedAt,
      writable: false,
    });
  }

  const files = artifactPaths(run.runDir);
  // First output-file failure; the run keeps going and reports it at the end.
  let ioError: string | undefined;
  const openSink = (file: string): WriteStream => {
    const sink = createWriteStream(file);
    sink.on('error', (e) => {
      ioError ??= `cannot write ${path.basename(file)}: ${errorMessage(e)}`;
    });
    return sink;
  };
  // Create the output streams up front so the files exist even when the
  // run is cancelled or fails to launch before producing any output.
  const outStream = openSink(files.stdout);
  const errStream = openSink(files.stderr);
  const stdout = new CappedCapture(MAX_CAPTURE_BYTES);
  const stderr = new CappedCapture(MAX_CAPTURE_BYTES);
  const closeStreams = async (): Promise<void> => {
    outStream.end();
    errStream.end();
    await Promise.all([
      waitForStreamClose(outStream),
      waitForStreamClose(errStream),
    ]);
  };

  let spec: LaunchSpec;
  try {
    spec = ctx.launcher.prepare(run);
  } catch (e) {
    await closeStreams();
    return finalize(run, ctx, {
      status: { kind: 'launch-failure', message: errorMessage(e) },
      command: [],
      startedAt,
      stdout,
      stderr,
      writable: true,
    });
  }
  const command = [spec.command, ...spec.args];

  if (ctx.signal?.aborted) {
    await closeStreams();
    return finalize(run, ctx, {
      status: { kind: 'cancelled' },
      command,
      startedAt,
      stdout,
      stderr,
      writable: true,
    });
  }

  let child: ChildProcess;
  try {
    child = spawn(spec.command, spec.args, {
      cwd: run.runDir,
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsHide: true,
    });
  } catch (e) {
    await closeStreams();
    return finalize(run, ctx, {
      status: { kind: 'launch-failure', message: errorMessage(e) },
      command,
      startedAt,
      stdout,
      stderr,
      writable: true,
    });
  }

  tee(child.stdout, outStream, stdout);
  tee(child.stderr, errStream, stderr);

  let stopReason: StopReason | undefined;
  let terminating: Promise<void> | undefined;
  let killTimer: NodeJS.Timeout | undefined;

  const stop = (reason: StopReason): void => {
    if (stopReason) return;
    stopReason = reason;
    if (reason === 'timeout')
      callHook('onTimeout', ctx.hooks?.onTimeout, run, ctx.timeoutMs);
    terminating = terminateQuietly(ctx.launcher, spec);
    const pid = child.pid;
    if (typeof pid !== 'number') return;
    killTree(pid, 'SIGTERM');
    // escalate after grace
    killTimer = setTimeout(() => killTree(pid, 'SIGKILL'), ctx.killGraceMs);
  };

  const deadline = setTimeout(() => stop('timeout'), ctx.timeoutMs);
  const onAbort = (): void => stop('cancel');
  ctx.signal?.addEventListener('abort', onAbort, { once: true });

  const outcome = await new Promise<Outcome>((resolveP) => {
    child.on('error', (e) => {
      // A spawn failure leaves no pid; later errors are left to 'close'.
      if (typeof child.pid !== 'number') resolveP({ kind: 'error', error: e });
      else debugLog(DBG_SCOPE_EXEC_KILL, errorMessage(e));
    });
    child.on('close', (code, sig) =>
      resolveP({ kind: 'close', code, signal: sig }),
    );
  });

  clearTimeout(deadline);
  if (killTimer) clearTimeout(killTimer);
  ctx.signal?.removeEventListener('abort', onAbort);
  await closeStreams();
  if (terminating) await waitAtMost(terminating, ctx.killGraceMs);

  let status: RunStatus;
  if (stopReason === 'timeout') {
    status = { kind: 'timed-out', timeoutMs: ctx.timeoutMs };
  } else if (stopReason === 'cancel') {
    status = { kind: 'cancelled' };
  } else if (outcome.kind === 'error') {
    status = { kind: 'launch-failure', message: outcome.error.message };
  } else if (ioError) {
    // The solver ran, but its output was not kept.
    status = { kind: 'launch-failure', message: ioError };
  } else {
    const exitCode =
      outcome.code ?? (outcome.signal ? signalExitCode(outcome.signal) : 1);
    const refused = ctx.launcher.classifyExit?.(exitCode);
    status = refused
      ? { kind: 'launch-failure', message: refused }
      : outcome.signal
        ? { kind: 'exited', exitCode, signal: outcome.signal }
        : { kind: 'exited', exitCode };
  }

  return finalize(run, ctx, {
    status,
    command,
    startedAt,
    stdout,
    stderr,
    writable: true,
  });
};

/**
 * Execute one pending run to completion, timeout, interrupt or launch
 * failure. Never rejects: every failure is recorded on the returned run.
 */
export const runOne = async (
  run: PendingRun,
  ctx: RunContext,
): Promise<RunRecord> => {
  const startedAt = Date.now();
  callHook('onStart', ctx.hooks?.onStart, run);
  try {
    return await execute(run, ctx, startedAt);
  } catch (e) {
    return finalize(run, ctx, {
      status: { kind: 'launch-failure', message: errorMessage(e) },
      command: [],
      startedAt,
      writable: true,
    });
  }
};
