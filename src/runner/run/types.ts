// src/runner/run/types.ts
import type { MatchSpec } from '@/runner/run/enumerate';
import type { DockerRuntimeOptions } from '@/runner/run/launch/docker';
import type { Launcher } from '@/runner/run/launch/types';

/** Builds the launcher for a batch from its image and trailing arguments. */
export type LauncherFactory = (target: {
  image: string;
  extraArgs: readonly string[];
}) => Launcher;

/**
 * Terminal state of a single solver run.
 * - `exited`: the runtime client exited on its own (any exit code).
 * - `timed-out`: the wall-clock deadline fired and the run was terminated.
 * - `launch-failure`: the run never got going (spawn error, runtime refused).
 * - `cancelled`: an operator interrupt terminated the run while in flight.
 */
export type RunStatus =
  | { kind: 'exited'; exitCode: number; signal?: NodeJS.Signals }
  | { kind: 'timed-out'; timeoutMs: number }
  | { kind: 'launch-failure'; message: string }
  | { kind: 'cancelled' };

export type RunStatusKind = RunStatus['kind'];

/** A file selected for the batch, before dispatch. */
export type PendingRun = {
  /** Dispatch position (0-based, enumeration order). */
  index: number;
  /** Counter value reserved for the run directory name. */
  runId: number;
  /** Absolute path of the input file. */
  input: string;
  /** Input path relative to the batch folder (POSIX separators). */
  relInput: string;
  /** Absolute run directory (created at dispatch). */
  runDir: string;
};

/** Finalized run; immutable once written to disk. */
export type RunRecord = PendingRun & {
  status: RunStatus;
  /** Command line actually launched (empty when the launch never got built). */
  command: string[];
  startedAt: number;
  finishedAt: number;
  elapsedMs: number;
  stdout: string;
  stderr: string;
  stdoutTruncated: boolean;
  stderrTruncated: boolean;
};

/** Batch inputs after validation (absolute paths, defaults applied). */
export type ResolvedBatch = {
  folder: string;
  match: MatchSpec;
  image: string;
  timeoutMs: number;
  parallelism: number;
  extraArgs: string[];
  outDir: string;
  killGraceMs: number;
};

/** Lifecycle callbacks (logger UI, tests). Throwing hooks are ignored. */
export type RunHooks = {
  /** Batch validated and enumerated; nothing dispatched yet. */
  onPlan?: (batch: ResolvedBatch, runs: readonly PendingRun[]) => void;
  onStart?: (run: PendingRun) => void;
  onTimeout?: (run: PendingRun, timeoutMs: number) => void;
  onEnd?: (run: RunRecord) => void;
  onCancelled?: () => void;
};

/** Inputs to a batch (see runAll). */
export type BatchOptions = {
  /** Folder holding the benchmark inputs. */
  folder: string;
  /** Regular expression tested against the whole file name. */
  match?: string;
  /** fast-glob pattern relative to folder (alternative to match). */
  glob?: string;
  /** Regex mode only: descend into subfolders. */
  recursive?: boolean;
  /** Container image reference passed verbatim to the launcher. */
  image: string;
  /** Per-run wall-clock deadline (milliseconds). */
  timeoutMs: number;
  /** Maximum concurrent runs (default 1). */
  parallelism?: number;
  /** Trailing solver arguments; the input path is appended after them. */
  extraArgs?: readonly string[];
  /** Where run directories are created (default: process.cwd()). */
  outDir?: string;
  /** Delay between SIGTERM and SIGKILL when terminating (default 5000). */
  killGraceMs?: number;
  /** Container runtime settings for the default docker launcher. */
  docker?: DockerRuntimeOptions;
  /** Replaces the docker launcher (other runtimes, tests). */
  createLauncher?: LauncherFactory;
  /** Cancellation token; when aborted no new run starts and in-flight runs stop. */
  signal?: AbortSignal;
  hooks?: RunHooks;
};

export type BatchResult = {
  /** Runs in dispatch order (never completion order). */
  runs: RunRecord[];
  /** Files selected by the pattern. */
  matched: number;
  /** True when the batch stopped early on an interrupt. */
  cancelled: boolean;
};
