// src/runner/run/index.ts
export {
  STATUS_FILE,
  STDERR_FILE,
  STDOUT_FILE,
  type StatusDocument,
} from './artifacts';
export { type CollectOutcome, collectRuns } from './collect';
export { enumerateInputs, type InputFile, type MatchSpec } from './enumerate';
export {
  DockerLauncher,
  type DockerLauncherOptions,
  type DockerRuntimeOptions,
} from './launch/docker';
export type { LaunchSpec, Launcher } from './launch/types';
export { renderBatchPlan } from './plan';
export {
  DEFAULT_KILL_GRACE_MS,
  planBatch,
  resolveBatch,
  runAll,
} from './service';
export { renderSummaryCsv, writeSummaryCsv } from './summary';
export type {
  BatchOptions,
  BatchResult,
  LauncherFactory,
  PendingRun,
  ResolvedBatch,
  RunHooks,
  RunRecord,
  RunStatus,
  RunStatusKind,
} from './types';
