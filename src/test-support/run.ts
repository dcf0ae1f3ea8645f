// src/test-support/run.ts
// Stub launcher and temp-dir helpers for batch tests. The stub runs
// stub-solver.cjs under the current Node binary instead of a container.
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import type { LaunchSpec, Launcher } from '@/runner/run/launch/types';
import type {
  LauncherFactory,
  PendingRun,
  RunRecord,
} from '@/runner/run/types';

export const STUB_SOLVER = fileURLToPath(
  new URL('./stub-solver.cjs', import.meta.url),
);

export class StubLauncher implements Launcher {
  readonly kind = 'stub';

  constructor(
    private readonly extraArgs: readonly string[] = [],
    private readonly command: string = process.execPath,
  ) {}

  prepare(run: PendingRun): LaunchSpec {
    return {
      command: this.command,
      args: [STUB_SOLVER, ...this.extraArgs, run.input],
    };
  }
}

export const stubLauncher: LauncherFactory = ({ extraArgs }) =>
  new StubLauncher(extraArgs);

/** A launcher whose command does not exist. */
export const missingLauncher: LauncherFactory = ({ extraArgs }) =>
  new StubLauncher(extraArgs, 'bench-test-no-such-binary');

export const makeTempDir = (label: string): Promise<string> =>
  mkdtemp(path.join(os.tmpdir(), `bench-${label}-`));

export const rmDirWithRetries = (dir: string): Promise<void> =>
  rm(dir, { recursive: true, force: true, maxRetries: 10, retryDelay: 50 });

/** Write input files (relative path -> stub directives). */
export const writeInputs = async (
  folder: string,
  files: Record<string, string>,
): Promise<void> => {
  for (const [rel, body] of Object.entries(files)) {
    const p = path.join(folder, rel);
    await mkdir(path.dirname(p), { recursive: true });
    await writeFile(p, body, 'utf8');
  }
};

/** Finalized run for pure formatting tests. */
export const fakeRecord = (
  over: Partial<RunRecord> & Pick<RunRecord, 'relInput' | 'status'>,
): RunRecord => ({
  index: 0,
  runId: 1,
  input: `/data/${over.relInput}`,
  runDir: `/out/run_0001_${over.relInput}`,
  command: [],
  startedAt: 0,
  finishedAt: 1000,
  elapsedMs: 1000,
  stdout: '',
  stderr: '',
  stdoutTruncated: false,
  stderrTruncated: false,
  ...over,
});
