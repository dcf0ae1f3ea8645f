/* src/cli/run/action.ts
 * The batch action: config -> derive -> plan or run -> summary/relocation.
 */
import { loadConfig } from '@/cli/config/load';
import type { BenchConfig } from '@/cli/config/schema';
import { errorMessage, isConfigError } from '@/runner/errors';
import { collectRuns } from '@/runner/run/collect';
import { renderBatchPlan } from '@/runner/run/plan';
import { planBatch, runAll } from '@/runner/run/service';
import { attachSessionSignals } from '@/runner/run/session/signals';
import { writeSummaryCsv } from '@/runner/run/summary';
import type { LauncherFactory } from '@/runner/run/types';
import { LoggerUI } from '@/runner/run/ui/logger-ui';
import { error as styleError, warn } from '@/runner/util/color';

import { deriveRun, type RunFlags } from './derive';

export type RunDeps = {
  cwd: string;
  /** Read for TIMEOUT/PARALLEL; config debug/boring are written back. */
  env: NodeJS.ProcessEnv;
  /** Substitute launcher (tests); defaults to the docker launcher. */
  createLauncher?: LauncherFactory;
  /** Progress sink; defaults to console.log. */
  write?: (line: string) => void;
  /** Error sink; defaults to console.error. */
  writeError?: (line: string) => void;
  /** Install SIGINT/SIGTERM handlers for the batch (default true). */
  signals?: boolean;
};

/**
 * Config-file debug/boring apply only when the flags and environment did
 * not already decide.
 */
const applyConfigToggles = (
  env: NodeJS.ProcessEnv,
  config: BenchConfig,
): void => {
  if (config.debug && env.BENCH_DEBUG === undefined) env.BENCH_DEBUG = '1';
  if (config.boring && env.BENCH_BORING === undefined) env.BENCH_BORING = '1';
};

/**
 * Run one batch from parsed CLI input.
 *
 * @returns Process exit code: 0 when the batch ran (even if interrupted or
 * some runs failed), 1 on a configuration error.
 */
export const executeRun = async (
  flags: RunFlags,
  extraArgs: readonly string[],
  deps: RunDeps,
): Promise<number> => {
  const write = deps.write ?? ((l: string) => console.log(l));
  const writeError = deps.writeError ?? ((l: string) => console.error(l));
  try {
    const { bench: config } = await loadConfig(deps.cwd, flags.config);
    applyConfigToggles(deps.env, config);
    const derived = deriveRun(deps.cwd, flags, extraArgs, deps.env, config);

    if (derived.planOnly) {
      const { batch, runs } = await planBatch(derived.batch);
      write(renderBatchPlan(batch, runs));
      return 0;
    }

    const ui = new LoggerUI(write);
    const ac = new AbortController();
    const detach =
      deps.signals === false
        ? () => undefined
        : attachSessionSignals(() => ac.abort());
    const result = await runAll({
      ...derived.batch,
      createLauncher: deps.createLauncher,
      signal: ac.signal,
      hooks: ui.hooks(),
    }).finally(detach);
    ui.onDone(result);

    if (derived.summary) {
      await writeSummaryCsv(derived.summary, result.runs);
      write(`bench: summary written to ${derived.summary}`);
    }
    if (derived.results) {
      const { moved, skipped } = await collectRuns(
        result.runs,
        derived.results.dir,
        derived.results.prefix,
      );
      write(
        `bench: moved ${String(moved.length)} run director${moved.length === 1 ? 'y' : 'ies'} to ${derived.results.dir}`,
      );
      for (const s of skipped) {
        writeError(`bench: ${warn('warn')}: kept ${s.from}: ${s.reason}`);
      }
    }
    return 0;
  } catch (e) {
    const label = isConfigError(e) ? 'error' : 'unexpected error';
    writeError(`bench: ${styleError(label)}: ${errorMessage(e)}`);
    return 1;
  }
};
