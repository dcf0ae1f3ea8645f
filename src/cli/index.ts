/* src/cli/index.ts
 * Root CLI factory for bench-docker.
 */
import { Command, Option } from 'commander';

import { fromCli } from './cli-utils';
import { executeRun, type RunDeps } from './run/action';
import type { RunFlags } from './run/derive';
import { applyRunOptions } from './run/options';

type RootFlags = RunFlags & { debug?: boolean; boring?: boolean };

/** Push --debug/--boring into the environment the runner reads. */
const applyRootToggles = (
  cmd: Command,
  flags: RootFlags,
  env: NodeJS.ProcessEnv,
): void => {
  if (fromCli(cmd, 'debug') && flags.debug) env.BENCH_DEBUG = '1';
  if (fromCli(cmd, 'boring') && flags.boring) {
    env.BENCH_BORING = '1';
    env.FORCE_COLOR = '0';
  }
};

/**
 * Build the `bench-docker` command without side effects (safe for tests).
 * Commander exits are turned into thrown CommanderErrors; the action sets
 * `process.exitCode` from the batch outcome.
 *
 * @param deps - Overrides for tests (cwd, env, launcher, sinks).
 */
export const makeCli = (deps: Partial<RunDeps> = {}): Command => {
  const cli = new Command();
  cli
    .name('bench-docker')
    .description(
      'Run a solver image once per input file, with a timeout and bounded parallelism.',
    )
    .addOption(new Option('-d, --debug', 'print debug notices to stderr'))
    .addOption(new Option('-b, --boring', 'disable color'))
    .showHelpAfterError()
    .exitOverride();

  applyRunOptions(cli).action(
    async (solverArgs: string[], flags: RootFlags, cmd: Command) => {
      const env = deps.env ?? process.env;
      applyRootToggles(cmd, flags, env);
      process.exitCode = await executeRun(flags, solverArgs, {
        ...deps,
        cwd: deps.cwd ?? process.cwd(),
        env,
      });
    },
  );
  return cli;
};
