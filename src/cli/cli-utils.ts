/** Shared Commander helpers for the bench-docker CLI. */
import { type Command, CommanderError } from 'commander';

import { errorMessage, isConfigError } from '@/runner/errors';
import { error as styleError } from '@/runner/util/color';

/** True when the option value came from the command line (not a default). */
export const fromCli = (cmd: Command, name: string): boolean =>
  cmd.getOptionValueSource(name) === 'cli';

/**
 * Report a failure that escaped the action and pick the process exit code.
 * Commander's own exits (help, version, usage errors) keep their code; the
 * message has already been printed by Commander.
 */
export const reportFailure = (e: unknown): number => {
  if (e instanceof CommanderError) return e.exitCode;
  const label = isConfigError(e) ? 'error' : 'unexpected error';
  console.error(`bench: ${styleError(label)}: ${errorMessage(e)}`);
  return 1;
};
