/* src/cli/run/options.ts
 * Register the batch flags and the trailing solver arguments on a command.
 */
import { type Command, Option } from 'commander';

import { RUN_BASE_DEFAULTS } from './derive';

/**
 * Attach every batch option to `cmd`. Defaults appear in help text only;
 * deriveRun applies them after the environment and the config file.
 */
export const applyRunOptions = (cmd: Command): Command =>
  cmd
    .addOption(
      new Option('--docker-image <image>', 'image to run for every input'),
    )
    .addOption(
      new Option('--folder <dir>', 'directory holding the input files'),
    )
    .addOption(
      new Option(
        '--match <regex>',
        'regular expression the whole file name must match',
      ),
    )
    .addOption(
      new Option(
        '--glob <pattern>',
        'glob relative to --folder (instead of --match)',
      ),
    )
    .option('-r, --recursive', 'descend into subdirectories with --match')
    .addOption(
      new Option(
        '--timeout <duration>',
        `wall-clock limit per run (env TIMEOUT; default ${RUN_BASE_DEFAULTS.timeout})`,
      ),
    )
    .addOption(
      new Option(
        '--parallel <n>',
        `maximum concurrent runs (env PARALLEL; default ${String(RUN_BASE_DEFAULTS.parallel)})`,
      ),
    )
    .addOption(
      new Option(
        '-o, --out-dir <dir>',
        'where run_NNNN_* directories are created (default: cwd)',
      ),
    )
    .addOption(
      new Option(
        '--kill-grace <duration>',
        `delay before SIGKILL after SIGTERM (default ${RUN_BASE_DEFAULTS.killGrace})`,
      ),
    )
    .addOption(
      new Option(
        '--runtime <bin>',
        `container runtime binary (default ${RUN_BASE_DEFAULTS.runtime})`,
      ),
    )
    .addOption(new Option('--network <name>', 'container network'))
    .addOption(
      new Option('--config <file>', 'config file (default bench.config.*)'),
    )
    .addOption(
      new Option(
        '--results <dir>',
        'move run directories here when the batch ends',
      ),
    )
    .addOption(
      new Option(
        '--prefix <text>',
        'prefix for relocated run directories (needs --results)',
      ),
    )
    .addOption(
      new Option('--summary <file>', 'write a CSV summary of the batch'),
    )
    .option('-p, --plan', 'print the plan and exit without running')
    .argument('[solverArgs...]', 'arguments passed to the solver, after --')
    .passThroughOptions();
