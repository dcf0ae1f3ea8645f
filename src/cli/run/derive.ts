/* src/cli/run/derive.ts
 * Merge flags > environment > config file > built-ins into batch options.
 */
import path from 'node:path';

import type { BenchConfig } from '@/cli/config/schema';
import { ConfigError } from '@/runner/errors';
import type { DockerRuntimeOptions } from '@/runner/run/launch/docker';
import type { BatchOptions } from '@/runner/run/types';
import { parseDuration } from '@/runner/util/duration';

/** Built-in defaults (the values the benchmark suites were tuned for). */
export const RUN_BASE_DEFAULTS = {
  timeout: '10s',
  parallel: 1,
  killGrace: '5s',
  runtime: 'docker',
} as const;

/** Options as Commander hands them to the action (strings until parsed). */
export type RunFlags = {
  dockerImage?: string;
  timeout?: string;
  folder?: string;
  match?: string;
  glob?: string;
  recursive?: boolean;
  parallel?: string;
  outDir?: string;
  killGrace?: string;
  runtime?: string;
  network?: string;
  config?: string;
  results?: string;
  prefix?: string;
  summary?: string;
  plan?: boolean;
};

/** Environment consulted for defaults (TIMEOUT, PARALLEL). */
export type RunEnv = Partial<Record<'TIMEOUT' | 'PARALLEL', string>>;

export type DerivedRun = {
  batch: Omit<BatchOptions, 'signal' | 'hooks' | 'createLauncher'>;
  /** Relocate run directories after the batch (--results/--prefix). */
  results?: { dir: string; prefix?: string };
  /** CSV summary destination (--summary). */
  summary?: string;
  planOnly: boolean;
};

const nonEmpty = (v: string | undefined): string | undefined =>
  typeof v === 'string' && v.trim().length ? v : undefined;

/** Parse a parallelism value (flag, env or config). */
export const parseParallel = (raw: string | number, label: string): number => {
  const text = String(raw).trim();
  const n = /^\d+$/.test(text) ? Number(text) : Number.NaN;
  if (!Number.isInteger(n) || n < 1) {
    throw new ConfigError(
      `${label}: must be an integer >= 1, got "${String(raw)}"`,
    );
  }
  return n;
};

/**
 * Resolve every setting for one batch.
 *
 * @param cwd - Base for relative folder/outDir/results paths.
 * @param flags - Parsed Commander options.
 * @param extraArgs - Arguments after `--`.
 * @param env - Usually process.env.
 * @param config - `bench` block of the config file (may be empty).
 * @throws ConfigError on missing required flags or unparsable values.
 */
export const deriveRun = (
  cwd: string,
  flags: RunFlags,
  extraArgs: readonly string[],
  env: RunEnv,
  config: BenchConfig,
): DerivedRun => {
  const image = nonEmpty(flags.dockerImage);
  if (!image) throw new ConfigError('--docker-image is required');
  const folder = nonEmpty(flags.folder);
  if (!folder) throw new ConfigError('--folder is required');
  if (flags.prefix !== undefined && flags.results === undefined) {
    throw new ConfigError('--prefix requires --results');
  }

  const timeoutFlag = nonEmpty(flags.timeout);
  const timeoutEnv = nonEmpty(env.TIMEOUT);
  const timeoutMs = timeoutFlag
    ? parseDuration(timeoutFlag, '--timeout')
    : timeoutEnv
      ? parseDuration(timeoutEnv, 'TIMEOUT')
      : parseDuration(
          config.timeout ?? RUN_BASE_DEFAULTS.timeout,
          'config timeout',
        );

  const parallelFlag = nonEmpty(flags.parallel);
  const parallelEnv = nonEmpty(env.PARALLEL);
  const parallelism = parallelFlag
    ? parseParallel(parallelFlag, '--parallel')
    : parallelEnv
      ? parseParallel(parallelEnv, 'PARALLEL')
      : (config.parallel ?? RUN_BASE_DEFAULTS.parallel);

  const graceFlag = nonEmpty(flags.killGrace);
  const killGraceMs = graceFlag
    ? parseDuration(graceFlag, '--kill-grace')
    : parseDuration(
        config.killGrace ?? RUN_BASE_DEFAULTS.killGrace,
        'config killGrace',
      );

  const docker: DockerRuntimeOptions = {
    runtime:
      nonEmpty(flags.runtime) ?? config.runtime ?? RUN_BASE_DEFAULTS.runtime,
    network: nonEmpty(flags.network) ?? config.network,
    runtimeArgs: config.runtimeArgs,
    containerInputDir: config.containerInputDir,
    containerRunDir: config.containerRunDir,
  };

  const outDir = nonEmpty(flags.outDir) ?? config.outDir ?? '.';
  const results = nonEmpty(flags.results);
  const summary = nonEmpty(flags.summary);

  return {
    batch: {
      folder: path.resolve(cwd, folder),
      match: flags.match,
      glob: flags.glob,
      recursive: Boolean(flags.recursive),
      image,
      timeoutMs,
      parallelism,
      extraArgs: [...extraArgs],
      outDir: path.resolve(cwd, outDir),
      killGraceMs,
      docker,
    },
    results: results
      ? { dir: path.resolve(cwd, results), prefix: nonEmpty(flags.prefix) }
      : undefined,
    summary: summary ? path.resolve(cwd, summary) : undefined,
    planOnly: Boolean(flags.plan),
  };
};
