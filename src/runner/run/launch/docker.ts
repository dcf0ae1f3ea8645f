/* src/runner/run/launch/docker.ts
 * `docker run` launcher: one throwaway container per run, input and run
 * directory mounted read-only.
 */
import { spawn } from 'node:child_process';
import { randomBytes } from 'node:crypto';
import path from 'node:path';

import type { PendingRun } from '@/runner/run/types';
import { debugLog } from '@/runner/util/debug';
import { DBG_SCOPE_LAUNCH_TERMINATE } from '@/runner/util/debug-scopes';

import type { LaunchSpec, Launcher } from './types';

/** Runtime-level settings, independent of the image being benchmarked. */
export type DockerRuntimeOptions = {
  /** Runtime binary (docker, podman). */
  runtime?: string;
  /** Container network; omitted means the runtime default. */
  network?: string;
  /** Extra `run` flags inserted before the image (e.g. --memory 8g). */
  runtimeArgs?: readonly string[];
  containerInputDir?: string;
  containerRunDir?: string;
};

export type DockerLauncherOptions = DockerRuntimeOptions & {
  image: string;
  /** Trailing solver arguments (passed through byte-for-byte). */
  extraArgs?: readonly string[];
};

export const DEFAULT_CONTAINER_INPUT_DIR = '/bench/input';
export const DEFAULT_CONTAINER_RUN_DIR = '/bench/run';

/** `docker run` exits 125 when the daemon could not create/start the container. */
const DOCKER_LAUNCH_EXIT = 125;

/** Unique per run and per driver process; safe as a container name. */
export const containerNameFor = (
  run: PendingRun,
  token = randomBytes(3).toString('hex'),
): string => `bench-${String(process.pid)}-${String(run.runId)}-${token}`;

export class DockerLauncher implements Launcher {
  readonly kind = 'docker' as const;
  private readonly runtime: string;
  private readonly inputDir: string;
  private readonly runDir: string;

  constructor(private readonly opts: DockerLauncherOptions) {
    this.runtime = opts.runtime ?? 'docker';
    this.inputDir = opts.containerInputDir ?? DEFAULT_CONTAINER_INPUT_DIR;
    this.runDir = opts.containerRunDir ?? DEFAULT_CONTAINER_RUN_DIR;
  }

  /** Path of the input as the solver sees it inside the container. */
  containerInputPath(run: PendingRun): string {
    return path.posix.join(this.inputDir, path.basename(run.input));
  }

  prepare(run: PendingRun): LaunchSpec {
    const container = containerNameFor(run);
    const inside = this.containerInputPath(run);
    const args: string[] = ['run', '--rm', '--init', '--name', container];
    if (this.opts.network) args.push('--network', this.opts.network);
    args.push(...(this.opts.runtimeArgs ?? []));
    args.push('--volume', `${run.runDir}:${this.runDir}:ro`);
    args.push('--volume', `${run.input}:${inside}:ro`);
    args.push('--workdir', this.runDir);
    args.push(this.opts.image, ...(this.opts.extraArgs ?? []), inside);
    return { command: this.runtime, args, container };
  }

  async terminate(spec: LaunchSpec): Promise<void> {
    const name = spec.container;
    if (!name) return;
    await new Promise<void>((resolveP) => {
      const kill = spawn(this.runtime, ['kill', name], { stdio: 'ignore' });
      kill.on('error', (e) => {
        debugLog(DBG_SCOPE_LAUNCH_TERMINATE, `${name}: ${e.message}`);
        resolveP();
      });
      kill.on('close', (code) => {
        if (code !== 0)
          debugLog(
            DBG_SCOPE_LAUNCH_TERMINATE,
            `${name}: ${this.runtime} kill exited ${String(code)}`,
          );
        resolveP();
      });
    });
  }

  classifyExit(exitCode: number): string | undefined {
    return exitCode === DOCKER_LAUNCH_EXIT
      ? `${this.runtime} could not start image "${this.opts.image}" (exit ${String(exitCode)})`
      : undefined;
  }
}
