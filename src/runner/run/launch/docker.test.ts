import { describe, expect, it } from 'vitest';

import type { PendingRun } from '@/runner/run/types';

import { containerNameFor, DockerLauncher } from './docker';

const run: PendingRun = {
  index: 0,
  runId: 3,
  input: '/data/in/a.cnf',
  relInput: 'a.cnf',
  runDir: '/out/run_0003_a.cnf',
};

describe('DockerLauncher', () => {
  it('mounts input and run directory read-only and appends the input last', () => {
    const l = new DockerLauncher({
      image: 'solver:1',
      extraArgs: ['--count-only'],
      network: 'none',
      runtimeArgs: ['--memory', '8g'],
    });
    const spec = l.prepare(run);
    expect(spec.command).toBe('docker');
    expect(spec.container).toMatch(/^bench-\d+-3-[0-9a-f]{6}$/);
    expect(spec.args).toEqual([
      'run',
      '--rm',
      '--init',
      '--name',
      spec.container,
      '--network',
      'none',
      '--memory',
      '8g',
      '--volume',
      '/out/run_0003_a.cnf:/bench/run:ro',
      '--volume',
      '/data/in/a.cnf:/bench/input/a.cnf:ro',
      '--workdir',
      '/bench/run',
      'solver:1',
      '--count-only',
      '/bench/input/a.cnf',
    ]);
  });

  it('honors runtime and container directories', () => {
    const l = new DockerLauncher({
      image: 'img',
      runtime: 'podman',
      containerInputDir: '/in',
      containerRunDir: '/work',
    });
    const spec = l.prepare(run);
    expect(spec.command).toBe('podman');
    expect(l.containerInputPath(run)).toBe('/in/a.cnf');
    expect(spec.args.slice(-8)).toEqual([
      '--volume',
      '/out/run_0003_a.cnf:/work:ro',
      '--volume',
      '/data/in/a.cnf:/in/a.cnf:ro',
      '--workdir',
      '/work',
      'img',
      '/in/a.cnf',
    ]);
    expect(spec.args).not.toContain('--network');
  });

  it('treats exit 125 as a launch failure', () => {
    const l = new DockerLauncher({ image: 'solver:1' });
    expect(l.classifyExit(125)).toBe(
      'docker could not start image "solver:1" (exit 125)',
    );
    expect(l.classifyExit(1)).toBeUndefined();
    expect(l.classifyExit(0)).toBeUndefined();
  });

  it('terminate resolves even when the runtime is missing', async () => {
    const l = new DockerLauncher({
      image: 'img',
      runtime: 'bench-test-no-such-binary',
    });
    await expect(
      l.terminate({ command: 'x', args: [], container: 'c' }),
    ).resolves.toBeUndefined();
    await expect(l.terminate({ command: 'x', args: [] })).resolves.toBeUndefined();
  });
});

describe('containerNameFor', () => {
  it('embeds pid, run id and token', () => {
    expect(containerNameFor(run, 'abc123')).toBe(
      `bench-${String(process.pid)}-3-abc123`,
    );
  });
});
