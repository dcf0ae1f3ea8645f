import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { ConfigError } from '@/runner/errors';

import { deriveRun, parseParallel } from './derive';

const cwd = path.resolve('/work');
const base = { dockerImage: 'img', folder: 'in' };

describe('deriveRun', () => {
  it('applies built-in defaults', () => {
    const d = deriveRun(cwd, base, [], {}, {});
    expect(d.planOnly).toBe(false);
    expect(d.results).toBeUndefined();
    expect(d.summary).toBeUndefined();
    expect(d.batch).toMatchObject({
      folder: path.join(cwd, 'in'),
      image: 'img',
      timeoutMs: 10_000,
      parallelism: 1,
      killGraceMs: 5000,
      outDir: cwd,
      extraArgs: [],
      recursive: false,
    });
    expect(d.batch.docker?.runtime).toBe('docker');
  });

  it('resolves flag > env > config', () => {
    const config = { timeout: '20s', parallel: 2, runtime: 'podman' };
    expect(deriveRun(cwd, base, [], {}, config).batch).toMatchObject({
      timeoutMs: 20_000,
      parallelism: 2,
    });
    const env = { TIMEOUT: '3', PARALLEL: '4' };
    expect(deriveRun(cwd, base, [], env, config).batch).toMatchObject({
      timeoutMs: 3000,
      parallelism: 4,
    });
    const flags = { ...base, timeout: '1m', parallel: '8', runtime: 'docker' };
    const d = deriveRun(cwd, flags, ['--count-only'], env, config);
    expect(d.batch).toMatchObject({
      timeoutMs: 60_000,
      parallelism: 8,
      extraArgs: ['--count-only'],
    });
    expect(d.batch.docker?.runtime).toBe('docker');
  });

  it('resolves results, summary and outDir against cwd', () => {
    const d = deriveRun(
      cwd,
      { ...base, results: 'res', prefix: 'exp1', summary: 's.csv', outDir: 'o' },
      [],
      {},
      {},
    );
    expect(d.results).toEqual({ dir: path.join(cwd, 'res'), prefix: 'exp1' });
    expect(d.summary).toBe(path.join(cwd, 's.csv'));
    expect(d.batch.outDir).toBe(path.join(cwd, 'o'));
  });

  it('reports missing and invalid settings', () => {
    expect(() => deriveRun(cwd, { folder: 'in' }, [], {}, {})).toThrow(
      '--docker-image is required',
    );
    expect(() => deriveRun(cwd, { dockerImage: 'img' }, [], {}, {})).toThrow(
      '--folder is required',
    );
    expect(() =>
      deriveRun(cwd, { ...base, prefix: 'p' }, [], {}, {}),
    ).toThrow('--prefix requires --results');
    expect(() => deriveRun(cwd, base, [], { PARALLEL: 'x' }, {})).toThrow(
      'PARALLEL: must be an integer >= 1, got "x"',
    );
    expect(() => deriveRun(cwd, base, [], { TIMEOUT: 'soon' }, {})).toThrow(
      ConfigError,
    );
  });
});

describe('parseParallel', () => {
  it('accepts positive integers only', () => {
    expect(parseParallel('3', '--parallel')).toBe(3);
    expect(parseParallel(2, 'config')).toBe(2);
    for (const bad of ['0', '-1', '1.5', '', 'two']) {
      expect(() => parseParallel(bad, '--parallel')).toThrow(ConfigError);
    }
  });
});
