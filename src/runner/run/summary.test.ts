import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  fakeRecord,
  makeTempDir,
  rmDirWithRetries,
} from '@/test-support/run';

import { renderSummaryCsv, summaryStatus, writeSummaryCsv } from './summary';

const runs = [
  fakeRecord({
    relInput: 'a.cnf',
    status: { kind: 'exited', exitCode: 0 },
    elapsedMs: 1234,
    runDir: '/out/run_0001_a.cnf',
  }),
  fakeRecord({
    relInput: 'b,1.cnf',
    status: { kind: 'timed-out', timeoutMs: 10_000 },
    elapsedMs: 10_000.4,
    runDir: '/out/run_0002_b_1.cnf',
  }),
  fakeRecord({
    relInput: 'c.cnf',
    status: { kind: 'launch-failure', message: 'no such image' },
    elapsedMs: 5,
    runDir: '/out/run_0003_c.cnf',
  }),
  fakeRecord({
    relInput: 'd.cnf',
    status: { kind: 'exited', exitCode: 3 },
    elapsedMs: 20,
    runDir: '/out/run_0004_d.cnf',
  }),
  fakeRecord({
    relInput: 'e.cnf',
    status: { kind: 'cancelled' },
    elapsedMs: 0,
    runDir: '/out/run_0005_e.cnf',
  }),
];

describe('summary CSV', () => {
  it('maps statuses', () => {
    expect(runs.map((r) => summaryStatus(r.status))).toEqual([
      'ok',
      'timeout',
      'launch-failure',
      'fail',
      'cancelled',
    ]);
  });

  it('renders one quoted-as-needed row per run', () => {
    expect(renderSummaryCsv(runs)).toBe(
      [
        'input,status,exit_code,seconds,run_dir',
        'a.cnf,ok,0,1.234,run_0001_a.cnf',
        '"b,1.cnf",timeout,,10.000,run_0002_b_1.cnf',
        'c.cnf,launch-failure,,0.005,run_0003_c.cnf',
        'd.cnf,fail,3,0.020,run_0004_d.cnf',
        'e.cnf,cancelled,,0.000,run_0005_e.cnf',
        '',
      ].join('\n'),
    );
  });

  describe('writeSummaryCsv', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await makeTempDir('summary');
    });

    afterEach(async () => {
      await rmDirWithRetries(dir);
    });

    it('creates parent directories', async () => {
      const file = path.join(dir, 'nested', 'summary.csv');
      expect(await writeSummaryCsv(file, runs.slice(0, 1))).toBe(file);
      expect(await readFile(file, 'utf8')).toBe(
        'input,status,exit_code,seconds,run_dir\na.cnf,ok,0,1.234,run_0001_a.cnf\n',
      );
    });
  });
});
