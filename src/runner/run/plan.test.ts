import { describe, expect, it } from 'vitest';

import { renderBatchPlan } from './plan';
import type { PendingRun, ResolvedBatch } from './types';

const batch: ResolvedBatch = {
  folder: '/data',
  match: { kind: 'regex', pattern: '.*\\.cnf', recursive: true },
  image: 'solver:1',
  timeoutMs: 10_000,
  parallelism: 2,
  extraArgs: ['--count-only'],
  outDir: '/out',
  killGraceMs: 5000,
};

const pending = (n: number): PendingRun[] =>
  Array.from({ length: n }, (_, i) => ({
    index: i,
    runId: i + 1,
    input: `/data/f${String(i)}`,
    relInput: `f${String(i)}`,
    runDir: `/out/run_000${String(i + 1)}_f${String(i)}`,
  }));

describe('renderBatchPlan', () => {
  it('lists settings and the first files', () => {
    expect(renderBatchPlan(batch, pending(10))).toBe(
      [
        'bench:',
        '  bench-docker plan',
        '  image: solver:1',
        '  folder: /data',
        '  match: regex .*\\.cnf (recursive)',
        '  timeout: 10s',
        '  parallel: 2',
        '  kill grace: 5s',
        '  output: /out',
        '  files: 10 (f0, f1, f2, f3, f4, f5, f6, f7, … 2 more)',
        '  command: --count-only <input>',
      ].join('\n'),
    );
  });

  it('shows glob selections and empty matches', () => {
    const text = renderBatchPlan(
      { ...batch, match: { kind: 'glob', pattern: '**/*.cnf' }, extraArgs: [] },
      [],
    );
    const lines = text.split('\n');
    expect(lines).toContain('  match: glob **/*.cnf');
    expect(lines).toContain('  files: 0');
    expect(lines.at(-1)).toBe('  command: <input>');
  });
});
