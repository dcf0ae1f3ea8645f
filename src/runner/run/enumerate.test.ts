import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ConfigError } from '@/runner/errors';
import {
  makeTempDir,
  rmDirWithRetries,
  writeInputs,
} from '@/test-support/run';

import { compileMatch, enumerateInputs } from './enumerate';

describe('enumerateInputs', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir('enum');
    await writeInputs(dir, {
      'b.cnf': '',
      'a.cnf': '',
      'c.txt': '',
      'B.cnf': '',
      'x.cnf.bak': '',
      'sub/d.cnf': '',
    });
  });

  afterEach(async () => {
    await rmDirWithRetries(dir);
  });

  it('matches the whole file name and sorts by code unit', async () => {
    const files = await enumerateInputs(dir, {
      kind: 'regex',
      pattern: '.*\\.cnf',
    });
    expect(files.map((f) => f.relInput)).toEqual(['B.cnf', 'a.cnf', 'b.cnf']);
    expect(files[1]?.input).toBe(path.join(dir, 'a.cnf'));
  });

  it('descends into subfolders when recursive', async () => {
    const files = await enumerateInputs(dir, {
      kind: 'regex',
      pattern: '.*\\.cnf',
      recursive: true,
    });
    expect(files.map((f) => f.relInput)).toEqual([
      'B.cnf',
      'a.cnf',
      'b.cnf',
      'sub/d.cnf',
    ]);
  });

  it('selects by glob relative to the folder', async () => {
    const files = await enumerateInputs(dir, {
      kind: 'glob',
      pattern: '**/*.cnf',
    });
    expect(files.map((f) => f.relInput)).toEqual([
      'B.cnf',
      'a.cnf',
      'b.cnf',
      'sub/d.cnf',
    ]);
  });

  it('returns an empty list when nothing matches', async () => {
    expect(
      await enumerateInputs(dir, { kind: 'regex', pattern: 'nope' }),
    ).toEqual([]);
  });

  it('rejects a missing folder or a file as folder', async () => {
    await expect(
      enumerateInputs(path.join(dir, 'missing'), {
        kind: 'regex',
        pattern: '.*',
      }),
    ).rejects.toBeInstanceOf(ConfigError);
    await expect(
      enumerateInputs(path.join(dir, 'a.cnf'), { kind: 'regex', pattern: '.*' }),
    ).rejects.toThrow('is not a directory');
  });
});

describe('compileMatch', () => {
  it('anchors the pattern', () => {
    expect(compileMatch('a|b').test('ab')).toBe(false);
    expect(compileMatch('a|b').test('b')).toBe(true);
  });

  it('throws ConfigError on an invalid pattern', () => {
    expect(() => compileMatch('(')).toThrow(ConfigError);
  });
});
