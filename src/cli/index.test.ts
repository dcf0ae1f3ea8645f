import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { makeCli } from '@/cli/index';
import {
  makeTempDir,
  rmDirWithRetries,
  stubLauncher,
  writeInputs,
} from '@/test-support/run';

describe('bench-docker CLI', () => {
  const exitBackup = process.exitCode;
  let dir: string;
  let out: string[];
  let errs: string[];
  let env: NodeJS.ProcessEnv;

  beforeEach(async () => {
    dir = await makeTempDir('cli');
    await writeInputs(path.join(dir, 'in'), { 'a.cnf': '', 'b.cnf': '' });
    out = [];
    errs = [];
    env = {};
  });

  afterEach(async () => {
    process.exitCode = exitBackup;
    await rmDirWithRetries(dir);
  });

  const cli = () =>
    makeCli({
      cwd: dir,
      env,
      createLauncher: stubLauncher,
      write: (l) => out.push(l),
      writeError: (l) => errs.push(l),
      signals: false,
    });

  it('documents the batch options', () => {
    const help = cli().helpInformation();
    for (const flag of [
      '--docker-image <image>',
      '--folder <dir>',
      '--match <regex>',
      '--timeout <duration>',
      '--parallel <n>',
      '-p, --plan',
      '-d, --debug',
      '-b, --boring',
    ]) {
      expect(help).toContain(flag);
    }
  });

  it('passes arguments after -- to the solver', async () => {
    await cli().parseAsync(
      [
        '--docker-image',
        'img',
        '--folder',
        'in',
        '--plan',
        '--',
        '--count-only',
        '-v',
      ],
      { from: 'user' },
    );
    expect(process.exitCode).toBe(0);
    const lines = out[0]?.split('\n') ?? [];
    expect(lines).toContain('  files: 2 (a.cnf, b.cnf)');
    expect(lines).toContain('  command: --count-only -v <input>');
  });

  it('exits 1 on a configuration error', async () => {
    await cli().parseAsync(['--folder', 'in'], { from: 'user' });
    expect(process.exitCode).toBe(1);
    expect(errs).toEqual(['bench: error: --docker-image is required']);
  });

  it('maps --debug and --boring onto the environment', async () => {
    await cli().parseAsync(
      ['-d', '-b', '--docker-image', 'img', '--folder', 'in', '-p'],
      { from: 'user' },
    );
    expect(env.BENCH_DEBUG).toBe('1');
    expect(env.BENCH_BORING).toBe('1');
  });
});
