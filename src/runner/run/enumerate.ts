/* src/runner/run/enumerate.ts
 * Select benchmark inputs under a folder, in a reproducible order.
 */
import { stat } from 'node:fs/promises';
import path from 'node:path';

import fg from 'fast-glob';

import { ConfigError } from '@/runner/errors';

export type InputFile = {
  /** Absolute path. */
  input: string;
  /** Path relative to the folder, POSIX separators. */
  relInput: string;
};

export type MatchSpec =
  | { kind: 'regex'; pattern: string; recursive?: boolean }
  | { kind: 'glob'; pattern: string };

/** Compile a name pattern that must match the whole file name. */
export const compileMatch = (pattern: string): RegExp => {
  try {
    return new RegExp(`^(?:${pattern})$`);
  } catch (e) {
    throw new ConfigError(
      `match: invalid regular expression "${pattern}"`,
      { cause: e },
    );
  }
};

/** Code-unit order; independent of locale so reruns list files identically. */
export const compareRel = (a: string, b: string): number =>
  a < b ? -1 : a > b ? 1 : 0;

/** Throw ConfigError unless folder is an existing directory. */
export const assertFolder = async (folder: string): Promise<string> => {
  const abs = path.resolve(folder);
  let isDir = false;
  try {
    isDir = (await stat(abs)).isDirectory();
  } catch {
    throw new ConfigError(`folder: "${folder}" does not exist`);
  }
  if (!isDir) throw new ConfigError(`folder: "${folder}" is not a directory`);
  return abs;
};

/**
 * List regular files under folder matching spec, sorted by relative path.
 * Zero matches is a valid (empty) result.
 */
export const enumerateInputs = async (
  folder: string,
  spec: MatchSpec,
): Promise<InputFile[]> => {
  const root = await assertFolder(folder);
  let rels: string[];
  if (spec.kind === 'glob') {
    rels = await fg(spec.pattern, {
      cwd: root,
      onlyFiles: true,
      dot: false,
      followSymbolicLinks: true,
    });
  } else {
    const rx = compileMatch(spec.pattern);
    const all = await fg(spec.recursive ? '**/*' : '*', {
      cwd: root,
      onlyFiles: true,
      dot: true,
      followSymbolicLinks: true,
    });
    rels = all.filter((rel) => rx.test(path.posix.basename(rel)));
  }
  return rels
    .sort(compareRel)
    .map((relInput) => ({ input: path.join(root, relInput), relInput }));
};
