/* src/cli/config/load.ts
 * Locate, parse and validate bench.config.* (YAML or JSON).
 */
import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import path from 'node:path';

import YAML from 'yaml';
import { ZodError } from 'zod';

import { type BenchConfig, configFileSchema } from '@/cli/config/schema';
import { ConfigError, errorMessage } from '@/runner/errors';
import { debugLog } from '@/runner/util/debug';
import { DBG_SCOPE_CONFIG_LOAD } from '@/runner/util/debug-scopes';

export const CONFIG_FILE_NAMES = [
  'bench.config.yml',
  'bench.config.yaml',
  'bench.config.json',
] as const;

/**
 * Parse configuration text based on file extension.
 * - JSON when path ends with ".json"
 * - YAML otherwise
 */
export const parseText = (p: string, text: string): unknown =>
  p.endsWith('.json')
    ? (JSON.parse(text) as unknown)
    : (YAML.parse(text) as unknown);

export const formatZodError = (e: unknown): string =>
  e instanceof ZodError
    ? e.issues
        .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('\n')
    : errorMessage(e);

/** First bench.config.* in dir, or null. */
export const findConfigPath = (dir: string): string | null => {
  for (const name of CONFIG_FILE_NAMES) {
    const p = path.join(dir, name);
    if (existsSync(p)) return p;
  }
  return null;
};

export type LoadedConfig = {
  /** Absolute path of the file read (null when none was found). */
  path: string | null;
  bench: BenchConfig;
};

/**
 * Load the `bench` block.
 *
 * @param cwd - Directory searched when `explicit` is not given.
 * @param explicit - Path from --config; must exist.
 * @throws ConfigError when the file is unreadable, unparsable or invalid.
 */
export const loadConfig = async (
  cwd: string,
  explicit?: string,
): Promise<LoadedConfig> => {
  const p = explicit ? path.resolve(cwd, explicit) : findConfigPath(cwd);
  if (!p) {
    debugLog(DBG_SCOPE_CONFIG_LOAD, `no config file in ${cwd}`);
    return { path: null, bench: {} };
  }
  let text: string;
  try {
    text = await readFile(p, 'utf8');
  } catch (e) {
    throw new ConfigError(`config: cannot read ${p}: ${errorMessage(e)}`, {
      cause: e,
    });
  }
  let raw: unknown;
  try {
    raw = parseText(p, text) ?? {};
  } catch (e) {
    throw new ConfigError(`config: cannot parse ${p}: ${errorMessage(e)}`, {
      cause: e,
    });
  }
  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    const rel = path.relative(cwd, p).replace(/\\/g, '/') || p;
    throw new ConfigError(
      `config: invalid config in ${rel}\n${formatZodError(parsed.error)}`,
    );
  }
  debugLog(DBG_SCOPE_CONFIG_LOAD, `loaded ${p}`);
  return { path: p, bench: parsed.data.bench };
};
