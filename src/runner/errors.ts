/* src/runner/errors.ts
 * Pre-flight failures. Per-run failures are recorded on the run, never thrown.
 */

/** Invalid batch configuration (folder, timeout, parallelism, pattern, config file). */
export class ConfigError extends Error {
  override readonly name = 'ConfigError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export const isConfigError = (e: unknown): e is ConfigError =>
  e instanceof ConfigError;

/** Render an unknown thrown value as a single message string. */
export const errorMessage = (e: unknown): string =>
  e instanceof Error ? e.message : String(e);
