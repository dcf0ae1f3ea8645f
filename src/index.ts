/** Library entry point: run a solver image over a folder of inputs. */
export * from './runner/run';
export { ConfigError, isConfigError } from './runner/errors';
export { formatDuration, parseDuration } from './runner/util/duration';
export type { BenchConfig } from './cli/config/schema';
export { loadConfig } from './cli/config/load';
