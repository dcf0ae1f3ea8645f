/* src/runner/util/debug.ts
 * Opt-in debug logger. Emits only when BENCH_DEBUG=1 to keep normal output quiet.
 */

export const debugOn = (): boolean => process.env.BENCH_DEBUG === '1';

/** Log a concise debug notice (scope: module:function). */
export const debugLog = (scope: string, message: string): void => {
  if (!debugOn()) return;
  // stderr to keep separation from normal logs
  console.error(`bench: debug: ${scope}: ${message}`);
};
