/* src/runner/util/debug-scopes.ts
 * Centralized labels for debugLog so log lines stay greppable.
 */

/** launcher-side termination after timeout/cancel */
export const DBG_SCOPE_LAUNCH_TERMINATE = 'launch:terminate';

/** process-tree kill escalation */
export const DBG_SCOPE_EXEC_KILL = 'exec.run-one:kill';

/** config file discovery and parsing */
export const DBG_SCOPE_CONFIG_LOAD = 'cli.config:load';

/** signal handler install/detach */
export const DBG_SCOPE_SIGNALS = 'session.signals';
