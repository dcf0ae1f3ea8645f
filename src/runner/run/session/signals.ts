// src/runner/run/session/signals.ts
import { debugLog } from '@/runner/util/debug';
import { DBG_SCOPE_SIGNALS } from '@/runner/util/debug-scopes';

const STOP_SIGNALS = ['SIGINT', 'SIGTERM'] as const;

/**
 * Route operator interrupts to onStop for the lifetime of a batch.
 * Installing a listener keeps Node from exiting on the signal, which is what
 * lets the batch terminate its containers and return partial results.
 *
 * @returns Detach function; call it once the batch has settled.
 */
export const attachSessionSignals = (onStop: () => void): (() => void) => {
  const handler = (sig: NodeJS.Signals): void => {
    debugLog(DBG_SCOPE_SIGNALS, `received ${sig}`);
    onStop();
  };
  for (const s of STOP_SIGNALS) process.on(s, handler);
  debugLog(DBG_SCOPE_SIGNALS, 'install SIGINT/SIGTERM handlers');
  return () => {
    for (const s of STOP_SIGNALS) process.off(s, handler);
    debugLog(DBG_SCOPE_SIGNALS, 'detach SIGINT/SIGTERM handlers');
  };
};
