/* src/runner/run/exec/runner.ts
 * Bounded-parallel dispatch of pending runs onto worker slots.
 */
import { type RunContext, runOne } from '@/runner/run/exec/run-one';
import { yieldToEventLoop } from '@/runner/run/exec/util';
import type { BatchState } from '@/runner/run/queue';
import type { RunRecord } from '@/runner/run/types';

/**
 * Run every queued run with at most `parallelism` in flight.
 *
 * Each slot is a loop that pops the next pending run when free, so dispatch
 * follows queue order while completion order is whatever the solvers make
 * it. Results are stored by dispatch index, which keeps the returned order
 * deterministic.
 *
 * @param state - Shared counter and queue.
 * @param parallelism - Number of worker slots (>= 1).
 * @param ctx - Per-run execution context (launcher, deadline, token, hooks).
 * @returns Finalized runs in dispatch order; runs never dispatched (interrupt) are absent.
 */
export const runQueued = async (
  state: BatchState,
  parallelism: number,
  ctx: RunContext,
): Promise<RunRecord[]> => {
  const done: Array<RunRecord | undefined> = [];
  const shouldContinue = (): boolean => !ctx.signal?.aborted;

  const slot = async (): Promise<void> => {
    for (;;) {
      // Allow a pending SIGINT handler to run before the next spawn.
      await yieldToEventLoop();
      if (!shouldContinue()) return;
      const next = state.queue.next();
      if (!next) return;
      done[next.index] = await runOne(next, ctx);
    }
  };

  const slots = Math.max(1, Math.min(parallelism, state.queue.remaining));
  await Promise.all(Array.from({ length: slots }, () => slot()));
  return done.filter((r): r is RunRecord => r !== undefined);
};
