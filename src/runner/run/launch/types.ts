// src/runner/run/launch/types.ts
import type { PendingRun } from '@/runner/run/types';

/** Process to spawn for one run. */
export type LaunchSpec = {
  command: string;
  args: string[];
  /** Runtime-side handle (container name) used by terminate(). */
  container?: string;
};

/**
 * Turns a pending run into a process launch, and knows how to stop what it
 * launched. The driver owns spawning, capture and deadlines.
 */
export interface Launcher {
  readonly kind: string;
  prepare(run: PendingRun): LaunchSpec;
  /** Stop the runtime-side workload (e.g. the container). Must not throw. */
  terminate?(spec: LaunchSpec): Promise<void>;
  /** Message when an exit code means the runtime could not launch the run. */
  classifyExit?(exitCode: number): string | undefined;
}
