/* src/runner/run/queue.ts
 * Shared batch state handed to worker loops: the run-id counter and the
 * queue of pending runs. Both are only touched synchronously between awaits,
 * so a read-modify-write can never interleave with another worker's.
 */
import { readdir } from 'node:fs/promises';
import path from 'node:path';

import type { PendingRun } from '@/runner/run/types';

const RUN_DIR_RE = /^run_(\d+)_/;

/** Monotonic counter for run directory names. */
export class RunCounter {
  private last: number;

  constructor(start = 0) {
    this.last = start;
  }

  next(): number {
    this.last += 1;
    return this.last;
  }

  peek(): number {
    return this.last;
  }
}

/** FIFO of pending runs; next() pops the head exactly once. */
export class JobQueue {
  private readonly items: PendingRun[];
  private head = 0;

  constructor(items: readonly PendingRun[]) {
    this.items = [...items];
  }

  next(): PendingRun | undefined {
    if (this.head >= this.items.length) return undefined;
    const item = this.items[this.head];
    this.head += 1;
    return item;
  }

  /** Runs not yet dispatched, in queue order. */
  snapshot(): readonly PendingRun[] {
    return this.items.slice(this.head);
  }

  get remaining(): number {
    return this.items.length - this.head;
  }
}

export type BatchState = {
  counter: RunCounter;
  queue: JobQueue;
};

/** File-system safe rendering of an input name for directory names. */
export const sanitizeName = (name: string): string =>
  name.replace(/[^A-Za-z0-9._-]+/g, '_').replace(/^\.+/, '') || 'input';

/** run_<NNNN>_<name> */
export const runDirName = (runId: number, relInput: string): string =>
  `run_${String(runId).padStart(4, '0')}_${sanitizeName(relInput)}`;

/**
 * Highest run id already present under outDir, so a new batch continues
 * numbering instead of colliding with leftovers from an earlier one.
 */
export const highestRunId = async (outDir: string): Promise<number> => {
  let names: string[];
  try {
    names = await readdir(outDir);
  } catch {
    return 0;
  }
  let max = 0;
  for (const n of names) {
    const m = RUN_DIR_RE.exec(n);
    if (m) max = Math.max(max, Number(m[1]));
  }
  return max;
};

/** Reserve run ids in enumeration order and build the queue. */
export const createBatchState = (
  outDir: string,
  files: ReadonlyArray<{ input: string; relInput: string }>,
  startAfter: number,
): BatchState => {
  const counter = new RunCounter(startAfter);
  const pending = files.map((f, index): PendingRun => {
    const runId = counter.next();
    return {
      index,
      runId,
      input: f.input,
      relInput: f.relInput,
      runDir: path.join(outDir, runDirName(runId, f.relInput)),
    };
  });
  return { counter, queue: new JobQueue(pending) };
};
