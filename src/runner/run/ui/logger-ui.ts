// src/runner/run/ui/logger-ui.ts
import path from 'node:path';

import { renderBatchPlan } from '@/runner/run/plan';
import type {
  BatchResult,
  PendingRun,
  ResolvedBatch,
  RunHooks,
  RunRecord,
} from '@/runner/run/types';
import { cancel, go, warn } from '@/runner/util/color';
import { formatDuration } from '@/runner/util/duration';

import {
  fmtSeconds,
  renderSummaryTable,
  renderTally,
  statusDetail,
  statusLabel,
} from './format';

type Write = (line: string) => void;

/**
 * Line-per-event console progress for a batch. Plain text when BORING or
 * not a TTY; colored otherwise.
 */
export class LoggerUI {
  constructor(private readonly write: Write = (l) => console.log(l)) {}

  hooks(): RunHooks {
    return {
      onPlan: (batch, runs) => this.onPlan(batch, runs),
      onStart: (run) => this.onStart(run),
      onTimeout: (run, ms) => this.onTimeout(run, ms),
      onEnd: (run) => this.onEnd(run),
      onCancelled: () => this.onCancelled(),
    };
  }

  onPlan(batch: ResolvedBatch, runs: readonly PendingRun[]): void {
    this.write(renderBatchPlan(batch, runs));
  }

  onStart(run: PendingRun): void {
    this.write(
      `bench: ${go('▶ run')} "${run.relInput}" -> ${path.basename(run.runDir)}`,
    );
  }

  onTimeout(run: PendingRun, timeoutMs: number): void {
    this.write(
      `bench: ${warn('⏱ timeout')} "${run.relInput}" after ${formatDuration(timeoutMs)}; terminating`,
    );
  }

  onEnd(run: RunRecord): void {
    const detail = statusDetail(run.status);
    this.write(
      `bench: ${statusLabel(run.status)} "${run.relInput}" ${fmtSeconds(run.elapsedMs)}${detail ? ` ${detail}` : ''}`,
    );
  }

  onCancelled(): void {
    this.write(`bench: ${cancel('◼ interrupt')}; stopping in-flight runs`);
  }

  /** Final table and tally. */
  onDone(result: BatchResult): void {
    if (result.runs.length) this.write(renderSummaryTable(result.runs));
    const tail = result.cancelled
      ? ` (interrupted; ${String(result.matched - result.runs.length)} not started)`
      : '';
    this.write(`bench: ${renderTally(result.runs)}${tail}`);
  }
}
