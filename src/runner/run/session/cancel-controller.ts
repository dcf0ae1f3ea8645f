// src/runner/run/session/cancel-controller.ts
import { callHook } from '@/runner/run/exec/run-one';
import type { RunHooks } from '@/runner/run/types';

/**
 * Cancellation token for a batch. Every in-flight run observes `signal`;
 * the scheduler checks it before each dispatch.
 */
export class CancelController {
  private readonly ac = new AbortController();

  constructor(private readonly hooks?: RunHooks) {}

  get signal(): AbortSignal {
    return this.ac.signal;
  }

  public isCancelled(): boolean {
    return this.ac.signal.aborted;
  }

  /** Idempotent: the first call aborts, later calls are no-ops. */
  public triggerCancel(): void {
    if (this.ac.signal.aborted) return;
    this.ac.abort();
    callHook('onCancelled', this.hooks?.onCancelled);
  }

  /** Follow an outer token (library callers passing their own signal). */
  public follow(outer?: AbortSignal): () => void {
    if (!outer) return () => undefined;
    if (outer.aborted) {
      this.triggerCancel();
      return () => undefined;
    }
    const onAbort = (): void => this.triggerCancel();
    outer.addEventListener('abort', onAbort, { once: true });
    return () => outer.removeEventListener('abort', onAbort);
  }
}
