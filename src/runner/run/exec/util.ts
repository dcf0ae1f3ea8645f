/* src/runner/run/exec/util.ts
 * Utilities for scheduling, stream handling and bounded output capture.
 */
import type { Writable } from 'node:stream';

/** Yield one event-loop tick so pending signal handlers can run. */
export const yieldToEventLoop = (): Promise<void> =>
  new Promise<void>((resolveP) => setImmediate(resolveP));

/** Wait for p, but no longer than ms; the timer never outlives the wait. */
export const waitAtMost = async (p: Promise<void>, ms: number): Promise<void> => {
  let timer: NodeJS.Timeout | undefined;
  try {
    await Promise.race([
      p,
      new Promise<void>((resolveP) => {
        timer = setTimeout(resolveP, ms);
      }),
    ]);
  } finally {
    if (timer) clearTimeout(timer);
  }
};

/**
 * Await a writable stream's end of life. Resolves on 'close' or 'error' and
 * at once when the stream is already closed or destroyed; never rejects.
 */
export const waitForStreamClose = (stream: Writable): Promise<void> =>
  new Promise<void>((resolveP) => {
    if (stream.closed || stream.destroyed) {
      resolveP();
      return;
    }
    stream.once('close', () => resolveP());
    stream.once('error', () => resolveP());
  });

/**
 * Length of the longest prefix of buf that does not end inside a UTF-8
 * sequence.
 */
export const utf8Boundary = (buf: Buffer): number => {
  let i = buf.length - 1;
  // Step back over at most three continuation bytes to the lead byte.
  while (i >= 0 && buf.length - i <= 4 && (buf[i] & 0xc0) === 0x80) i -= 1;
  if (i < 0 || buf.length - i > 4) return buf.length;
  const lead = buf[i];
  const need = lead >= 0xf0 ? 4 : lead >= 0xe0 ? 3 : lead >= 0xc0 ? 2 : 1;
  return buf.length - i >= need ? buf.length : i;
};

/** In-memory copy of a stream, capped; the on-disk file keeps everything. */
export class CappedCapture {
  private readonly chunks: Buffer[] = [];
  private bytes = 0;
  private cut = false;

  constructor(private readonly limit: number) {}

  push(chunk: Buffer): void {
    if (this.cut) return;
    const next = this.bytes + chunk.byteLength;
    if (next > this.limit) {
      const keep = Math.max(0, this.limit - this.bytes);
      if (keep > 0) this.chunks.push(chunk.subarray(0, keep));
      this.bytes = this.limit;
      this.cut = true;
      return;
    }
    this.chunks.push(chunk);
    this.bytes = next;
  }

  get truncated(): boolean {
    return this.cut;
  }

  /** Captured text; a cut never leaves half a character at the end. */
  text(): string {
    const all = Buffer.concat(this.chunks);
    return (this.cut ? all.subarray(0, utf8Boundary(all)) : all).toString(
      'utf8',
    );
  }
}
