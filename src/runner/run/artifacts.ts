/* src/runner/run/artifacts.ts
 * Per-run artifact layout: stdout.txt, stderr.txt, status.json.
 */
import { writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { RunRecord } from '@/runner/run/types';

export const STDOUT_FILE = 'stdout.txt';
export const STDERR_FILE = 'stderr.txt';
export const STATUS_FILE = 'status.json';

export const artifactPaths = (
  runDir: string,
): { stdout: string; stderr: string; status: string } => ({
  stdout: path.join(runDir, STDOUT_FILE),
  stderr: path.join(runDir, STDERR_FILE),
  status: path.join(runDir, STATUS_FILE),
});

/** Shape of status.json. */
export type StatusDocument = {
  input: string;
  image: string;
  command: string[];
  status: RunRecord['status'];
  startedAt: string;
  finishedAt: string;
  elapsedMs: number;
  stdoutTruncated: boolean;
  stderrTruncated: boolean;
};

export const toStatusDocument = (
  run: RunRecord,
  image: string,
): StatusDocument => ({
  input: run.input,
  image,
  command: run.command,
  status: run.status,
  startedAt: new Date(run.startedAt).toISOString(),
  finishedAt: new Date(run.finishedAt).toISOString(),
  elapsedMs: run.elapsedMs,
  stdoutTruncated: run.stdoutTruncated,
  stderrTruncated: run.stderrTruncated,
});

export const writeStatus = async (
  run: RunRecord,
  image: string,
): Promise<string> => {
  const p = artifactPaths(run.runDir).status;
  await writeFile(
    p,
    `${JSON.stringify(toStatusDocument(run, image), null, 2)}\n`,
    'utf8',
  );
  return p;
};
