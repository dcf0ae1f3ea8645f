#!/usr/bin/env tsx
// src/cli/bin/bench.ts
// CLI bootstrap (executes the parser).
import { reportFailure } from '../cli-utils';
import { makeCli } from '..';

void makeCli()
  .parseAsync()
  .catch((e: unknown) => {
    process.exitCode = reportFailure(e);
  });
