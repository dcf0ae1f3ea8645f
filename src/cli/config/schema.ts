/* src/cli/config/schema.ts
 * Zod schema for bench-docker configuration (top-level "bench" block of
 * bench.config.{yml,yaml,json}).
 */
import { z } from 'zod';

// Common coercer for boolean-ish values
const coerceBool = z
  .union([z.boolean(), z.string(), z.number()])
  .transform((v, ctx) => {
    if (typeof v === 'boolean') return v;
    if (typeof v === 'number') return v === 1;
    const s = v.trim().toLowerCase();
    if (s === '1' || s === 'true') return true;
    if (s === '0' || s === 'false') return false;
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `expected a boolean, got "${v}"`,
    });
    return z.NEVER;
  })
  .optional();

// Durations stay strings here; parseDuration validates them with the
// same rules as the CLI flags.
const duration = z.union([
  z.string().min(1, { message: 'duration must be non-empty' }),
  z.number().positive(),
]);

export const benchConfigSchema = z
  .object({
    timeout: duration.optional(),
    parallel: z.coerce.number().int().positive().optional(),
    killGrace: duration.optional(),
    outDir: z.string().min(1).optional(),
    runtime: z.string().min(1).optional(),
    network: z.string().min(1).optional(),
    runtimeArgs: z.array(z.string()).optional(),
    containerInputDir: z
      .string()
      .startsWith('/', { message: 'must be an absolute container path' })
      .optional(),
    containerRunDir: z
      .string()
      .startsWith('/', { message: 'must be an absolute container path' })
      .optional(),
    debug: coerceBool,
    boring: coerceBool,
  })
  .strict();
export type BenchConfig = z.infer<typeof benchConfigSchema>;

export const configFileSchema = z
  .object({ bench: benchConfigSchema.default({}) })
  .passthrough();
