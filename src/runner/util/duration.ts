/* src/runner/util/duration.ts
 * Duration strings as accepted by --timeout/--kill-grace and TIMEOUT.
 * A bare number means seconds, as with GNU timeout.
 */
import { ConfigError } from '@/runner/errors';

const UNIT_MS = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
} as const;

type Unit = keyof typeof UNIT_MS;

const isUnit = (u: string): u is Unit => Object.hasOwn(UNIT_MS, u);

const DURATION_RE = /^(\d+(?:\.\d+)?|\.\d+)\s*([a-z]*)$/;

/**
 * Parse a duration into whole milliseconds.
 *
 * @param raw - e.g. `10s`, `1.5m`, `250ms`, `30`.
 * @param label - Setting name used in the error message.
 * @throws ConfigError when malformed, zero or negative.
 */
export const parseDuration = (raw: string | number, label = 'duration'): number => {
  const text = String(raw).trim().toLowerCase();
  const m = DURATION_RE.exec(text);
  if (!m) {
    throw new ConfigError(`${label}: cannot parse duration "${String(raw)}"`);
  }
  const [, num, unitRaw] = m;
  const unit = unitRaw === '' ? 's' : unitRaw;
  if (!isUnit(unit)) {
    throw new ConfigError(
      `${label}: unknown unit "${unitRaw}" in "${String(raw)}" (use ms, s, m, h or d)`,
    );
  }
  const ms = Math.round(Number(num) * UNIT_MS[unit]);
  if (!Number.isFinite(ms) || ms <= 0) {
    throw new ConfigError(`${label}: must be positive, got "${String(raw)}"`);
  }
  return ms;
};

/** Compact rendering for plans and logs (e.g. 1500 -> "1.5s", 120000 -> "2m"). */
export const formatDuration = (ms: number): string => {
  if (ms < 1000) return `${String(ms)}ms`;
  if (ms % UNIT_MS.h === 0) return `${String(ms / UNIT_MS.h)}h`;
  if (ms % UNIT_MS.m === 0) return `${String(ms / UNIT_MS.m)}m`;
  return `${String(ms / 1000)}s`;
};
