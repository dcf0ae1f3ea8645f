import { describe, expect, it } from 'vitest';

import { ConfigError } from '@/runner/errors';

import { formatDuration, parseDuration } from './duration';

describe('parseDuration', () => {
  it('accepts every unit, fractions and bare seconds', () => {
    expect(parseDuration('250ms')).toBe(250);
    expect(parseDuration('10s')).toBe(10_000);
    expect(parseDuration('1.5s')).toBe(1500);
    expect(parseDuration('.5s')).toBe(500);
    expect(parseDuration('2m')).toBe(120_000);
    expect(parseDuration('1h')).toBe(3_600_000);
    expect(parseDuration('1d')).toBe(86_400_000);
    expect(parseDuration('5')).toBe(5000);
    expect(parseDuration(3)).toBe(3000);
    expect(parseDuration(' 2 M ')).toBe(120_000);
  });

  it('rejects zero, negative, malformed and unknown units', () => {
    for (const bad of ['0', '0s', '-1s', '', 'abc', '1.2.3s', '5x']) {
      expect(() => parseDuration(bad, '--timeout')).toThrow(ConfigError);
    }
  });

  it('names the setting and the unit in the message', () => {
    expect(() => parseDuration('5x', '--timeout')).toThrow(
      '--timeout: unknown unit "x" in "5x" (use ms, s, m, h or d)',
    );
    expect(() => parseDuration('0', 'TIMEOUT')).toThrow(
      'TIMEOUT: must be positive, got "0"',
    );
  });
});

describe('formatDuration', () => {
  it('picks the largest whole unit', () => {
    expect(formatDuration(250)).toBe('250ms');
    expect(formatDuration(1500)).toBe('1.5s');
    expect(formatDuration(10_000)).toBe('10s');
    expect(formatDuration(120_000)).toBe('2m');
    expect(formatDuration(3_600_000)).toBe('1h');
    expect(formatDuration(90_000)).toBe('90s');
  });
});
