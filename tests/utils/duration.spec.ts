import { describe, expect, it } from 'vitest';
import { formatBytes, parseDuration } from '../../src/utils/duration.js';
import { captureError } from '../helpers/tree.js';

describe('parseDuration', () => {
  it('parses unit suffixes', () => {
    expect(parseDuration('30d')).toBe(2_592_000_000);
    expect(parseDuration('12h')).toBe(43_200_000);
    expect(parseDuration('1.5h')).toBe(5_400_000);
    expect(parseDuration('45m')).toBe(2_700_000);
    expect(parseDuration('2W')).toBe(1_209_600_000);
    expect(parseDuration('250ms')).toBe(250);
  });

  it('accepts positive millisecond counts', () => {
    expect(parseDuration(1500)).toBe(1500);
  });

  it('rejects unknown, zero and negative durations', () => {
    expect(captureError(() => parseDuration('soon'))).toMatchObject({ kind: 'InvalidArgument' });
    expect(captureError(() => parseDuration('0d'))).toMatchObject({ kind: 'InvalidArgument' });
    expect(captureError(() => parseDuration(-5))).toMatchObject({ kind: 'InvalidArgument' });
  });
});

describe('formatBytes', () => {
  it('scales to the largest whole unit', () => {
    expect(formatBytes(512)).toBe('512.00 B');
    expect(formatBytes(1536)).toBe('1.50 KB');
    expect(formatBytes(1024 ** 2)).toBe('1.00 MB');
  });
});
