import { BackupError } from '../types/errors.js';
import type { Duration } from '../types/backup.js';

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
  w: 604_800_000,
};

const DURATION_PATTERN = /^(\d+(?:\.\d+)?)\s*(ms|s|m|h|d|w)$/i;

/**
 * Parse a retention duration into milliseconds.
 * Accepts a positive number of milliseconds or strings like '30d', '12h', '90m'.
 */
export function parseDuration(value: Duration): number {
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value <= 0) {
      throw new BackupError('InvalidArgument', `Duration must be a positive number of milliseconds, got ${value}.`);
    }
    return value;
  }

  const match = DURATION_PATTERN.exec(value.trim());
  const amount = match?.[1];
  const unit = match?.[2];
  if (!amount || !unit) {
    throw new BackupError('InvalidArgument', `Unrecognized duration '${value}'. Use forms like '30d', '12h' or '45m'.`);
  }

  const ms = Number(amount) * (UNIT_MS[unit.toLowerCase()] ?? 0);
  if (ms <= 0) {
    throw new BackupError('InvalidArgument', `Duration must be positive, got '${value}'.`);
  }
  return ms;
}

export function formatBytes(size: number): string {
  const units = ['B', 'KB', 'MB', 'GB', 'TB'];
  let value = size;
  for (const unit of units) {
    if (value < 1024) {
      return `${value.toFixed(2)} ${unit}`;
    }
    value /= 1024;
  }
  return `${value.toFixed(2)} PB`;
}
