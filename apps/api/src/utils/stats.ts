import { InsufficientHistoryError } from './errors';

/** Linear interpolation between closest ranks; q in [0, 1]. */
export const quantile = (values: number[], q: number) => {
  if (!values.length) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const pos = (sorted.length - 1) * q;
  const base = Math.floor(pos);
  const rest = pos - base;
  if (sorted[base + 1] !== undefined) {
    return sorted[base] + rest * (sorted[base + 1] - sorted[base]);
  }
  return sorted[base];
};

export const mean = (values: number[]) =>
  values.length ? values.reduce((sum, v) => sum + v, 0) / values.length : 0;

export const round = (value: number, digits = 2) => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

/** Least-squares slope of y over x. */
export const linearSlope = (x: number[], y: number[], label = 'series') => {
  const n = Math.min(x.length, y.length);
  if (n < 2) throw new InsufficientHistoryError(label, n);
  const xm = mean(x.slice(0, n));
  const ym = mean(y.slice(0, n));
  let numer = 0;
  let denom = 0;
  for (let i = 0; i < n; i++) {
    numer += (x[i] - xm) * (y[i] - ym);
    denom += (x[i] - xm) ** 2;
  }
  return denom === 0 ? 0 : numer / denom;
};

const UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

export const formatBytes = (bytes: number) => {
  if (!Number.isFinite(bytes) || bytes < 0) return '0 B';
  let n = bytes;
  for (const unit of UNITS) {
    if (n < 1024) return `${n.toFixed(1)} ${unit}`;
    n /= 1024;
  }
  return `${n.toFixed(1)} PB`;
};

export const toNumber = (value: unknown): number | null => {
  if (value === null || value === undefined || value === '') return null;
  if (typeof value === 'bigint') return Number(value);
  const n = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(n) ? n : null;
};

export const toDate = (value: unknown): Date | null => {
  if (value instanceof Date) return Number.isNaN(value.valueOf()) ? null : value;
  if (typeof value !== 'string' && typeof value !== 'number') return null;
  const d = new Date(value);
  return Number.isNaN(d.valueOf()) ? null : d;
};
