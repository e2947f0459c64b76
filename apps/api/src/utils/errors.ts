import type { NoteReason } from '../types/quality';

export class AnalyzerError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

/** Source unreachable. The only error that aborts a run. */
export class ConnectivityError extends AnalyzerError {}

/** A specific introspection or query call was denied. */
export class PermissionError extends AnalyzerError {}

/** A column or pattern a dependent check needs is missing. */
export class DataShapeError extends AnalyzerError {}

/** Caller input rejected before any source is touched. */
export class ValidationError extends AnalyzerError {}

/** Fewer than two data points for a trend fit. */
export class InsufficientHistoryError extends AnalyzerError {
  constructor(public readonly table: string, public readonly dataPoints: number) {
    super(`Need at least 2 data points for ${table}, got ${dataPoints}`);
  }
}

export class CheckTimeoutError extends AnalyzerError {
  constructor(public readonly label: string, public readonly timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
  }
}

export const getErrorMessage = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
};

const CONNECTIVITY_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EHOSTUNREACH',
  'ETIMEDOUT',
  'SQLITE_CANTOPEN',
  'SQLITE_NOTADB',
  // postgres: connection exceptions, invalid password, database does not exist
  '08000',
  '08001',
  '08003',
  '08006',
  '28000',
  '28P01',
  '3D000',
  // mysql
  'ER_ACCESS_DENIED_ERROR',
  'ER_BAD_DB_ERROR',
  'PROTOCOL_CONNECTION_LOST'
]);

const PERMISSION_CODES = new Set([
  '42501',
  'ER_TABLEACCESS_DENIED_ERROR',
  'ER_DBACCESS_DENIED_ERROR',
  'ER_SPECIFIC_ACCESS_DENIED_ERROR',
  'SQLITE_AUTH',
  'SQLITE_PERM'
]);

const errorCode = (error: unknown): string | undefined => {
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
  const { code } = error;
  return typeof code === 'string' ? code : undefined;
};

export const noteReasonFor = (error: unknown): NoteReason => {
  if (error instanceof CheckTimeoutError) return 'timeout';
  if (error instanceof PermissionError) return 'permission_denied';
  return 'failed';
};

/** Maps a driver error onto the analyzer's error taxonomy. */
export const classifyDriverError = (error: unknown, context: string): Error => {
  if (error instanceof AnalyzerError) return error;
  const code = errorCode(error);
  const message = `${context}: ${getErrorMessage(error)}`;
  if (code && CONNECTIVITY_CODES.has(code)) return new ConnectivityError(message, error);
  if (code && PERMISSION_CODES.has(code)) return new PermissionError(message, error);
  return error instanceof Error ? error : new AnalyzerError(message, error);
};
