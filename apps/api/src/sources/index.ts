import type { DbType, SourceConnection, SourceOptions } from './types';
import { connectPostgres } from './postgres';
import { connectMySQL } from './mysql';
import { connectSqlite } from './sqlite';
import { DataShapeError, getErrorMessage } from '../utils/errors';
import { createChildLogger } from '../utils/logger';
import { describeTarget } from './sql';

const log = createChildLogger('source');

/** Infers the dialect from a connection string's scheme or file extension. */
export const detectDbType = (connectionString: string): DbType => {
  const lower = connectionString.toLowerCase();
  if (lower.startsWith('postgres://') || lower.startsWith('postgresql://')) return 'postgres';
  if (lower.startsWith('mysql://') || lower.startsWith('mariadb://')) return 'mysql';
  if (lower.startsWith('sqlite:') || lower.startsWith('file:') || /\.(db|sqlite3?)$/.test(lower)) return 'sqlite';
  throw new DataShapeError(`Cannot infer database type from connection string '${describeTarget('postgres', connectionString)}'`);
};

export const openSource = async (options: SourceOptions): Promise<SourceConnection> => {
  log.info({ dbType: options.dbType, target: describeTarget(options.dbType, options.connectionString) }, 'Opening source');
  switch (options.dbType) {
    case 'postgres':
      return connectPostgres(options);
    case 'mysql':
      return connectMySQL(options);
    case 'sqlite':
      return connectSqlite(options);
  }
};

/** Opens a source for the duration of `fn` and always releases it. */
export const withSource = async <T>(options: SourceOptions, fn: (source: SourceConnection) => Promise<T>): Promise<T> => {
  const source = await openSource(options);
  try {
    return await fn(source);
  } finally {
    await source.close().catch(err => log.warn({ err: getErrorMessage(err) }, 'Failed to close source'));
  }
};

export { connectPostgres, connectMySQL, connectSqlite, describeTarget };
export { CAPABILITIES } from './sql';
export type * from './types';
