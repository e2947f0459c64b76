import dotenv from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
// Load root .env if present
dotenv.config({ path: path.join(__dirname, '../../../.env') });
// Fallback to local .env
dotenv.config();

export type AppConfig = {
  port: number;
  nodeEnv: string;
  dataDir: string;
  snapshotDb: string;
  databaseUrl?: string;
  defaultSchema?: string;
  queryTimeoutMs: number;
  sampleSize: number;
};

const toInt = (value: string | undefined, fallback: number) => {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const dataDir = env.DATA_DIR || path.join(process.cwd(), 'data');
  return Object.freeze({
    port: toInt(env.PORT, 8080),
    nodeEnv: env.NODE_ENV || 'development',
    dataDir,
    snapshotDb: env.SNAPSHOT_DB || path.join(dataDir, 'snapshots.db'),
    databaseUrl: env.DATABASE_URL || undefined,
    defaultSchema: env.DATABASE_SCHEMA || env.SCHEMA || undefined,
    queryTimeoutMs: toInt(env.QUERY_TIMEOUT_MS, 30_000),
    sampleSize: toInt(env.SAMPLE_SIZE, 200)
  });
};

export const config = loadConfig();
