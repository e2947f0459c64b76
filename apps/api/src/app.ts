import express from 'express';
import type { Response } from 'express';
import cors from 'cors';

import type { AppConfig } from './config';
import { config as defaultConfig } from './config';
import { analyzeSource } from './quality/analyze';
import { collectSnapshots } from './growth/collector';
import { DEFAULT_HORIZONS, buildCapacityReport, estimateFromStore, toTableCapacity } from './growth/projector';
import type { SnapshotStore } from './growth/store';
import { describeTarget, withSource } from './sources';
import type { SourceConnection, SourceOptions } from './sources/types';
import { parseHorizons, parseSnapshot, parseSourceRequest, parseThresholds } from './http/validate';
import { ConnectivityError, DataShapeError, ValidationError, getErrorMessage } from './utils/errors';
import { createChildLogger } from './utils/logger';

const log = createChildLogger('http');

export type AppDeps = {
  store: SnapshotStore;
  config?: AppConfig;
  /** Replaces the real driver connection; tests hand in an in-process source. */
  withSource?: <T>(options: SourceOptions, fn: (source: SourceConnection) => Promise<T>) => Promise<T>;
};

const statusFor = (err: unknown) => {
  if (err instanceof ValidationError || err instanceof DataShapeError) return 400;
  if (err instanceof ConnectivityError) return 502;
  return 500;
};

const sendError = (res: Response, err: unknown, fallback: string) => {
  const status = statusFor(err);
  if (status >= 500) log.error({ err: getErrorMessage(err) }, fallback);
  res.status(status).json({ error: getErrorMessage(err) || fallback });
};

export const createApp = (deps: AppDeps) => {
  const app = express();
  const cfg = deps.config ?? defaultConfig;
  const useSource = deps.withSource ?? withSource;
  const { store } = deps;

  app.use(cors());
  app.use(express.json({ limit: '2mb' }));

  app.get('/api/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.post('/api/quality', async (req, res) => {
    try {
      const options = parseSourceRequest(req.body, cfg);
      const thresholds = parseThresholds(req.body?.thresholds);
      const report = await useSource(options, source =>
        analyzeSource(source, {
          schema: options.schema ?? cfg.defaultSchema,
          target: describeTarget(options.dbType, options.connectionString),
          thresholds: { formatSampleSize: cfg.sampleSize, ...thresholds },
          checkTimeoutMs: cfg.queryTimeoutMs
        })
      );
      res.json(report);
    } catch (err) {
      sendError(res, err, 'Quality analysis failed');
    }
  });

  app.post('/api/snapshots', async (req, res) => {
    try {
      const snapshot = await store.recordSnapshot(parseSnapshot(req.body));
      res.status(201).json(snapshot);
    } catch (err) {
      sendError(res, err, 'Failed to record snapshot');
    }
  });

  app.post('/api/snapshots/collect', async (req, res) => {
    try {
      const options = parseSourceRequest(req.body, cfg);
      const result = await useSource(options, source =>
        collectSnapshots(source, store, { schema: options.schema ?? cfg.defaultSchema })
      );
      res.status(201).json(result);
    } catch (err) {
      sendError(res, err, 'Snapshot collection failed');
    }
  });

  app.get('/api/projections', async (req, res) => {
    try {
      const report = await buildCapacityReport(store, { horizons: parseHorizons(req.query.horizons) });
      res.json(report);
    } catch (err) {
      sendError(res, err, 'Failed to build capacity report');
    }
  });

  app.get('/api/projections/:table', async (req, res) => {
    try {
      const { table } = req.params;
      const horizons = parseHorizons(req.query.horizons) ?? DEFAULT_HORIZONS;
      const known = await store.listTables();
      if (!known.includes(table)) return res.status(404).json({ error: `No snapshots recorded for '${table}'` });

      res.json(toTableCapacity(await estimateFromStore(store, table), horizons));
    } catch (err) {
      sendError(res, err, 'Failed to project table');
    }
  });

  return app;
};
