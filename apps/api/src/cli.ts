#!/usr/bin/env tsx
/**
 * Usage:
 *   readiness quality <connection-url> [schema]
 *   readiness collect <connection-url> [schema]
 *   readiness project [table] [--horizons=6,12,24]
 *
 * Results are printed to stdout as JSON; logs go to stderr.
 */

import { config } from './config';
import { analyzeSource } from './quality/analyze';
import { collectSnapshots } from './growth/collector';
import { buildCapacityReport, project } from './growth/projector';
import { openSnapshotStore } from './growth/store';
import { describeTarget, detectDbType, withSource } from './sources';
import { parseHorizons } from './http/validate';
import { ConnectivityError, ValidationError, getErrorMessage } from './utils/errors';
import { createChildLogger } from './utils/logger';

const log = createChildLogger('cli');

const USAGE = `Usage:
  readiness quality <connection-url> [schema]
  readiness collect <connection-url> [schema]
  readiness project [table] [--horizons=6,12,24]`;

const flagValue = (args: string[], name: string) =>
  args.find(arg => arg.startsWith(`--${name}=`))?.split('=')[1];

const print = (value: unknown) => {
  process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
};

const sourceOptions = (url: string | undefined, schema: string | undefined) => {
  const connectionString = url ?? config.databaseUrl;
  if (!connectionString) throw new ValidationError('A connection URL (or DATABASE_URL) is required');
  return {
    dbType: detectDbType(connectionString),
    connectionString,
    schema: schema ?? config.defaultSchema,
    queryTimeoutMs: config.queryTimeoutMs
  };
};

const run = async (argv: string[]) => {
  const [command, ...rest] = argv;
  const positional = rest.filter(arg => !arg.startsWith('--'));

  switch (command) {
    case 'quality': {
      const options = sourceOptions(positional[0], positional[1]);
      const report = await withSource(options, source =>
        analyzeSource(source, {
          schema: options.schema,
          target: describeTarget(options.dbType, options.connectionString),
          thresholds: { formatSampleSize: config.sampleSize },
          checkTimeoutMs: config.queryTimeoutMs
        })
      );
      print(report);
      return 0;
    }
    case 'collect': {
      const options = sourceOptions(positional[0], positional[1]);
      const store = openSnapshotStore({ file: config.snapshotDb });
      try {
        print(await withSource(options, source => collectSnapshots(source, store, { schema: options.schema })));
      } finally {
        await store.close();
      }
      return 0;
    }
    case 'project': {
      const horizons = parseHorizons(flagValue(rest, 'horizons'));
      const store = openSnapshotStore({ file: config.snapshotDb });
      try {
        const table = positional[0];
        print(table ? await project(store, table, { horizons }) : await buildCapacityReport(store, { horizons }));
      } finally {
        await store.close();
      }
      return 0;
    }
    default:
      process.stderr.write(`${USAGE}\n`);
      return 2;
  }
};

run(process.argv.slice(2)).then(
  code => {
    process.exitCode = code;
  },
  err => {
    log.error({ err: getErrorMessage(err) }, 'Command failed');
    process.exitCode = err instanceof ConnectivityError ? 3 : 1;
  }
);
