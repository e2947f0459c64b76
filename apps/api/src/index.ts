import { config } from './config';
import { createApp } from './app';
import { openSnapshotStore } from './growth/store';
import { createChildLogger } from './utils/logger';
import { getErrorMessage } from './utils/errors';

const log = createChildLogger('server');

const store = openSnapshotStore({ file: config.snapshotDb });
const app = createApp({ store, config });

const server = app.listen(config.port, () => {
  log.info({ port: config.port, snapshotDb: config.snapshotDb }, 'Source readiness API running');
});

const shutdown = (signal: string) => {
  log.info({ signal }, 'Shutting down');
  server.close(() => {
    store.close().then(
      () => process.exit(0),
      err => {
        log.error({ err: getErrorMessage(err) }, 'Failed to close snapshot store');
        process.exit(1);
      }
    );
  });
};

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
