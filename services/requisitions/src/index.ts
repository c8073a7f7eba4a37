import { config, createLogger } from '@stockroom/config';
import { DrizzleRequisitionStore, closeDb, db } from '@stockroom/db';
import { createApp } from './app.js';

const log = createLogger('requisitions');

const store = new DrizzleRequisitionStore(db, { lockTimeoutMs: config.DB_LOCK_TIMEOUT_MS });
const app = createApp({ store });

const server = app.listen(config.PORT, () => {
  log.info({ port: config.PORT, codeTimeZone: config.REQUISITION_CODE_TIMEZONE }, 'Requisitions service started');
});

// ─── Graceful Shutdown ───────────────────────────────────────────────
function shutdown(signal: string) {
  log.info({ signal }, 'Shutting down gracefully');
  server.close(() => {
    log.info('HTTP server closed');
    closeDb()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        log.error({ err }, 'Failed to close database pool');
        process.exit(1);
      });
  });
  setTimeout(() => {
    log.fatal('Forced shutdown after timeout');
    process.exit(1);
  }, 10_000).unref();
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

export default app;
