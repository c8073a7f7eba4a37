import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { corsOrigins, createLogger } from '@stockroom/config';
import type { RequisitionStore } from '@stockroom/db';
import { auditContextMiddleware, authMiddleware } from '@stockroom/auth-utils';
import { errorHandler } from './middleware/error-handler.js';
import { createLoginRouter, createProfileRouter } from './routes/auth.routes.js';
import { createRequisitionsRouter } from './routes/requisitions.routes.js';
import { createInventoryRouter } from './routes/inventory.routes.js';
import { createAdminRouter } from './routes/admin.routes.js';
import { createReferenceDataRouter } from './routes/reference-data.routes.js';
import { defaultLifecycleOptions, type LifecycleOptions } from './services/requisition-lifecycle.service.js';

const log = createLogger('requisitions');

export interface AppOptions {
  store: RequisitionStore;
  lifecycle?: LifecycleOptions;
}

export function createApp({ store, lifecycle = defaultLifecycleOptions() }: AppOptions): Express {
  const app = express();

  app.use(helmet());
  app.use(cors({ origin: corsOrigins, credentials: true }));
  app.use(express.json({ limit: '1mb' }));

  // ─── Health Check ─────────────────────────────────────────────────────
  app.get('/health', async (_req, res) => {
    const checks: Record<string, string> = {};
    let healthy = true;

    try {
      await store.ping();
      checks.database = 'ok';
    } catch (err) {
      log.warn({ err }, 'Health check: database unreachable');
      checks.database = 'down';
      healthy = false;
    }

    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'ok' : 'degraded',
      service: 'requisitions',
      timestamp: new Date().toISOString(),
      checks,
    });
  });

  // Public
  app.use('/auth', createLoginRouter(store));

  // Everything below requires a bearer token
  app.use(authMiddleware);
  app.use(auditContextMiddleware);
  app.use('/auth', createProfileRouter(store));
  app.use('/requisitions', createRequisitionsRouter(store, lifecycle));
  app.use('/inventory', createInventoryRouter(store));
  app.use(createReferenceDataRouter(store));
  app.use('/admin', createAdminRouter(store));

  app.use(errorHandler);

  return app;
}
