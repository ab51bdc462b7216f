import 'dotenv/config';
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { Pool } from 'pg';
import { AuditRecorder } from '../application/audit-recorder';
import { DeclarationService } from '../application/declaration-service';
import { PgWorkflowStore } from '../application/pg-workflow-store';
import { PropositionService } from '../application/proposition-service';
import { WorkflowStore } from '../application/workflow-store';
import { loadConfig, maskDatabaseUrl } from '../config';
import { Clock, systemClock } from '../domain-types';
import { sweepExpiredPropositions } from '../jobs/sweep-expired-propositions';
import { SweepScheduler } from '../jobs/sweep-scheduler';
import { createAuthMiddleware } from './middleware/auth';
import { errorHandler, notFoundHandler } from './middleware/error-handler';
import { requestLogger } from './middleware/request-logger';
import { createAuditRoutes } from './routes/audit-routes';
import { createDeclarationRoutes } from './routes/declaration-routes';
import { createPropositionRoutes } from './routes/proposition-routes';

export interface AppDependencies {
  store: WorkflowStore;
  audit: AuditRecorder;
  jwtSecret: string;
  corsOrigin?: string;
  clock?: Clock;
}

export function createApp(deps: AppDependencies) {
  const clock = deps.clock ?? systemClock;
  const declarations = new DeclarationService(deps.store, deps.audit, { clock });
  const propositions = new PropositionService(deps.store, deps.audit, { clock });

  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors({
    origin: deps.corsOrigin ?? '*',
    credentials: true,
  }));

  // Body parsing
  app.use(express.json({ limit: '1mb' }));

  // Request logging
  app.use(requestLogger);

  // Health check
  app.get('/health', (req, res) => {
    res.json({ status: 'ok', timestamp: clock().toISOString() });
  });

  const authenticate = createAuthMiddleware(deps.jwtSecret);

  // Mount routes
  app.use('/api/v1/declarations', authenticate, createDeclarationRoutes(declarations, propositions));
  app.use('/api/v1/propositions', authenticate, createPropositionRoutes(propositions));
  app.use('/api/v1/audit', authenticate, createAuditRoutes(deps.audit));

  // Error handlers (must be last)
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

export async function main(): Promise<void> {
  const config = loadConfig();
  const pool = new Pool({ connectionString: config.databaseUrl });
  const store = new PgWorkflowStore(pool);
  const audit = new AuditRecorder(store, { mode: config.auditMode });
  const app = createApp({ store, audit, jwtSecret: config.jwtSecret, corsOrigin: config.corsOrigin });

  const scheduler = config.sweep.enabled
    ? new SweepScheduler((now) => sweepExpiredPropositions(store, audit, now), {
        hourUtc: config.sweep.hourUtc,
        minuteUtc: config.sweep.minuteUtc,
      })
    : null;

  const server = app.listen(config.port, () => {
    console.log(`[API Server] Listening on port ${config.port}`);
    console.log(`[API Server] Environment: ${config.nodeEnv}`);
    console.log(`[API Server] Database: ${maskDatabaseUrl(config.databaseUrl)}`);
    console.log(`[API Server] Audit mode: ${config.auditMode}`);
  });
  scheduler?.start();

  const shutdown = (signal: string) => {
    console.log(`[API Server] ${signal} received, shutting down`);
    scheduler?.stop();
    server.close(() => {
      pool.end().then(
        () => process.exit(0),
        (error: unknown) => {
          console.error('[API Server] Failed to close database pool', error);
          process.exit(1);
        }
      );
    });
  };
  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));
}

// Start server
if (require.main === module) {
  main().catch((error: unknown) => {
    console.error('[API Server] Failed to start', error);
    process.exit(1);
  });
}
