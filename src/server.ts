import express from 'express';
import type { Router } from 'express';
import type { Server } from 'node:http';
import { createLogger } from './utils/logger.js';
import type { HealthReport } from './supervisor/Supervisor.js';

const logger = createLogger({ component: 'server' });

export interface AppOptions {
  health: () => HealthReport;
  /** Mounted at /webhook when updates are pushed rather than polled. */
  webhook?: Router;
}

export function createApp(options: AppOptions): express.Express {
  const app = express();

  // Request logging middleware
  app.use((req, _res, next) => {
    logger.debug({ method: req.method, path: req.path }, 'Incoming request');
    next();
  });

  if (options.webhook) {
    app.use('/webhook', options.webhook);
  }

  // Health check
  app.get('/health', (_req, res) => {
    const report = options.health();
    const healthy = report.status === 'running' || report.status === 'starting';
    res.status(healthy ? 200 : 503).json({ ...report, timestamp: new Date().toISOString() });
  });

  // Error handling
  app.use((err: Error & { status?: number }, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    // Body parser failures carry a 4xx status
    if (err.status !== undefined && err.status >= 400 && err.status < 500) {
      logger.warn({ error: err }, 'Rejected malformed request');
      res.status(err.status).json({ ok: false, error: 'Bad request' });
      return;
    }
    logger.error({ error: err }, 'Unhandled error in Express');
    res.status(500).json({ ok: false, error: 'Internal server error' });
  });

  return app;
}

export function startServer(app: express.Express, port: number, host: string = '0.0.0.0'): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      logger.info({ host, port }, 'HTTP server started');
      resolve(server);
    });
    server.once('error', reject);
  });
}

export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
    server.closeAllConnections();
  });
}
