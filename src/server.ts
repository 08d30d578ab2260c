import express from 'express';
import type { Server } from 'node:http';
import { createLogger } from './utils/logger.js';
import { createInterpretRouter } from './adapters/http/interpretRouter.js';
import type { InterpretRouterDeps } from './adapters/http/interpretRouter.js';
const logger = createLogger({ component: 'server' });

export function createApp(deps: InterpretRouterDeps): express.Express {
  const app = express();

  // Request logging middleware
  app.use((req, _res, next) => {
    logger.debug({ method: req.method, path: req.path }, 'Incoming request');
    next();
  });

  app.use(createInterpretRouter(deps));

  // Health check
  app.get('/health', (_req, res) => {
    res.status(200).json({
      status: 'ok',
      devices: deps.orchestrator.devices().length,
      fallback: deps.orchestrator.fallbackName,
      timestamp: new Date().toISOString(),
    });
  });

  // Error handling
  app.use((err: Error & { status?: unknown }, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    // Body parser errors carry their own 4xx status (413 for an oversized body)
    if (typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
      logger.warn({ error: err, status: err.status }, 'Rejected request');
      res.status(err.status).json({ error: err.message });
      return;
    }
    logger.error({ error: err }, 'Unhandled error in Express');
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

export async function startServer(deps: InterpretRouterDeps, port: number, host: string = '0.0.0.0'): Promise<Server> {
  const app = createApp(deps);

  return new Promise((resolve) => {
    const server = app.listen(port, host, () => {
      logger.info({ host, port }, 'HTTP server started');
      resolve(server);
    });
  });
}
