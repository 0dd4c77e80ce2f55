import express from 'express';
import cors from 'cors';
import type { Company } from './registry';
import { createJobRoutes } from './routes/jobs';
import { createLogger } from './utils/logger';

const log = createLogger('HTTP');

export function createApp(companies: Map<string, Company>): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  app.use((req, _res, next) => {
    log.debug(`${req.method} ${req.path}`);
    next();
  });

  // Routes
  app.use('/api', createJobRoutes(companies));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString(), service: 'jobs' });
  });

  // Error handler
  app.use(
    (err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
      log.error('Unhandled error:', err);
      res.status(500).json({ success: false, error: 'Internal server error' });
    }
  );

  return app;
}
