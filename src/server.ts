import bodyParser from 'body-parser';
import express from 'express';
import { AdminRoutes } from './routes/admin';
import { captureRawBody } from './routes/rawBody';
import { WebhookRoutes } from './routes/webhook';
import { describeError } from './utils/errors';
import { logger } from './utils/logger';

export interface ServerOptions {
  webhookRoutes: WebhookRoutes;
  adminRoutes: AdminRoutes;
  serviceName?: string;
  version?: string;
  devMode?: boolean;
}

export function createServer(options: ServerOptions): express.Express {
  const app = express();
  const serviceName = options.serviceName ?? 'Farm Advisor Bot';
  const version = options.version ?? '1.0.0';

  app.use(bodyParser.json({ limit: '1mb', verify: captureRawBody }));

  app.get('/', (req, res) => {
    res.json({ status: 'healthy', service: serviceName, version });
  });

  app.get('/health', (req, res) => {
    res.status(200).json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      mode: options.devMode ? 'development' : 'production',
      services: {
        api: 'up',
        database: 'up',
        dialogue_model: 'up',
        vision: 'up',
        weather: 'up'
      }
    });
  });

  app.use('/', options.webhookRoutes.getRouter());
  app.use('/', options.adminRoutes.getRouter());

  app.use((err: Error, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    logger.logError('Unhandled error', describeError(err));
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
