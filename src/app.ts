import express from 'express';
import cors from 'cors';
import type { AppConfig } from './config/config';
import type { ExpirySweeper } from './jobs/expirySweeper';
import { errorHandler } from './middleware/errorHandler';
import { createRateLimiter, noStore, securityHeaders } from './middleware/security';
import { createTextsRouter } from './routes/texts';
import type { SecureItemStore } from './storage/SecureItemStore';

export const VERSION = '1.0.0';

export interface AppDependencies {
  store: SecureItemStore;
  config: Pick<AppConfig, 'corsOrigin' | 'nodeEnv' | 'rateLimiting' | 'retention'>;
  sweeper?: ExpirySweeper;
}

export function createApp({ store, config, sweeper }: AppDependencies): express.Express {
  const app = express();

  // Trust proxy for reverse proxy setup (nginx)
  app.set('trust proxy', 'loopback');
  app.disable('x-powered-by');

  app.use(securityHeaders);
  app.use(createRateLimiter(config.rateLimiting));

  app.use(cors({
    origin: config.corsOrigin,
    credentials: false,
    methods: ['GET', 'HEAD', 'POST', 'DELETE'],
    allowedHeaders: ['Content-Type'],
    exposedHeaders: ['Expires', 'Location']
  }));

  // maxLength counts code points; an escaped astral one is a surrogate pair, 12 bytes (\uXXXX\uXXXX)
  app.use(express.json({ limit: config.retention.maxLength * 12 + 1024 }));

  app.get('/api/health', async (req, res) => {
    const storage = await store.healthCheck();
    const isHealthy = storage.status === 'healthy';

    res.status(isHealthy ? 200 : 503).json({
      status: isHealthy ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      version: VERSION,
      storage,
      sweeper: sweeper?.getStatistics(),
      environment: config.nodeEnv
    });
  });

  app.use('/api/texts', noStore, createTextsRouter(store));

  app.use('/api', (req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use(errorHandler);

  return app;
}
