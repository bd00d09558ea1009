import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import type { HealthResponse } from '@sensor-registry/shared-types';
import { createLogger, withTimeout } from '@sensor-registry/shared-utils';
import type { AppConfig } from './config';
import { pingDatabase } from './db';
import { createAuthMiddleware } from './middleware/auth.middleware';
import { errorMiddleware, notFoundMiddleware } from './middleware/error.middleware';
import { requestLogger } from './middleware/request-logger.middleware';
import { createAuthRoutes } from './routes/auth.routes';
import { createDeviceRoutes } from './routes/device.routes';
import type { Services } from './services';

const logger = createLogger('App');

const HEALTH_TIMEOUT_MS = 2000;

export function createApp(services: Services, config: Pick<AppConfig, 'corsOrigin'>): Express {
  const app = express();

  // Middleware
  app.use(helmet());
  app.use(
    cors({
      origin: config.corsOrigin === '*' ? true : config.corsOrigin.split(','),
      credentials: true,
    })
  );
  app.use(express.json({ limit: '256kb' }));
  app.use(requestLogger);

  // Health check
  app.get('/health', async (_req, res) => {
    let healthy = false;
    try {
      healthy = await withTimeout(pingDatabase(services.pool), HEALTH_TIMEOUT_MS, 'Database check timed out');
    } catch (error) {
      logger.warn('Health check failed', error);
    }

    const body: HealthResponse = {
      status: healthy ? 'ok' : 'unavailable',
      timestamp: new Date().toISOString(),
      pool: services.pool.stats(),
    };
    res.status(healthy ? 200 : 503).json(body);
  });

  const requireAuth = createAuthMiddleware(services.tokens);

  // API Routes
  app.use('/api/v1/auth', createAuthRoutes(services.auth, requireAuth));
  app.use(
    '/api/v1/devices',
    createDeviceRoutes({
      devices: services.devices,
      configs: services.configs,
      sensors: services.sensors,
      requireAuth,
    })
  );

  // Error handling
  app.use(notFoundMiddleware);
  app.use(errorMiddleware);

  return app;
}
