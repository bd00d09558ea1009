import dotenv from 'dotenv';
import { createLogger, setDefaultLogLevel } from '@sensor-registry/shared-utils';
import { createApp } from './app';
import { loadConfig } from './config';
import { openDatabase } from './db';
import { createServices } from './services';

dotenv.config();

const logger = createLogger('Server');

async function main() {
  const config = loadConfig(process.env);
  setDefaultLogLevel(config.logLevel);

  const pool = await openDatabase({
    filename: config.databaseFile,
    poolMin: config.dbPoolMin,
    poolMax: config.dbPoolMax,
    acquireTimeoutMs: config.dbAcquireTimeoutMs,
    busyTimeoutMs: config.dbBusyTimeoutMs,
  });

  const app = createApp(createServices(pool, config), config);

  const server = app.listen(config.port, () => {
    logger.info(`HTTP server listening on port ${config.port} (${config.nodeEnv})`);
  });

  // Graceful shutdown
  const shutdown = async () => {
    logger.info('Shutting down...');
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await pool.close();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      logger.error('Shutdown failed', error);
      process.exit(1);
    });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((error: unknown) => {
  logger.error('Failed to start server', error);
  process.exit(1);
});
