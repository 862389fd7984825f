import type { Server } from 'http';
import { config } from './config';
import DatabaseConnection from './config/database';
import { createApp } from './app';
import { createAssistant } from './container';
import { seedCatalog } from './services/catalog/defaultServices';
import { log } from './utils/logger';

async function startServer(): Promise<Server> {
  const dbConnection = DatabaseConnection.getInstance();
  if (config.storage === 'mongo' && config.mongoUri) {
    await dbConnection.connect(config.mongoUri);
  }

  const { assistant, repositories } = createAssistant(config);
  const seeded = await seedCatalog(repositories.catalog);
  if (seeded > 0) {
    log.info({ count: seeded }, 'Seeded default services');
  }

  const healthProbe = async () => (config.storage === 'mongo' ? dbConnection.healthCheck() : null);
  const app = createApp(assistant, healthProbe);

  return app.listen(config.port, () => {
    log.info({ port: config.port, storage: config.storage }, 'Booking assistant backend running');
  });
}

function registerShutdown(server: Server): void {
  const shutdown = (signal: string) => {
    log.info({ signal }, 'Shutting down gracefully');
    server.close(() => {
      DatabaseConnection.getInstance()
        .disconnect()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          log.error({ err: error }, 'Error during shutdown');
          process.exit(1);
        });
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

startServer()
  .then(registerShutdown)
  .catch((error: unknown) => {
    log.error({ err: error }, 'Failed to start server');
    process.exit(1);
  });
