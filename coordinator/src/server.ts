import { CoordinatorSystem } from './CoordinatorSystem';
import { loadConfig } from './config';
import { Logger } from './utils/Logger';

const logger = new Logger('Server');
const config = loadConfig();
const system = new CoordinatorSystem(config);

system.start(config.port).catch((error: unknown) => {
  logger.error('Failed to start gradient coordinator', error);
  process.exit(1);
});

const shutdown = (signal: string) => async (): Promise<void> => {
  logger.info(`Received ${signal}, shutting down gracefully...`);
  try {
    await system.stop();
    process.exit(0);
  } catch (error) {
    logger.error('Shutdown failed', error);
    process.exit(1);
  }
};

process.on('SIGINT', shutdown('SIGINT'));
process.on('SIGTERM', shutdown('SIGTERM'));
