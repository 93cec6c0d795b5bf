import { loadConfig } from './config.js';
import { logger } from './log.js';
import { startServer } from './server.js';
import { StyleCatalog } from './styles.js';

const config = loadConfig();
logger.level = config.logLevel;

const catalog = StyleCatalog.load(config.stylesPath);
logger.info({ styles: catalog.ids(), path: config.stylesPath }, 'Style catalog loaded');

const server = await startServer({ config, catalog });

async function shutdown(signal: string): Promise<void> {
  logger.info({ signal }, 'Shutting down');
  await server.close();
  process.exit(0);
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      logger.fatal({ err }, 'Shutdown failed');
      process.exit(1);
    });
  });
}
