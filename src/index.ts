import { ConfigOverrides, FileConfigLoader } from './config';
import { ExpressHttpServer } from './server';
import {
  ConfigError,
  displayStartupBanner,
  getErrorMessage,
  getLogger,
  getNetworkInfo,
  getVersion,
  initializeLogger,
} from './utils';

export interface RunServerOptions {
  configPath?: string;
  overrides?: ConfigOverrides;
}

/**
 * Load configuration, start the control server and wire shutdown signals.
 * Resolves once the server is listening.
 */
export async function runServer(options: RunServerOptions = {}): Promise<ExpressHttpServer> {
  const configLoader = new FileConfigLoader(options);
  const { config, warnings } = configLoader.load();

  initializeLogger({ level: config.logLevel });
  const logger = getLogger('main');

  for (const warning of warnings) {
    logger.warn(warning);
  }

  const server = new ExpressHttpServer({ config });

  let isShuttingDown = false;

  const shutdown = (signal: string): void => {
    if (isShuttingDown) {
      return;
    }
    isShuttingDown = true;

    logger.info('Shutting down...', { signal });
    server
      .stop()
      .then((result) => {
        if (result.success && 'stopped' in result) {
          logger.info('Stopped model', { model: result.stopped, name: result.name });
        }
        logger.info('Server stopped');
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error('Shutdown failed', { error: getErrorMessage(error) });
        process.exit(1);
      });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  await server.start();
  logger.info('Server started', {
    port: config.port,
    host: config.host,
    models: config.models.length,
    configPath: configLoader.getConfigPath(),
  });

  displayStartupBanner({
    version: getVersion(),
    port: config.port,
    apiKey: config.apiKey,
    network: getNetworkInfo(config.host, config.port),
  });

  return server;
}

/**
 * Print a fatal startup error. Configuration problems are listed one per line.
 */
export function reportStartupFailure(error: unknown): void {
  if (error instanceof ConfigError) {
    console.error('Configuration errors:');
    for (const problem of error.problems) {
      console.error(`   - ${problem}`);
    }
    console.error('\nPlease fix the errors in config.json and try again.\n');
    return;
  }

  console.error('Failed to start LLM Launcher:', getErrorMessage(error));
}

export * from './config';
export * from './supervisor';
export { ExpressHttpServer, createExpressApp, createControlPlane } from './server';
