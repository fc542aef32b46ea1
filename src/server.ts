import { createApp } from './app';
import { config, getEnvironmentInfo } from './config';
import { createConfigChain, resolveLoggingSettings } from './config/logging';
import { ConfigPrecedenceEnforcer } from './config/precedence';
import { configureLogging, createLogger, describeError, diagnostics } from './observability';

const startServer = (): void => {
  try {
    // Lock the record schema and service identity before anything reads them
    const chain = createConfigChain();
    new ConfigPrecedenceEnforcer().enforce(chain);

    const settings = resolveLoggingSettings(chain);
    configureLogging({ settings });

    const log = createLogger('Server');
    const app = createApp({ settings });

    const server = app.listen(config.port, () => {
      diagnostics.info(getEnvironmentInfo(), 'Environment');
      log.info('Server running on port {}', config.port);
      log.info('Health check: http://localhost:{}/health', config.port);
    });

    // Graceful shutdown
    const shutdown = (signal: string): void => {
      log.info('{} received. Starting graceful shutdown...', signal);

      server.close((error) => {
        if (error) {
          log.error('Error during shutdown', error);
          process.exit(1);
        }
        log.info('Graceful shutdown completed');
        process.exit(0);
      });

      // Force exit after the shutdown timeout
      setTimeout(() => {
        log.error('Forced shutdown after {} ms', config.shutdownTimeoutMs);
        process.exit(1);
      }, config.shutdownTimeoutMs).unref();
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    diagnostics.fatal({ reason: describeError(error) }, 'Failed to start server');
    process.exit(1);
  }
};

startServer();
