import { createApp } from './app';
import { env } from './config';
import { healthService } from './services';
import { logger, Logging } from './utils';

/**
 * Start the HTTP server. There is nothing to connect to first: the
 * engine is in-process and stateless.
 */
const startServer = (): void => {
  try {
    const app = createApp();

    const server = app.listen(env.PORT, () => {
      const engine = healthService.getEngineInfo();

      Logging.box(
        '🚀 LEDGER RECONCILIATION',
        `Server started in ${env.NODE_ENV} mode`,
        `Dates ${engine.dateOrder}, currency ${engine.defaultCurrency}`,
        `Duplicate threshold ${engine.duplicateThreshold}, review below ${engine.needsReviewConfidence}`,
        `${engine.categories.length} categories, ${engine.riskRules.length} risk rules`
      );
      Logging.success(`Server listening on http://${env.HOST}:${env.PORT}`);
      Logging.info(`API available at http://${env.HOST}:${env.PORT}${env.API_PREFIX}`);
      Logging.info(`Health check at http://${env.HOST}:${env.PORT}${env.API_PREFIX}/health`);
      Logging.debug(`Risk rules: ${engine.riskRules.join(', ')}`);
    });

    // Graceful shutdown handler
    const gracefulShutdown = (signal: string): void => {
      logger.info(`\n${signal} received. Starting graceful shutdown...`);

      server.close((err) => {
        if (err) {
          logger.error('Error during server shutdown:', err);
          process.exit(1);
        }

        logger.info('Server closed successfully');
        process.exit(0);
      });

      // Force shutdown after 30 seconds
      setTimeout(() => {
        logger.error('Forced shutdown due to timeout');
        process.exit(1);
      }, 30000).unref();
    };

    // Handle termination signals
    process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
    process.on('SIGINT', () => gracefulShutdown('SIGINT'));

    // Handle uncaught exceptions
    process.on('uncaughtException', (err: Error) => {
      logger.error('Uncaught Exception:', err);
      process.exit(1);
    });

    // Handle unhandled promise rejections
    process.on('unhandledRejection', (reason: unknown) => {
      logger.error('Unhandled Rejection:', reason);
      process.exit(1);
    });
  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
};

// Start server
startServer();
