import { loadConfig } from './config';
import { createApp } from './app';
import { createRosterReportService } from './services/rosterReportService';
import { logger } from './utils/logger';

const startServer = () => {
  try {
    const config = loadConfig();
    const service = createRosterReportService(config);
    const app = createApp(config, service);

    app.listen(config.port, () => {
      logger.info(`Server is running on port ${config.port}`);
      logger.info(`API version: ${config.apiVersion}`);
      logger.info(`Environment: ${config.nodeEnv}`);
      logger.info(`CORS origin: ${config.corsOrigin}`);
    });
  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
};

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled Rejection:', reason);
  if (process.env.NODE_ENV !== 'production') {
    process.exit(1);
  }
});

// Handle uncaught exceptions
process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught Exception:', error);
  // Exit the process as the application is in an undefined state
  process.exit(1);
});

// Graceful shutdown
process.on('SIGTERM', () => {
  logger.info('SIGTERM signal received: closing HTTP server');
  process.exit(0);
});

process.on('SIGINT', () => {
  logger.info('SIGINT signal received: closing HTTP server');
  process.exit(0);
});

startServer();
