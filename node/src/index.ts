import { createApp } from '@/app';
import { getConfig } from '@/config/accessors';
import { logger } from '@/services/logger';
import {
  setServerInstance,
  setupGracefulShutdown,
  setupUncaughtExceptionHandler,
  setupUnhandledRejectionHandler,
} from '@/stability/errorHandlers';
import { errorMessage } from '@/utils/errors';

// Setup global error handlers (before server start)
setupUnhandledRejectionHandler();
setupUncaughtExceptionHandler();
setupGracefulShutdown();

const startServer = () => {
  try {
    const config = getConfig();
    const app = createApp(config);

    const server = app.listen(config.port, () => {
      logger.info('server:listening', {
        url: `http://localhost:${config.port}`,
        environment: config.nodeEnv,
        model: config.model.model,
        modelBaseURL: config.model.baseURL,
        search: config.search.provider,
      });
    });
    // research runs outlive the default 5 minute request timeout
    server.requestTimeout = 0;
    setServerInstance(server);
  } catch (error) {
    logger.fatal('server:start_failed', { error: errorMessage(error) });
    process.exit(1);
  }
};

startServer();
