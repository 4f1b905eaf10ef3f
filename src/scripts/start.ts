// scripts/start.ts
import { startApp } from '../app';
import logger from '../utils/logging';

const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

startApp()
  .then(({ shutdown }) => {
    for (const signal of SHUTDOWN_SIGNALS) {
      process.once(signal, () => {
        shutdown(signal)
          .then(() => process.exit(0))
          .catch((error: Error) => {
            logger.error('Shutdown failed', { signal, error: error.message });
            process.exit(1);
          });
      });
    }
  })
  .catch((error: Error) => {
    logger.error('Failed to start Letter Services application', {
      error: error.message,
      stack: error.stack,
    });
    process.exit(1);
  });
