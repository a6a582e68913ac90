import { logger } from './logger';

export interface ClosableServer {
  close(callback: (err?: Error) => void): unknown;
}

/**
 * Builds the SIGTERM/SIGINT handler. Only the first signal closes the server;
 * later ones are logged and ignored while the close is in flight.
 */
export function createShutdownHandler(
  server: ClosableServer,
  exit: (code: number) => void,
): (signal: NodeJS.Signals) => void {
  let shuttingDown = false;

  return (signal) => {
    if (shuttingDown) {
      logger.warn({ module: 'shutdown', signal }, 'Shutdown already in progress');
      return;
    }
    shuttingDown = true;

    logger.info({ module: 'shutdown', signal }, 'Shutting down...');
    server.close((err) => {
      if (err) {
        logger.error({ module: 'shutdown', error_message: err.message }, 'Error while closing server');
        exit(1);
        return;
      }
      exit(0);
    });
  };
}
