import type { Storage } from './repositories';
import type { Logger } from './types/logger';

/** The part of `http.Server` that shutdown needs. */
export interface ClosableServer {
  close(callback: (error?: Error) => void): unknown;
}

/** Stops accepting connections and resolves once in-flight requests have finished. */
export function closeServer(server: ClosableServer): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

/**
 * Builds the signal handler: the HTTP server drains first, and only then is
 * storage closed, so requests still being answered keep their connections.
 */
export function createShutdown(server: ClosableServer, storage: Pick<Storage, 'close'>, logger: Logger) {
  return async (signal: string) => {
    logger.log(`${signal} received, shutting down`);
    try {
      await closeServer(server);
    } finally {
      await storage.close();
    }
    logger.log('👋 Server closed');
  };
}
