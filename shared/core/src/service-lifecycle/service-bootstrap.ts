/**
 * Service Bootstrap Utilities
 *
 * Shutdown handling and the entry-point wrapper shared by services.
 */

import type { Server } from 'http';
import { getErrorMessage } from '../error-handling';
import type { ILogger } from '../logging';

export interface ServiceShutdownConfig {
  logger: ILogger;
  /** Stop components and close connections */
  onShutdown: () => Promise<void>;
  serviceName: string;
  /** Force-exit after this long (default 10000) */
  shutdownTimeoutMs?: number;
  /** Replaces process.exit; tests pass a spy */
  exit?: (code: number) => void;
}

/**
 * Removes every handler setupServiceShutdown registered.
 */
export type ServiceShutdownCleanup = () => void;

export interface RunServiceMainConfig {
  main: () => Promise<void>;
  serviceName: string;
  logger?: ILogger;
}

/**
 * Register SIGTERM/SIGINT/uncaughtException handlers that run `onShutdown`
 * once, with a force-exit timer in case it hangs.
 */
export function setupServiceShutdown(config: ServiceShutdownConfig): ServiceShutdownCleanup {
  const { logger, onShutdown, serviceName, shutdownTimeoutMs = 10000 } = config;
  const exit = config.exit ?? ((code: number) => process.exit(code));

  let isShuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) {
      logger.debug(`Already shutting down ${serviceName}, ignoring ${signal}`);
      return;
    }
    isShuttingDown = true;

    logger.info(`Received ${signal}, shutting down ${serviceName} gracefully`);

    const forceExitTimer = setTimeout(() => {
      logger.error(`${serviceName} shutdown timed out after ${shutdownTimeoutMs}ms, forcing exit`);
      exit(1);
    }, shutdownTimeoutMs);
    forceExitTimer.unref();

    try {
      await onShutdown();
      clearTimeout(forceExitTimer);
      exit(0);
    } catch (error) {
      clearTimeout(forceExitTimer);
      logger.error(`Error during ${serviceName} shutdown`, {
        error: getErrorMessage(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      exit(1);
    }
  };

  const sigtermHandler = (): void => {
    void shutdown('SIGTERM');
  };
  const sigintHandler = (): void => {
    void shutdown('SIGINT');
  };
  const uncaughtHandler = (error: Error): void => {
    logger.error(`Uncaught exception in ${serviceName}`, { error: error.message, stack: error.stack });
    void shutdown('uncaughtException');
  };
  const rejectionHandler = (reason: unknown): void => {
    logger.error(`Unhandled rejection in ${serviceName}`, { reason: getErrorMessage(reason) });
  };

  process.on('SIGTERM', sigtermHandler);
  process.on('SIGINT', sigintHandler);
  process.on('uncaughtException', uncaughtHandler);
  process.on('unhandledRejection', rejectionHandler);

  return () => {
    process.off('SIGTERM', sigtermHandler);
    process.off('SIGINT', sigintHandler);
    process.off('uncaughtException', uncaughtHandler);
    process.off('unhandledRejection', rejectionHandler);
  };
}

/**
 * Run a service's main() with a top-level catch. Skipped under Jest so
 * importing an entry module in a test does not start the service.
 */
export function runServiceMain(config: RunServiceMainConfig): void {
  const { main, serviceName, logger } = config;

  if (process.env.JEST_WORKER_ID) {
    return;
  }

  main().catch((error: unknown) => {
    const message = `Unhandled error in ${serviceName}`;
    if (logger) {
      logger.error(message, { error: getErrorMessage(error) });
    } else {
      console.error(`${message}:`, error);
    }
    process.exit(1);
  });
}

/**
 * Close an HTTP server, giving up after `timeoutMs`.
 */
export async function closeServer(server: Server | null, timeoutMs = 5000): Promise<void> {
  if (!server) {
    return;
  }

  await new Promise<void>(resolve => {
    let resolved = false;
    const safeResolve = (): void => {
      if (!resolved) {
        resolved = true;
        resolve();
      }
    };

    const timer = setTimeout(safeResolve, timeoutMs);
    server.close(() => {
      clearTimeout(timer);
      safeResolve();
    });
  });
}
