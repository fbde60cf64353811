import logger from './logger';

/**
 * Signal constants for graceful shutdown.
 */
export const SIGTERM = Symbol('SIGTERM');
export const SIGINT = Symbol('SIGINT');

/**
 * Type representing a graceful shutdown signal.
 */
export type ShutdownSignal = typeof SIGTERM | typeof SIGINT;

/**
 * Optional callback to perform custom cleanup before process exit.
 * Called with the signal symbol that triggered it.
 */
export type OnShutdownCallback = (signal: ShutdownSignal) => Promise<void>;

/**
 * Register SIGTERM and SIGINT handlers for graceful shutdown.
 *
 * The first signal runs onShutdown and exits with 0, or 1 when cleanup
 * throws. A second signal while cleanup is still running exits at once
 * with 1, so a hung container stop can be interrupted with another Ctrl-C.
 *
 * Returns a function that unregisters the handlers.
 */
export const setupShutdownHandlers = (onShutdown?: OnShutdownCallback): (() => void) => {
  let shuttingDown = false;

  const handleSignal = (nodeSignal: NodeJS.Signals, shutdownSignal: ShutdownSignal) => {
    return async () => {
      if (shuttingDown) {
        logger.warn({ signal: nodeSignal }, 'Second signal received, exiting without cleanup');
        process.exit(1);
      }
      shuttingDown = true;
      logger.info({ signal: nodeSignal }, 'Signal received, initiating graceful shutdown');

      let exitCode = 0;
      try {
        if (onShutdown) await onShutdown(shutdownSignal);
      } catch (error) {
        exitCode = 1;
        logger.error({ err: error, signal: nodeSignal }, 'Error during shutdown');
      }

      process.exit(exitCode);
    };
  };

  const onTerm = handleSignal('SIGTERM', SIGTERM);
  const onInt = handleSignal('SIGINT', SIGINT);

  process.on('SIGTERM', onTerm);
  process.on('SIGINT', onInt);

  return () => {
    process.off('SIGTERM', onTerm);
    process.off('SIGINT', onInt);
  };
};
