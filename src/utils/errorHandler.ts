import { Logger } from './logger.js';
import { AppError } from '../types/errors.js';

type ShutdownHook = (signal: NodeJS.Signals) => void;

export class ErrorHandler {
  private static shutdownHooks = new Set<ShutdownHook>();
  private static signalCount = 0;

  static handle(error: unknown): void {
    if (error instanceof AppError) {
      Logger.error(error.message, {
        name: error.name,
        statusCode: error.statusCode,
        isOperational: error.isOperational,
        context: error.context,
        stack: error.stack,
      });

      // Exit for non-operational errors
      if (!error.isOperational) {
        process.exit(1);
      }
      process.exitCode = 1;
    } else if (error instanceof Error) {
      Logger.error(`Unexpected error: ${error.message}`, {
        name: error.name,
        stack: error.stack,
      });
      process.exit(1);
    } else {
      Logger.error('Unknown error occurred', { error });
      process.exit(1);
    }
  }

  /**
   * Registers a callback run on the first SIGINT/SIGTERM. Workflows use it to
   * stop between units and write a final checkpoint. Returns an unregister function.
   */
  static onShutdown(hook: ShutdownHook): () => void {
    ErrorHandler.shutdownHooks.add(hook);
    return () => {
      ErrorHandler.shutdownHooks.delete(hook);
    };
  }

  private static handleSignal(signal: NodeJS.Signals): void {
    ErrorHandler.signalCount++;

    if (ErrorHandler.signalCount === 1 && ErrorHandler.shutdownHooks.size > 0) {
      Logger.info(`${signal} received, finishing current unit before stopping (repeat to force exit)`);
      for (const hook of ErrorHandler.shutdownHooks) {
        hook(signal);
      }
      return;
    }

    Logger.info(`${signal} received, shutting down`);
    process.exit(signal === 'SIGINT' ? 130 : 0);
  }

  static setupGlobalHandlers(): void {
    process.on('uncaughtException', (error) => {
      Logger.error('Uncaught Exception:', { error: error.message, stack: error.stack });
      process.exit(1);
    });

    process.on('unhandledRejection', (reason) => {
      Logger.error('Unhandled Rejection:', { reason });
      process.exit(1);
    });

    process.on('SIGTERM', () => ErrorHandler.handleSignal('SIGTERM'));
    process.on('SIGINT', () => ErrorHandler.handleSignal('SIGINT'));
  }
}
