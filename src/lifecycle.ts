import { Logger } from './utils/logger';
import { errorMessage } from './utils/AppError';

export type ExitFn = (code: number) => void;

/**
 * Last-resort handlers: anything that escapes a loop is logged, then the process exits with 1.
 */
export function installGlobalHandlers(
    logger: Logger,
    target: NodeJS.EventEmitter = process,
    exit: ExitFn = (code) => process.exit(code)
): void {
    target.on('uncaughtException', (err: Error) => {
        logger.critical(`Uncaught exception: ${err.message}`);
        logger.error(err.stack ?? '');
        logger.close();
        exit(1);
    });

    target.on('unhandledRejection', (reason: unknown) => {
        logger.critical(`Unhandled rejection: ${errorMessage(reason)}`);
        logger.close();
        exit(1);
    });
}

export function onShutdownSignal(handler: (signal: NodeJS.Signals) => void, target: NodeJS.EventEmitter = process): void {
    target.on('SIGINT', () => handler('SIGINT'));
    target.on('SIGTERM', () => handler('SIGTERM'));
}
