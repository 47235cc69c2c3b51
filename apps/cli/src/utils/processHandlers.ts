import { logger } from '@/ui/logger';
import { errorMessage } from './errors';
import { initiateShutdown } from './shutdown';

let installed = false;
let fatalInProgress = false;

export function registerProcessHandlers(): void {
    if (installed) {
        return;
    }
    installed = true;

    process.on('uncaughtException', (error) => {
        void handleFatal('uncaughtException', error);
    });

    process.on('unhandledRejection', (reason) => {
        void handleFatal('unhandledRejection', reason);
    });

    process.on('warning', (warning) => {
        logger.warn(`[PROCESS] ${warning.name}: ${warning.message}`);
    });

    process.on('exit', (code) => {
        if (code !== 0) {
            logger.error(`[PROCESS] Exiting with code ${code}`);
        } else {
            logger.debug('[PROCESS] Exiting normally');
        }
    });
}

async function handleFatal(type: 'uncaughtException' | 'unhandledRejection', reason: unknown): Promise<void> {
    if (fatalInProgress) {
        logger.warn(`[PROCESS] Suppressed ${type} while already handling a fatal error: ${errorMessage(reason)}`);
        return;
    }
    fatalInProgress = true;

    const label = type === 'uncaughtException' ? 'Uncaught exception' : 'Unhandled rejection';
    logger.error(`[PROCESS] ${label}: ${errorMessage(reason)}`, reason instanceof Error ? reason.stack : undefined);
    process.exitCode = 1;

    try {
        await initiateShutdown(`fatal:${type}`);
    } catch (error) {
        logger.error(`[PROCESS] Shutdown after fatal error failed: ${errorMessage(error)}`);
    }

    const shouldExit =
        process.env.PUSHWATCH_EXIT_ON_FATAL !== '0' &&
        process.env.PUSHWATCH_EXIT_ON_FATAL !== 'false' &&
        process.env.NODE_ENV !== 'test';

    if (shouldExit) {
        process.exit(1);
    }

    fatalInProgress = false;
}
