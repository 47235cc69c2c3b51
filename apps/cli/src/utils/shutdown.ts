import { logger } from '@/ui/logger';
import { errorMessage } from './errors';

const shutdownHandlers = new Map<string, Array<() => Promise<void>>>();
const shutdownController = new AbortController();
let shutdownPromise: Promise<void> | null = null;

export const shutdownSignal = shutdownController.signal;

function runHandler(name: string, callback: () => Promise<void>): Promise<void> {
    return callback().then(
        () => {},
        (error: unknown) => logger.warn(`[SHUTDOWN] Handler ${name} failed: ${errorMessage(error)}`),
    );
}

export function onShutdown(name: string, callback: () => Promise<void>): () => void {
    if (shutdownSignal.aborted) {
        // Already shutting down: run it right away.
        void runHandler(name, callback);
        return () => {};
    }

    let handlers = shutdownHandlers.get(name);
    if (!handlers) {
        handlers = [];
        shutdownHandlers.set(name, handlers);
    }
    const list = handlers;
    list.push(callback);

    return () => {
        const index = list.indexOf(callback);
        if (index !== -1) {
            list.splice(index, 1);
            if (list.length === 0) {
                shutdownHandlers.delete(name);
            }
        }
    };
}

export function isShutdown(): boolean {
    return shutdownSignal.aborted;
}

async function runShutdownHandlers(trigger: string): Promise<void> {
    if (shutdownPromise) {
        return await shutdownPromise;
    }

    shutdownPromise = (async () => {
        logger.debug(`[SHUTDOWN] Initiated: ${trigger}`);
        shutdownController.abort();

        const pending: Promise<void>[] = [];
        for (const [name, handlers] of shutdownHandlers) {
            for (const handler of [...handlers]) {
                pending.push(runHandler(name, handler));
            }
        }

        if (pending.length > 0) {
            const startTime = Date.now();
            await Promise.all(pending);
            logger.debug(`[SHUTDOWN] ${pending.length} handler(s) completed in ${Date.now() - startTime}ms`);
        }
    })();

    return await shutdownPromise;
}

export async function initiateShutdown(trigger: string): Promise<void> {
    return await runShutdownHandlers(trigger);
}

/**
 * Resolves after SIGINT, SIGTERM or `initiateShutdown`, once every handler has run.
 */
export async function awaitShutdown(): Promise<void> {
    await new Promise<void>((resolve) => {
        if (shutdownSignal.aborted) {
            resolve();
            return;
        }

        const finish = () => {
            cleanup();
            resolve();
        };
        const onSigint = () => {
            logger.debug('[SHUTDOWN] Received SIGINT');
            finish();
        };
        const onSigterm = () => {
            logger.debug('[SHUTDOWN] Received SIGTERM');
            finish();
        };
        const cleanup = () => {
            shutdownSignal.removeEventListener('abort', finish);
            process.removeListener('SIGINT', onSigint);
            process.removeListener('SIGTERM', onSigterm);
        };

        shutdownSignal.addEventListener('abort', finish, { once: true });
        process.on('SIGINT', onSigint);
        process.on('SIGTERM', onSigterm);
    });
    await runShutdownHandlers('awaitShutdown');
}
