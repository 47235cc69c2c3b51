import { readLastMessageId, writeLastMessageId } from '@/persistence';
import { logger } from '@/ui/logger';
import type { Message } from './types';

/**
 * Where the ledger keeps its high-water mark between runs.
 */
export interface LedgerStore {
    read(): Promise<number>;
    /** Returns the value actually stored, which never goes down. */
    write(lastMessageId: number): Promise<number>;
}

export const settingsLedgerStore: LedgerStore = {
    read: readLastMessageId,
    write: writeLastMessageId,
};

/**
 * Gate between fetched messages and the notification sink: a message passes
 * only if its id is above every id that passed before it.
 */
export class DedupLedger {
    private persisted: number;

    private constructor(
        private readonly store: LedgerStore,
        private current: number,
    ) {
        this.persisted = current;
    }

    static async load(store: LedgerStore = settingsLedgerStore): Promise<DedupLedger> {
        const lastMessageId = await store.read();
        logger.debug(`[LEDGER] Loaded lastMessageId=${lastMessageId}`);
        return new DedupLedger(store, lastMessageId);
    }

    get lastMessageId(): number {
        return this.current;
    }

    accept(message: Pick<Message, 'id'>): boolean {
        if (message.id <= this.current) {
            logger.debug(`[LEDGER] Dropping message ${message.id} (lastMessageId=${this.current})`);
            return false;
        }
        this.current = message.id;
        return true;
    }

    /**
     * Persist the mark. If the write fails the in-memory mark falls back to
     * the last stored value, so the same messages pass again on the next fetch.
     */
    async flush(): Promise<void> {
        if (this.current === this.persisted) return;
        let stored: number;
        try {
            stored = await this.store.write(this.current);
        } catch (error) {
            logger.warn(`[LEDGER] Failed to store lastMessageId=${this.current}, rolling back to ${this.persisted}`);
            this.current = this.persisted;
            throw error;
        }
        this.persisted = stored;
        // Another writer may have moved the stored value past us.
        if (stored > this.current) this.current = stored;
    }
}
