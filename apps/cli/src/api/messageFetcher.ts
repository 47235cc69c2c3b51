import type { CredentialStore } from '@/auth/credentialStore';
import { logger } from '@/ui/logger';
import { AuthError, FetchError, errorMessage } from '@/utils/errors';
import { AsyncLock } from '@/utils/lock';
import type { DedupLedger } from './dedupLedger';
import type { RelayApi } from './relayApi';
import { messageFromRelay, type Message } from './types';

export class MessageFetcher {
    private readonly lock = new AsyncLock();

    constructor(
        private readonly deps: {
            api: RelayApi;
            ledger: DedupLedger;
            credentials: CredentialStore;
        },
    ) {}

    /**
     * Pull everything the relay has queued for this device and return the
     * messages the ledger has not seen, oldest first. Runs are serialized.
     */
    async fetchPending(): Promise<Message[]> {
        return await this.lock.inLock(() => this.fetchOnce());
    }

    private async fetchOnce(): Promise<Message[]> {
        const credentials = await this.deps.credentials.getToken();
        if (!credentials) {
            throw new AuthError('No device credentials; run `pushwatch login` first');
        }

        let fetched: Message[];
        try {
            const raw = await this.deps.api.downloadMessages(credentials);
            fetched = raw.map(messageFromRelay).sort((a, b) => a.id - b.id);
        } catch (error) {
            if (error instanceof AuthError) throw error;
            throw new FetchError(`Failed to download messages: ${errorMessage(error)}`, { cause: error });
        }

        const accepted = fetched.filter((message) => this.deps.ledger.accept(message));
        try {
            await this.deps.ledger.flush();
        } catch (error) {
            throw new FetchError(`Failed to persist lastMessageId: ${errorMessage(error)}`, { cause: error });
        }

        const highest = fetched.at(-1);
        if (highest) {
            try {
                await this.deps.api.updateHighestMessage(credentials, highest.idStr);
            } catch (error) {
                // The ledger already keeps these from being shown twice.
                logger.warn(`[FETCHER] Delivery acknowledgment for ${highest.idStr} failed: ${errorMessage(error)}`);
            }
        }

        logger.debug(`[FETCHER] Fetched ${fetched.length}, accepted ${accepted.length}, lastMessageId=${this.deps.ledger.lastMessageId}`);
        return accepted;
    }
}
