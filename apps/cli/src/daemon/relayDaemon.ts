import { DedupLedger, settingsLedgerStore, type LedgerStore } from '@/api/dedupLedger';
import { EmergencyAckLoop, settingsAckStore, type AckState, type AckStore } from '@/api/emergencyLoop';
import { MessageFetcher } from '@/api/messageFetcher';
import { relayApi, type RelayApi } from '@/api/relayApi';
import { TransportSession, type SessionTermination, type SocketFactory } from '@/api/transportSession';
import type { Message, SessionSnapshot } from '@/api/types';
import { SettingsCredentialStore, type CredentialStore } from '@/auth/credentialStore';
import { ConsoleNotificationSink, type NotificationSink } from '@/notifications/sink';
import { logger } from '@/ui/logger';

export type RelayDaemonOptions = {
    credentials?: CredentialStore;
    sink?: NotificationSink;
    api?: RelayApi;
    ledgerStore?: LedgerStore;
    ackStore?: AckStore;
    createSocket?: SocketFactory;
    /** User-facing notices for terminal outcomes. */
    notice?: (text: string) => void;
};

export type DaemonStatus = {
    session: SessionSnapshot;
    pendingAcks: AckState[];
};

const terminationNotices: Record<SessionTermination['kind'], string> = {
    'credentials-revoked': 'The relay revoked this device. Run `pushwatch login` to register it again.',
    'session-superseded': 'Another client logged in with this device. This one has stopped.',
    'auth-failed': 'The relay rejected the stored credentials. Run `pushwatch login` again.',
};

/**
 * Wires the session, fetcher, ledger and emergency loop together. Messages
 * flow session signal → fetcher → ledger → (loop | sink).
 */
export class RelayDaemon {
    readonly session: TransportSession;
    readonly loop: EmergencyAckLoop;
    private readonly fetcher: MessageFetcher;
    private readonly sink: NotificationSink;
    private readonly notice: (text: string) => void;
    private readonly termination: Promise<SessionTermination>;

    private constructor(ledger: DedupLedger, opts: RelayDaemonOptions) {
        const credentials = opts.credentials ?? new SettingsCredentialStore();
        const api = opts.api ?? relayApi;
        this.sink = opts.sink ?? new ConsoleNotificationSink();
        this.notice = opts.notice ?? ((text) => console.error(text));

        this.fetcher = new MessageFetcher({ api, ledger, credentials });
        this.loop = new EmergencyAckLoop({ sink: this.sink, api, credentials, store: opts.ackStore ?? settingsAckStore });
        this.session = new TransportSession({
            credentials,
            onSignal: () => this.fetchAndDeliver(),
            lastMessageId: () => ledger.lastMessageId,
            createSocket: opts.createSocket,
        });

        this.loop.on('expired', (state) => {
            logger.info(`[DAEMON] Emergency ${state.receiptId} expired unacknowledged`);
            this.notice(`Emergency "${state.message.title}" expired without acknowledgment.`);
        });
        this.loop.on('acknowledged', (state) => {
            logger.debug(`[DAEMON] Emergency ${state.receiptId} acknowledged`);
        });

        this.termination = new Promise((resolve) => {
            this.session.on('terminated', (termination) => {
                logger.error(`[DAEMON] Session ended (${termination.kind}): ${termination.error.message}`);
                this.notice(terminationNotices[termination.kind]);
                resolve(termination);
            });
        });
    }

    static async create(opts: RelayDaemonOptions = {}): Promise<RelayDaemon> {
        const ledger = await DedupLedger.load(opts.ledgerStore ?? settingsLedgerStore);
        return new RelayDaemon(ledger, opts);
    }

    /**
     * Resume pending emergencies, then connect. Fails only when there are no
     * credentials; connection problems are retried in the background.
     */
    async start(): Promise<void> {
        await this.loop.restore();
        await this.session.start();
    }

    async acknowledge(receiptId: string): Promise<void> {
        await this.loop.acknowledge(receiptId);
    }

    /** Resolves when the session ends for good. */
    terminated(): Promise<SessionTermination> {
        return this.termination;
    }

    status(): DaemonStatus {
        return {
            session: this.session.snapshot(),
            pendingAcks: this.loop.pending(),
        };
    }

    async stop(): Promise<void> {
        this.session.stop();
        await this.loop.stop();
        logger.debug('[DAEMON] Stopped');
    }

    private async fetchAndDeliver(): Promise<void> {
        const messages = await this.fetcher.fetchPending();
        for (const message of messages) {
            this.deliver(message);
        }
    }

    private deliver(message: Message): void {
        if (this.loop.track(message)) {
            return;
        }
        try {
            this.sink.display(message);
        } catch (error) {
            logger.warn(`[DAEMON] Sink failed to display message ${message.id}`, error);
        }
    }
}
