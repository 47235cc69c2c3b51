import { EventEmitter } from 'node:events';
import type { CredentialStore } from '@/auth/credentialStore';
import { configuration } from '@/configuration';
import type { NotificationSink } from '@/notifications/sink';
import { readPendingAcks, writePendingAcks } from '@/persistence';
import { logger } from '@/ui/logger';
import { AckError, errorMessage } from '@/utils/errors';
import type { RelayApi } from './relayApi';
import { isEmergency, type AckRecord, type Message } from './types';

/**
 * One unresolved emergency message.
 */
export type AckState = {
    receiptId: string;
    message: Message;
    acknowledged: boolean;
    nextRetryAt: number;
    expiresAt: number;
    retryIntervalMs: number;
};

export type EmergencyLoopEvents = {
    acknowledged: [state: AckState];
    expired: [state: AckState];
};

export interface AckStore {
    load(): Promise<AckRecord[]>;
    save(records: AckRecord[]): Promise<void>;
}

export const settingsAckStore: AckStore = {
    load: readPendingAcks,
    save: writePendingAcks,
};

export type EmergencyAckLoopOptions = {
    sink: NotificationSink;
    api: RelayApi;
    credentials: CredentialStore;
    store?: AckStore;
    now?: () => number;
    defaultRetryIntervalMs?: number;
    defaultExpireMs?: number;
};

type Tracked = AckState & { timer: NodeJS.Timeout | null };

/**
 * Re-alerts emergency messages until the user acknowledges them or they expire.
 *
 * Every receipt has its own timer. A fire re-checks that the receipt is still
 * tracked and unacknowledged before it displays anything.
 */
export class EmergencyAckLoop extends EventEmitter<EmergencyLoopEvents> {
    private readonly states = new Map<string, Tracked>();
    private readonly inFlight = new Map<string, Promise<void>>();
    private readonly store: AckStore;
    private readonly now: () => number;
    private persistChain: Promise<void> = Promise.resolve();
    private stopped = false;

    constructor(private readonly opts: EmergencyAckLoopOptions) {
        super();
        this.store = opts.store ?? settingsAckStore;
        this.now = opts.now ?? Date.now;
    }

    /**
     * Start re-alerting for `message`. Returns false for anything that is not
     * an unacknowledged emergency with a receipt, or a receipt already tracked.
     */
    track(message: Message): boolean {
        const receiptId = message.receiptId;
        if (this.stopped || !isEmergency(message) || message.acknowledged || !receiptId) {
            return false;
        }
        if (this.states.has(receiptId)) {
            return false;
        }

        const now = this.now();
        const retryIntervalMs = message.retryIntervalMs ?? this.opts.defaultRetryIntervalMs ?? configuration.emergencyRetryIntervalMs;
        const expiresAt = message.expiresAt ?? message.receivedAt + (this.opts.defaultExpireMs ?? configuration.emergencyExpireMs);
        const state: Tracked = {
            receiptId,
            message,
            acknowledged: false,
            nextRetryAt: now,
            expiresAt,
            retryIntervalMs,
            timer: null,
        };

        if (now >= expiresAt) {
            logger.info(`[EMERGENCY] Message ${message.id} (${receiptId}) arrived already expired`);
            this.emit('expired', toAckState(state));
            return false;
        }

        this.states.set(receiptId, state);
        logger.info(`[EMERGENCY] Tracking ${receiptId}: every ${retryIntervalMs}ms until ${new Date(expiresAt).toISOString()}`);
        this.display(state);
        this.persist();
        return true;
    }

    /**
     * Resume receipts saved by a previous run. Expired ones are surfaced and dropped.
     */
    async restore(records?: AckRecord[]): Promise<void> {
        const saved = records ?? (await this.store.load());
        const now = this.now();

        for (const record of saved) {
            if (this.states.has(record.receiptId)) continue;
            const state: Tracked = {
                receiptId: record.receiptId,
                message: Object.freeze({ ...record.message }),
                acknowledged: false,
                nextRetryAt: Math.max(now, record.nextRetryAt),
                expiresAt: record.expiresAt,
                retryIntervalMs: record.retryIntervalMs,
                timer: null,
            };
            if (now >= state.expiresAt) {
                logger.info(`[EMERGENCY] Restored receipt ${state.receiptId} has expired`);
                this.emit('expired', toAckState(state));
                continue;
            }
            this.states.set(state.receiptId, state);
            this.schedule(state);
        }

        if (saved.length > 0) {
            logger.debug(`[EMERGENCY] Restored ${this.states.size} of ${saved.length} pending receipt(s)`);
        }
        this.persist();
    }

    /**
     * Acknowledge upstream, then stop re-alerting. On failure the receipt stays
     * tracked and keeps re-alerting.
     */
    async acknowledge(receiptId: string): Promise<void> {
        const existing = this.inFlight.get(receiptId);
        if (existing) return await existing;

        const attempt = this.acknowledgeOnce(receiptId).finally(() => {
            this.inFlight.delete(receiptId);
        });
        this.inFlight.set(receiptId, attempt);
        return await attempt;
    }

    private async acknowledgeOnce(receiptId: string): Promise<void> {
        if (!this.states.has(receiptId)) {
            throw new AckError(receiptId, `Unknown receipt ${receiptId}`);
        }

        const credentials = await this.opts.credentials.getToken();
        if (!credentials) {
            throw new AckError(receiptId, 'No device credentials to acknowledge with');
        }

        try {
            await this.opts.api.acknowledgeReceipt(credentials, receiptId);
        } catch (error) {
            logger.warn(`[EMERGENCY] Acknowledgment of ${receiptId} failed: ${errorMessage(error)}`);
            throw new AckError(receiptId, `Acknowledgment of ${receiptId} failed: ${errorMessage(error)}`, { cause: error });
        }

        const state = this.states.get(receiptId);
        if (!state) {
            // Expired while the request was out.
            return;
        }
        state.acknowledged = true;
        this.clearTimer(state);
        this.states.delete(receiptId);
        this.persist();
        logger.info(`[EMERGENCY] Acknowledged ${receiptId}`);
        this.emit('acknowledged', toAckState(state));
    }

    pending(): AckState[] {
        return [...this.states.values()].map(toAckState);
    }

    /**
     * Cancel every timer and wait for pending writes. Receipts stay persisted
     * so the next run picks them up.
     */
    async stop(): Promise<void> {
        this.stopped = true;
        for (const state of this.states.values()) {
            this.clearTimer(state);
        }
        await this.persistChain;
    }

    /** Resolves once every queued write has landed. */
    async flush(): Promise<void> {
        await this.persistChain;
    }

    private display(state: Tracked): void {
        try {
            this.opts.sink.display(state.message);
        } catch (error) {
            logger.warn(`[EMERGENCY] Sink failed to display ${state.receiptId}: ${errorMessage(error)}`);
        }
        state.nextRetryAt = this.now() + state.retryIntervalMs;
        this.schedule(state);
    }

    private schedule(state: Tracked): void {
        this.clearTimer(state);
        const dueAt = Math.min(state.nextRetryAt, state.expiresAt);
        state.timer = setTimeout(() => this.fire(state.receiptId), Math.max(0, dueAt - this.now()));
    }

    private fire(receiptId: string): void {
        const state = this.states.get(receiptId);
        if (!state || state.acknowledged || this.stopped) {
            return;
        }
        state.timer = null;

        if (this.now() >= state.expiresAt) {
            this.states.delete(receiptId);
            this.persist();
            logger.info(`[EMERGENCY] Receipt ${receiptId} expired without acknowledgment`);
            this.emit('expired', toAckState(state));
            return;
        }

        this.display(state);
        this.persist();
    }

    private clearTimer(state: Tracked): void {
        if (state.timer) {
            clearTimeout(state.timer);
            state.timer = null;
        }
    }

    private persist(): void {
        const records = [...this.states.values()].map(toAckRecord);
        this.persistChain = this.persistChain
            .then(() => this.store.save(records))
            .catch((error: unknown) => {
                logger.warn(`[EMERGENCY] Failed to persist pending receipts: ${errorMessage(error)}`);
            });
    }
}

function toAckState(state: Tracked): AckState {
    return {
        receiptId: state.receiptId,
        message: state.message,
        acknowledged: state.acknowledged,
        nextRetryAt: state.nextRetryAt,
        expiresAt: state.expiresAt,
        retryIntervalMs: state.retryIntervalMs,
    };
}

function toAckRecord(state: Tracked): AckRecord {
    return {
        receiptId: state.receiptId,
        message: { ...state.message },
        nextRetryAt: state.nextRetryAt,
        expiresAt: state.expiresAt,
        retryIntervalMs: state.retryIntervalMs,
    };
}
