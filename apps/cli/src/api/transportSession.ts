/**
 * Persistent connection to the relay.
 *
 * The relay pushes one-byte control frames over a WebSocket; message content
 * is always pulled over REST. This class owns the socket and is the only
 * place that opens, drops or reopens it.
 */

import { EventEmitter } from 'node:events';
import WebSocket from 'ws';
import { encodeLoginFrame, parseRelayFrame, type RelayFrame } from '@pushwatch/protocol';
import type { CredentialStore } from '@/auth/credentialStore';
import { configuration } from '@/configuration';
import { logger } from '@/ui/logger';
import {
    AppError,
    AuthError,
    CredentialsRevokedError,
    ErrorCodes,
    NetworkError,
    SessionSupersededError,
    errorMessage,
} from '@/utils/errors';
import { Backoff, type BackoffOptions } from '@/utils/time';
import type { ConnectionState, Credentials, SessionSnapshot } from './types';

export type SocketHandlers = {
    onOpen: () => void;
    onFrame: (data: Uint8Array | string) => void;
    onClose: (code: number, reason: string) => void;
    onError: (error: Error) => void;
};

export type RelaySocket = {
    send(data: string): void;
    close(): void;
};

export type SocketFactory = (url: string, handlers: SocketHandlers, opts: { handshakeTimeoutMs: number }) => RelaySocket;

function toBytes(data: WebSocket.RawData): Uint8Array {
    if (Array.isArray(data)) return Buffer.concat(data);
    if (data instanceof ArrayBuffer) return new Uint8Array(data);
    return data;
}

export const createWebSocket: SocketFactory = (url, handlers, opts) => {
    const ws = new WebSocket(url, { handshakeTimeout: opts.handshakeTimeoutMs });
    ws.on('open', () => handlers.onOpen());
    ws.on('message', (data) => handlers.onFrame(toBytes(data)));
    ws.on('close', (code, reason) => handlers.onClose(code, reason.toString()));
    ws.on('error', (error) => handlers.onError(error));
    return {
        send: (data) => ws.send(data),
        close: () => ws.terminate(),
    };
};

export type TerminationKind = 'credentials-revoked' | 'session-superseded' | 'auth-failed';

export type SessionTermination = {
    kind: TerminationKind;
    error: AppError;
};

export type TransportSessionEvents = {
    stateChanged: [state: ConnectionState, previous: ConnectionState];
    authenticated: [];
    terminated: [termination: SessionTermination];
};

export type TransportSessionOptions = {
    credentials: CredentialStore;
    /** Runs on every new-message signal and after each authentication. */
    onSignal: () => Promise<void>;
    /** Reported through `snapshot()`. */
    lastMessageId?: () => number;
    createSocket?: SocketFactory;
    url?: string;
    handshakeTimeoutMs?: number;
    authGraceMs?: number;
    inactivityTimeoutMs?: number;
    reconnectBackoff?: BackoffOptions;
    fetchRetryBackoff?: BackoffOptions;
};

type PendingConnect = {
    resolve: () => void;
    reject: (error: AppError) => void;
};

export class TransportSession extends EventEmitter<TransportSessionEvents> {
    private token: Credentials | null = null;
    private state: ConnectionState = 'disconnected';
    private socket: RelaySocket | null = null;
    private generation = 0;
    private pendingConnect: PendingConnect | null = null;

    private handshakeTimer: NodeJS.Timeout | null = null;
    private graceTimer: NodeJS.Timeout | null = null;
    private inactivityTimer: NodeJS.Timeout | null = null;
    private reconnectTimer: NodeJS.Timeout | null = null;
    private fetchRetryTimer: NodeJS.Timeout | null = null;

    private readonly reconnectBackoff: Backoff;
    private readonly fetchBackoff: Backoff;
    private fetching = false;
    private fetchQueued = false;
    private terminated = false;
    private stopped = false;

    private readonly url: string;
    private readonly createSocket: SocketFactory;
    private readonly handshakeTimeoutMs: number;
    private readonly authGraceMs: number;
    private readonly inactivityTimeoutMs: number;

    constructor(private readonly opts: TransportSessionOptions) {
        super();
        this.url = opts.url ?? configuration.wsUrl;
        this.createSocket = opts.createSocket ?? createWebSocket;
        this.handshakeTimeoutMs = opts.handshakeTimeoutMs ?? configuration.handshakeTimeoutMs;
        this.authGraceMs = opts.authGraceMs ?? configuration.authGraceMs;
        this.inactivityTimeoutMs = opts.inactivityTimeoutMs ?? configuration.inactivityTimeoutMs;
        this.reconnectBackoff = new Backoff(opts.reconnectBackoff ?? {
            minDelayMs: configuration.reconnectMinDelayMs,
            maxDelayMs: configuration.reconnectMaxDelayMs,
        });
        this.fetchBackoff = new Backoff(opts.fetchRetryBackoff ?? {
            minDelayMs: configuration.fetchRetryMinDelayMs,
            maxDelayMs: configuration.fetchRetryMaxDelayMs,
        });
    }

    snapshot(): SessionSnapshot {
        return {
            token: this.token,
            connectionState: this.state,
            lastMessageId: this.opts.lastMessageId?.() ?? 0,
            retryCount: this.reconnectBackoff.attempts,
        };
    }

    /**
     * Load the stored credentials and connect, retrying transient failures
     * forever. Resolves after the first attempt settles.
     */
    async start(): Promise<void> {
        const token = await this.opts.credentials.getToken();
        if (!token) {
            throw new AppError(ErrorCodes.NOT_LOGGED_IN, 'No device credentials; run `pushwatch login` first');
        }
        this.stopped = false;
        this.token = token;
        await this.attempt();
    }

    /**
     * One connection attempt. Resolves once the relay has accepted the login.
     */
    connect(token: Credentials): Promise<void> {
        if (this.stopped) {
            return Promise.reject(new NetworkError('Session is stopped'));
        }

        this.clearReconnectTimer();
        this.dropSocket();
        this.rejectPending(new NetworkError('Replaced by a newer connection attempt'));
        this.token = token;
        this.terminated = false;
        const generation = ++this.generation;
        this.setState('connecting');
        logger.debug(`[SESSION] Connecting to ${this.url} (attempt ${this.reconnectBackoff.attempts + 1})`);

        return new Promise<void>((resolve, reject) => {
            this.pendingConnect = { resolve, reject };
            this.handshakeTimer = setTimeout(() => {
                this.failConnect(generation, new NetworkError(`Handshake with ${this.url} timed out after ${this.handshakeTimeoutMs}ms`));
            }, this.handshakeTimeoutMs);

            try {
                this.socket = this.createSocket(this.url, {
                    onOpen: () => this.handleOpen(generation),
                    onFrame: (data) => this.handleData(generation, data),
                    onClose: (code, reason) => this.handleClose(generation, `closed with code ${code}${reason ? ` (${reason})` : ''}`),
                    onError: (error) => this.handleClose(generation, `failed: ${error.message}`),
                }, { handshakeTimeoutMs: this.handshakeTimeoutMs });
            } catch (error) {
                this.failConnect(generation, new NetworkError(`Could not open ${this.url}: ${errorMessage(error)}`, { cause: error }));
            }
        });
    }

    /**
     * Close the connection for good. Pending timers are cancelled and no
     * reconnect follows.
     */
    stop(): void {
        this.stopped = true;
        this.clearReconnectTimer();
        this.clearFetchRetryTimer();
        this.dropSocket();
        this.rejectPending(new NetworkError('Session is stopped'));
        this.token = null;
        this.setState('disconnected');
        logger.debug('[SESSION] Stopped');
    }

    private async attempt(): Promise<void> {
        const token = this.token;
        if (!token) return;
        try {
            await this.connect(token);
        } catch (error) {
            if (error instanceof AppError && error.retryable) {
                logger.warn(`[SESSION] Connection attempt failed: ${error.message}`);
                this.scheduleReconnect();
                return;
            }
            // Terminal outcomes were already surfaced through `terminated`.
            logger.debug(`[SESSION] Connection attempt ended: ${errorMessage(error)}`);
        }
    }

    private handleOpen(generation: number): void {
        if (generation !== this.generation || !this.socket || !this.token) return;
        this.clearTimer('handshakeTimer');
        logger.debug('[SESSION] Socket open, sending login frame');
        this.socket.send(encodeLoginFrame(this.token.deviceId, this.token.secret));
        this.graceTimer = setTimeout(() => this.markAuthenticated(generation), this.authGraceMs);
    }

    private handleData(generation: number, data: Uint8Array | string): void {
        if (generation !== this.generation) return;
        const frame = parseRelayFrame(data);

        if (this.state !== 'connecting') {
            this.handleFrame(frame);
            return;
        }

        switch (frame.kind) {
            case 'session-superseded':
                this.terminate('session-superseded', new SessionSupersededError());
                return;
            case 'credentials-revoked':
                this.revokeToken();
                this.terminate('auth-failed', new AuthError('Relay rejected the login; log in again'));
                return;
            case 'reconnect':
                this.reconnectBackoff.reset();
                this.failConnect(generation, new NetworkError('Relay asked to reconnect during login'));
                return;
            case 'keep-alive':
            case 'new-message':
                // The first frame doubles as the login confirmation; the
                // catch-up fetch covers a new-message signal.
                this.markAuthenticated(generation);
                return;
            case 'unknown':
                this.markAuthenticated(generation);
                this.logUnknown(frame.raw);
                return;
        }
    }

    private handleFrame(frame: RelayFrame): void {
        this.resetInactivityTimer();
        switch (frame.kind) {
            case 'keep-alive':
                logger.debug('[SESSION] Keep-alive');
                return;
            case 'new-message':
                logger.debug('[SESSION] New message signal');
                this.signal();
                return;
            case 'reconnect':
                logger.info('[SESSION] Relay requested a reconnect');
                this.dropSocket();
                this.setState('disconnected');
                this.reconnectBackoff.reset();
                this.scheduleReconnect();
                return;
            case 'credentials-revoked':
                this.revokeToken();
                this.terminate('credentials-revoked', new CredentialsRevokedError());
                return;
            case 'session-superseded':
                this.terminate('session-superseded', new SessionSupersededError());
                return;
            case 'unknown':
                this.logUnknown(frame.raw);
                return;
        }
    }

    private handleClose(generation: number, reason: string): void {
        if (generation !== this.generation || this.terminated || this.stopped) return;

        if (this.pendingConnect) {
            this.failConnect(generation, new NetworkError(`Connection ${reason} before login completed`));
            return;
        }

        logger.warn(`[SESSION] Connection ${reason}`);
        this.dropSocket();
        this.setState('disconnected');
        this.scheduleReconnect();
    }

    private markAuthenticated(generation: number): void {
        if (generation !== this.generation || this.state !== 'connecting') return;
        this.clearTimer('graceTimer');
        this.clearTimer('handshakeTimer');
        this.reconnectBackoff.reset();

        this.setState('authenticated');
        const pending = this.pendingConnect;
        this.pendingConnect = null;
        pending?.resolve();
        logger.info('[SESSION] Connected and authenticated');
        this.emit('authenticated');

        this.resetInactivityTimer();
        this.setState('idle');
        this.signal();
    }

    private failConnect(generation: number, error: AppError): void {
        if (generation !== this.generation) return;
        this.dropSocket();
        this.setState('disconnected');
        this.rejectPending(error);
    }

    /**
     * Ends the session without a reconnect. Surfaces at most once per connect.
     */
    private terminate(kind: TerminationKind, error: AppError): void {
        if (this.terminated) return;
        this.terminated = true;
        this.clearReconnectTimer();
        this.clearFetchRetryTimer();
        this.dropSocket();
        this.setState('disconnected');
        this.rejectPending(error);
        logger.warn(`[SESSION] Terminated (${kind}): ${error.message}`);
        this.emit('terminated', { kind, error });
    }

    private revokeToken(): void {
        this.token = null;
        void this.opts.credentials.clearToken().then(
            () => logger.info('[SESSION] Cleared revoked credentials'),
            (error: unknown) => logger.error(`[SESSION] Failed to clear revoked credentials: ${errorMessage(error)}`),
        );
    }

    private scheduleReconnect(): void {
        if (this.stopped || this.terminated || this.reconnectTimer || this.socket || this.pendingConnect) return;
        const delayMs = this.reconnectBackoff.next();
        logger.debug(`[SESSION] Reconnecting in ${delayMs}ms (failure ${this.reconnectBackoff.attempts})`);
        this.reconnectTimer = setTimeout(() => {
            this.reconnectTimer = null;
            void this.attempt();
        }, delayMs);
    }

    private signal(): void {
        if (this.state !== 'idle' && this.state !== 'signaled') return;
        this.setState('signaled');
        if (this.fetching) {
            this.fetchQueued = true;
            return;
        }
        this.clearFetchRetryTimer();
        void this.runFetch();
    }

    private async runFetch(): Promise<void> {
        this.fetching = true;
        try {
            do {
                this.fetchQueued = false;
                await this.opts.onSignal();
            } while (this.fetchQueued && !this.terminated && !this.stopped);
            this.fetchBackoff.reset();
        } catch (error) {
            if (error instanceof AuthError) {
                this.terminate('auth-failed', error);
                return;
            }
            if (this.stopped || this.terminated) {
                logger.debug(`[SESSION] Fetch failed after the session ended: ${errorMessage(error)}`);
                return;
            }
            const delayMs = this.fetchBackoff.next();
            logger.warn(`[SESSION] Fetch failed, retrying in ${delayMs}ms: ${errorMessage(error)}`);
            this.fetchRetryTimer = setTimeout(() => {
                this.fetchRetryTimer = null;
                this.signal();
            }, delayMs);
        } finally {
            this.fetching = false;
            if (this.state === 'signaled') this.setState('idle');
        }
    }

    private resetInactivityTimer(): void {
        this.clearTimer('inactivityTimer');
        this.inactivityTimer = setTimeout(() => {
            this.inactivityTimer = null;
            logger.warn(`[SESSION] No frame for ${this.inactivityTimeoutMs}ms, reconnecting`);
            this.dropSocket();
            this.setState('disconnected');
            this.scheduleReconnect();
        }, this.inactivityTimeoutMs);
    }

    private dropSocket(): void {
        this.clearTimer('handshakeTimer');
        this.clearTimer('graceTimer');
        this.clearTimer('inactivityTimer');
        const socket = this.socket;
        if (!socket) return;
        this.socket = null;
        this.generation += 1;
        try {
            socket.close();
        } catch (error) {
            logger.debug(`[SESSION] Error closing socket: ${errorMessage(error)}`);
        }
    }

    private rejectPending(error: AppError): void {
        const pending = this.pendingConnect;
        this.pendingConnect = null;
        pending?.reject(error);
    }

    private setState(next: ConnectionState): void {
        if (next === this.state) return;
        const previous = this.state;
        this.state = next;
        logger.debug(`[SESSION] ${previous} -> ${next}`);
        this.emit('stateChanged', next, previous);
    }

    private logUnknown(raw: string): void {
        logger.warn(`[SESSION] Ignoring unknown frame ${JSON.stringify(raw)}`);
    }

    private clearTimer(name: 'handshakeTimer' | 'graceTimer' | 'inactivityTimer'): void {
        const timer = this[name];
        if (timer) {
            clearTimeout(timer);
            this[name] = null;
        }
    }

    private clearReconnectTimer(): void {
        if (this.reconnectTimer) {
            clearTimeout(this.reconnectTimer);
            this.reconnectTimer = null;
        }
    }

    private clearFetchRetryTimer(): void {
        if (this.fetchRetryTimer) {
            clearTimeout(this.fetchRetryTimer);
            this.fetchRetryTimer = null;
        }
    }
}
