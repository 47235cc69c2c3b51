import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { MemoryCredentialStore } from '@/auth/credentialStore';
import { AuthError, FetchError, NetworkError, SessionSupersededError } from '@/utils/errors';
import { TransportSession, type RelaySocket, type SessionTermination, type SocketHandlers } from './transportSession';
import type { ConnectionState } from './types';

const token = { secret: 'test-secret', deviceId: 'device-1' };

class FakeSocket implements RelaySocket {
    readonly sent: string[] = [];
    closed = false;

    constructor(
        readonly url: string,
        readonly openedAt: number,
        private readonly handlers: SocketHandlers,
    ) {}

    send(data: string): void {
        this.sent.push(data);
    }

    close(): void {
        this.closed = true;
    }

    open(): void {
        this.handlers.onOpen();
    }

    frame(data: string): void {
        this.handlers.onFrame(Buffer.from(data, 'latin1'));
    }

    fail(code = 1006): void {
        this.handlers.onClose(code, '');
    }
}

function setup(opts: { onSignal?: () => Promise<void> } = {}) {
    const sockets: FakeSocket[] = [];
    const credentials = new MemoryCredentialStore(token);
    const onSignal = vi.fn(opts.onSignal ?? (async () => {}));
    const session = new TransportSession({
        credentials,
        onSignal,
        lastMessageId: () => 17,
        url: 'wss://relay.test/push',
        createSocket: (url, handlers) => {
            const socket = new FakeSocket(url, Date.now(), handlers);
            sockets.push(socket);
            return socket;
        },
        handshakeTimeoutMs: 10_000,
        authGraceMs: 2_000,
        inactivityTimeoutMs: 60_000,
        reconnectBackoff: { minDelayMs: 1_000, maxDelayMs: 60_000, jitter: 0 },
        fetchRetryBackoff: { minDelayMs: 2_000, maxDelayMs: 60_000, jitter: 0 },
    });

    const states: ConnectionState[] = [];
    const terminations: SessionTermination[] = [];
    session.on('stateChanged', (state) => states.push(state));
    session.on('terminated', (termination) => terminations.push(termination));

    const latest = (): FakeSocket => {
        const socket = sockets.at(-1);
        if (!socket) throw new Error('no socket opened');
        return socket;
    };

    return { session, sockets, credentials, onSignal, states, terminations, latest };
}

async function authenticate(ctx: ReturnType<typeof setup>): Promise<void> {
    const connecting = ctx.session.connect(token);
    ctx.latest().open();
    ctx.latest().frame('#');
    await connecting;
}

describe('TransportSession', () => {
    beforeEach(() => {
        vi.useFakeTimers();
        vi.setSystemTime(0);
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it('sends the login frame and authenticates on the first frame', async () => {
        const ctx = setup();

        await authenticate(ctx);
        await vi.advanceTimersByTimeAsync(0);

        expect(ctx.sockets[0]?.url).toBe('wss://relay.test/push');
        expect(ctx.sockets[0]?.sent).toEqual(['login:device-1:test-secret\n']);
        expect(ctx.states).toEqual(['connecting', 'authenticated', 'idle', 'signaled', 'idle']);
        expect(ctx.onSignal).toHaveBeenCalledTimes(1);
        expect(ctx.session.snapshot()).toEqual({ token, connectionState: 'idle', lastMessageId: 17, retryCount: 0 });
    });

    it('authenticates once the grace period passes without a rejection', async () => {
        const ctx = setup();
        const authenticated = vi.fn();
        ctx.session.on('authenticated', authenticated);

        const connecting = ctx.session.connect(token);
        ctx.latest().open();
        await vi.advanceTimersByTimeAsync(1_999);
        expect(ctx.session.snapshot().connectionState).toBe('connecting');

        await vi.advanceTimersByTimeAsync(1);
        await connecting;
        expect(authenticated).toHaveBeenCalledTimes(1);
    });

    it('stops for good when superseded while connecting', async () => {
        const ctx = setup();
        const connecting = ctx.session.connect(token);
        ctx.latest().open();

        ctx.latest().frame('A');

        await expect(connecting).rejects.toBeInstanceOf(SessionSupersededError);
        expect(ctx.session.snapshot().connectionState).toBe('disconnected');
        expect(ctx.terminations.map((t) => t.kind)).toEqual(['session-superseded']);

        // A late frame on the dropped socket changes nothing.
        ctx.sockets[0]?.frame('A');
        await vi.advanceTimersByTimeAsync(600_000);
        expect(ctx.sockets).toHaveLength(1);
        expect(ctx.terminations).toHaveLength(1);
        expect(ctx.sockets[0]?.closed).toBe(true);
    });

    it('clears the stored token when the relay revokes the credentials', async () => {
        const ctx = setup();
        await authenticate(ctx);

        ctx.latest().frame('E');
        await vi.advanceTimersByTimeAsync(0);

        expect(await ctx.credentials.getToken()).toBeNull();
        expect(ctx.terminations.map((t) => t.kind)).toEqual(['credentials-revoked']);
        expect(ctx.session.snapshot().token).toBeNull();

        await vi.advanceTimersByTimeAsync(600_000);
        expect(ctx.sockets).toHaveLength(1);
    });

    it('fails the login with AuthError on an error frame while connecting', async () => {
        const ctx = setup();
        const connecting = ctx.session.connect(token);
        ctx.latest().open();

        ctx.latest().frame('E');

        await expect(connecting).rejects.toBeInstanceOf(AuthError);
        expect(ctx.terminations.map((t) => t.kind)).toEqual(['auth-failed']);
    });

    it('rejects with NetworkError when the handshake times out', async () => {
        const ctx = setup();
        const connecting = ctx.session.connect(token);
        const outcome = connecting.catch((e: unknown) => e);

        await vi.advanceTimersByTimeAsync(10_000);

        expect(await outcome).toBeInstanceOf(NetworkError);
        expect(ctx.sockets[0]?.closed).toBe(true);
    });

    it('reconnects after the keep-alive goes silent', async () => {
        const ctx = setup();
        await authenticate(ctx);

        await vi.advanceTimersByTimeAsync(59_999);
        expect(ctx.sockets[0]?.closed).toBe(false);

        await vi.advanceTimersByTimeAsync(1);
        expect(ctx.sockets[0]?.closed).toBe(true);
        expect(ctx.session.snapshot().connectionState).toBe('disconnected');

        await vi.advanceTimersByTimeAsync(1_000);
        expect(ctx.sockets).toHaveLength(2);
        expect(ctx.sockets[1]?.openedAt).toBe(61_000);
    });

    it('keeps the connection while keep-alives arrive', async () => {
        const ctx = setup();
        await authenticate(ctx);

        for (let i = 0; i < 4; i++) {
            await vi.advanceTimersByTimeAsync(30_000);
            ctx.latest().frame('#');
        }

        expect(ctx.sockets).toHaveLength(1);
        expect(ctx.sockets[0]?.closed).toBe(false);
    });

    it('backs off on consecutive failures and resets after authenticating', async () => {
        const ctx = setup();

        const started = ctx.session.start();
        await vi.advanceTimersByTimeAsync(0);
        ctx.latest().fail();
        await started;

        await vi.advanceTimersByTimeAsync(1_000);
        ctx.latest().fail();
        await vi.advanceTimersByTimeAsync(2_000);
        ctx.latest().fail();
        await vi.advanceTimersByTimeAsync(4_000);
        expect(ctx.session.snapshot().retryCount).toBe(3);

        ctx.latest().open();
        ctx.latest().frame('#');
        await vi.advanceTimersByTimeAsync(0);
        expect(ctx.session.snapshot().retryCount).toBe(0);

        ctx.latest().fail();
        await vi.advanceTimersByTimeAsync(1_000);

        expect(ctx.sockets.map((s) => s.openedAt)).toEqual([0, 1_000, 3_000, 7_000, 8_000]);
    });

    it('reconnects at the minimum delay when the relay asks to', async () => {
        const ctx = setup();
        await authenticate(ctx);

        ctx.latest().frame('R');
        expect(ctx.sockets[0]?.closed).toBe(true);
        await vi.advanceTimersByTimeAsync(1_000);

        expect(ctx.sockets.map((s) => s.openedAt)).toEqual([0, 1_000]);
    });

    it('coalesces signals that arrive while a fetch runs', async () => {
        let finish: () => void = () => {};
        const ctx = setup({
            onSignal: () => new Promise<void>((resolve) => {
                finish = resolve;
            }),
        });
        await authenticate(ctx);

        ctx.latest().frame('!');
        ctx.latest().frame('!');
        ctx.latest().frame('!');
        expect(ctx.onSignal).toHaveBeenCalledTimes(1);

        finish();
        await vi.advanceTimersByTimeAsync(0);
        expect(ctx.onSignal).toHaveBeenCalledTimes(2);

        finish();
        await vi.advanceTimersByTimeAsync(0);
        expect(ctx.onSignal).toHaveBeenCalledTimes(2);
        expect(ctx.session.snapshot().connectionState).toBe('idle');
    });

    it('retries a failed fetch with its own backoff', async () => {
        const ctx = setup();
        ctx.onSignal.mockRejectedValueOnce(new FetchError('Failed to download messages: timeout'));
        await authenticate(ctx);
        await vi.advanceTimersByTimeAsync(0);
        expect(ctx.onSignal).toHaveBeenCalledTimes(1);

        await vi.advanceTimersByTimeAsync(2_000);

        expect(ctx.onSignal).toHaveBeenCalledTimes(2);
        expect(ctx.sockets).toHaveLength(1);
    });

    it('leaves no retry timer behind when a fetch fails after stop', async () => {
        let fail: (error: Error) => void = () => {};
        const ctx = setup({
            onSignal: () => new Promise<void>((_resolve, reject) => {
                fail = reject;
            }),
        });
        await authenticate(ctx);
        expect(ctx.onSignal).toHaveBeenCalledTimes(1);

        ctx.session.stop();
        fail(new FetchError('Failed to download messages: socket hang up'));
        await vi.advanceTimersByTimeAsync(0);

        expect(vi.getTimerCount()).toBe(0);
        await vi.advanceTimersByTimeAsync(600_000);
        expect(ctx.onSignal).toHaveBeenCalledTimes(1);
    });

    it('treats an AuthError from the fetch path as terminal', async () => {
        const ctx = setup();
        ctx.onSignal.mockRejectedValueOnce(new AuthError('secret is invalid'));
        await authenticate(ctx);
        await vi.advanceTimersByTimeAsync(0);

        expect(ctx.terminations.map((t) => t.kind)).toEqual(['auth-failed']);
        expect(ctx.sockets[0]?.closed).toBe(true);

        await vi.advanceTimersByTimeAsync(600_000);
        expect(ctx.sockets).toHaveLength(1);
    });

    it('does not reconnect after stop', async () => {
        const ctx = setup();
        await authenticate(ctx);

        ctx.session.stop();
        await vi.advanceTimersByTimeAsync(600_000);

        expect(ctx.sockets).toHaveLength(1);
        expect(ctx.session.snapshot()).toEqual({ token: null, connectionState: 'disconnected', lastMessageId: 17, retryCount: 0 });
    });
});
