/**
 * Global configuration for the pushwatch client.
 * Everything is read from the environment once, at import time.
 */

import { existsSync, mkdirSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

function readNumber(name: string, fallback: number): number {
    const raw = process.env[name];
    if (!raw) return fallback;
    const parsed = Number(raw);
    return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

function expandHome(path: string): string {
    return path.startsWith('~') ? join(homedir(), path.slice(1)) : path;
}

class Configuration {
    public readonly apiUrl: string;
    public readonly wsUrl: string;
    public readonly deviceName: string;

    public readonly homeDir: string;
    public readonly logsDir: string;
    public readonly settingsFile: string;

    /** Timeout for every REST call */
    public readonly requestTimeoutMs: number;
    /** Timeout for opening the persistent connection */
    public readonly handshakeTimeoutMs: number;
    /** Time after the login frame with no rejection before the session counts as authenticated */
    public readonly authGraceMs: number;
    /** Interval at which the relay sends keep-alive frames */
    public readonly keepAliveIntervalMs: number;
    /** Silence on the socket for this long forces a reconnect */
    public readonly inactivityTimeoutMs: number;

    public readonly reconnectMinDelayMs: number;
    public readonly reconnectMaxDelayMs: number;
    public readonly fetchRetryMinDelayMs: number;
    public readonly fetchRetryMaxDelayMs: number;

    public readonly emergencyRetryIntervalMs: number;
    public readonly emergencyExpireMs: number;

    public readonly logRetentionDays: number;
    public readonly logMaxFileBytes: number;
    public readonly logToConsole: boolean;

    constructor() {
        this.apiUrl = (process.env.PUSHWATCH_API_URL || 'https://api.pushover.net/1').replace(/\/+$/, '');
        this.wsUrl = process.env.PUSHWATCH_WS_URL || 'wss://client.pushover.net/push';
        this.deviceName = process.env.PUSHWATCH_DEVICE_NAME || 'pushwatch_client';

        this.homeDir = process.env.PUSHWATCH_HOME_DIR
            ? expandHome(process.env.PUSHWATCH_HOME_DIR)
            : join(homedir(), '.pushwatch');
        this.logsDir = join(this.homeDir, 'logs');
        this.settingsFile = join(this.homeDir, 'settings.json');

        this.requestTimeoutMs = readNumber('PUSHWATCH_REQUEST_TIMEOUT_MS', 15_000);
        this.handshakeTimeoutMs = readNumber('PUSHWATCH_HANDSHAKE_TIMEOUT_MS', 15_000);
        this.authGraceMs = readNumber('PUSHWATCH_AUTH_GRACE_MS', 2_000);
        this.keepAliveIntervalMs = readNumber('PUSHWATCH_KEEPALIVE_INTERVAL_MS', 30_000);
        this.inactivityTimeoutMs = readNumber('PUSHWATCH_INACTIVITY_TIMEOUT_MS', this.keepAliveIntervalMs * 2);

        this.reconnectMinDelayMs = readNumber('PUSHWATCH_RECONNECT_MIN_MS', 1_000);
        this.reconnectMaxDelayMs = readNumber('PUSHWATCH_RECONNECT_MAX_MS', 60_000);
        this.fetchRetryMinDelayMs = readNumber('PUSHWATCH_FETCH_RETRY_MIN_MS', 2_000);
        this.fetchRetryMaxDelayMs = readNumber('PUSHWATCH_FETCH_RETRY_MAX_MS', 60_000);

        this.emergencyRetryIntervalMs = readNumber('PUSHWATCH_EMERGENCY_RETRY_MS', 60_000);
        this.emergencyExpireMs = readNumber('PUSHWATCH_EMERGENCY_EXPIRE_MS', 3 * 60 * 60 * 1000);

        this.logRetentionDays = readNumber('PUSHWATCH_LOG_RETENTION_DAYS', 2);
        this.logMaxFileBytes = readNumber('PUSHWATCH_LOG_MAX_BYTES', 10 * 1024 * 1024);
        this.logToConsole = !['0', 'false', 'no'].includes((process.env.PUSHWATCH_LOG_CONSOLE ?? '').toLowerCase());

        if (!existsSync(this.homeDir)) {
            mkdirSync(this.homeDir, { recursive: true });
        }
        if (!existsSync(this.logsDir)) {
            mkdirSync(this.logsDir, { recursive: true });
        }
    }
}

export const configuration: Configuration = new Configuration();

export type { Configuration };
