/**
 * Error taxonomy for the delivery engine.
 *
 * Every error carries a stable `code`; `retryable` tells the session whether
 * to back off and try again or to surface the failure to the user.
 */

export const ErrorCodes = {
    AUTH_FAILED: 'AUTH_FAILED',
    NETWORK_ERROR: 'NETWORK_ERROR',
    FETCH_FAILED: 'FETCH_FAILED',
    ACK_FAILED: 'ACK_FAILED',
    SESSION_SUPERSEDED: 'SESSION_SUPERSEDED',
    CREDENTIALS_REVOKED: 'CREDENTIALS_REVOKED',
    NOT_LOGGED_IN: 'NOT_LOGGED_IN',
    TWO_FACTOR_REQUIRED: 'TWO_FACTOR_REQUIRED',
    INVALID_SETTINGS: 'INVALID_SETTINGS',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export class AppError extends Error {
    readonly code: ErrorCode;
    readonly retryable: boolean;

    constructor(code: ErrorCode, message: string, options?: { cause?: unknown; retryable?: boolean }) {
        super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
        this.name = 'AppError';
        this.code = code;
        this.retryable = options?.retryable ?? false;
    }
}

/** Bad or expired credentials. Needs re-authentication, never retried automatically. */
export class AuthError extends AppError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(ErrorCodes.AUTH_FAILED, message, { ...options, retryable: false });
        this.name = 'AuthError';
    }
}

/** Transport-level failure or timeout. */
export class NetworkError extends AppError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(ErrorCodes.NETWORK_ERROR, message, { ...options, retryable: true });
        this.name = 'NetworkError';
    }
}

export class FetchError extends AppError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(ErrorCodes.FETCH_FAILED, message, { ...options, retryable: true });
        this.name = 'FetchError';
    }
}

export class AckError extends AppError {
    readonly receiptId: string;

    constructor(receiptId: string, message: string, options?: { cause?: unknown }) {
        super(ErrorCodes.ACK_FAILED, message, { ...options, retryable: true });
        this.name = 'AckError';
        this.receiptId = receiptId;
    }
}

export class SessionSupersededError extends AppError {
    constructor() {
        super(ErrorCodes.SESSION_SUPERSEDED, 'Another session for this device is active', { retryable: false });
        this.name = 'SessionSupersededError';
    }
}

export class CredentialsRevokedError extends AppError {
    constructor() {
        super(ErrorCodes.CREDENTIALS_REVOKED, 'The relay revoked the device credentials', { retryable: false });
        this.name = 'CredentialsRevokedError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
