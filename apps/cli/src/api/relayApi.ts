import axios, { type AxiosResponse } from 'axios';
import type { z } from 'zod';
import {
    DeviceRegisterResponseSchema,
    LoginResponseSchema,
    MessagesResponseSchema,
    RawMessageSchema,
    StatusResponseSchema,
    type DeviceRegisterResponse,
    type LoginResponse,
    type RawMessage,
} from '@pushwatch/protocol';
import { configuration } from '@/configuration';
import { logger } from '@/ui/logger';
import { AppError, AuthError, ErrorCodes, NetworkError, errorMessage } from '@/utils/errors';
import type { Credentials } from './types';

/**
 * The authenticated calls the delivery engine makes against the relay's REST endpoint.
 */
export interface RelayApi {
    downloadMessages(credentials: Credentials): Promise<RawMessage[]>;
    updateHighestMessage(credentials: Credentials, messageId: string): Promise<void>;
    acknowledgeReceipt(credentials: Credentials, receiptId: string): Promise<void>;
}

type RelayRequest = {
    method: 'GET' | 'POST';
    path: string;
    params?: Record<string, string>;
    form?: Record<string, string>;
};

function describeBody(data: unknown): string {
    if (data && typeof data === 'object' && 'errors' in data && Array.isArray(data.errors)) {
        return data.errors.filter((e): e is string => typeof e === 'string').join('; ');
    }
    return typeof data === 'string' ? data.slice(0, 200) : '';
}

/**
 * The relay answers a bad secret or a removed device with a 4xx whose
 * `errors` name the offending field.
 */
function looksLikeAuthRejection(response: AxiosResponse<unknown>): boolean {
    if (response.status === 401 || response.status === 403) return true;
    if (response.status < 400 || response.status >= 500) return false;
    return /secret|device|login/i.test(describeBody(response.data));
}

async function send(request: RelayRequest): Promise<AxiosResponse<unknown>> {
    const url = `${configuration.apiUrl}${request.path}`;
    try {
        if (request.method === 'GET') {
            return await axios.get<unknown>(url, {
                params: request.params,
                timeout: configuration.requestTimeoutMs,
                validateStatus: () => true,
            });
        }
        return await axios.post<unknown>(url, new URLSearchParams(request.form ?? {}), {
            headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
            timeout: configuration.requestTimeoutMs,
            validateStatus: () => true,
        });
    } catch (error) {
        throw new NetworkError(`${request.method} ${request.path} failed: ${errorMessage(error)}`, { cause: error });
    }
}

async function relayCall<S extends z.ZodTypeAny>(request: RelayRequest, schema: S): Promise<z.output<S>> {
    const response = await send(request);

    if (looksLikeAuthRejection(response)) {
        throw new AuthError(`Relay rejected credentials for ${request.path} (${response.status}): ${describeBody(response.data) || 'no details'}`);
    }
    if (response.status < 200 || response.status >= 300) {
        throw new NetworkError(`Unexpected status from ${request.path}: ${response.status}`);
    }

    const status = StatusResponseSchema.safeParse(response.data);
    if (!status.success) {
        throw new NetworkError(`Malformed response from ${request.path}`, { cause: status.error });
    }
    if (status.data.status !== 1) {
        throw new NetworkError(`Relay reported failure for ${request.path}: ${describeBody(response.data) || `status ${status.data.status}`}`);
    }

    const parsed = schema.safeParse(response.data);
    if (!parsed.success) {
        throw new NetworkError(`Malformed response from ${request.path}`, { cause: parsed.error });
    }
    return parsed.data;
}

export async function downloadMessages(credentials: Credentials): Promise<RawMessage[]> {
    const response = await relayCall(
        {
            method: 'GET',
            path: '/messages.json',
            params: { secret: credentials.secret, device_id: credentials.deviceId },
        },
        MessagesResponseSchema,
    );
    const messages: RawMessage[] = [];
    for (const item of response.messages) {
        const parsed = RawMessageSchema.safeParse(item);
        if (parsed.success) {
            messages.push(parsed.data);
        } else {
            logger.warn(`[RELAY API] Skipping malformed message ${describeMessageId(item)}: ${parsed.error.message}`);
        }
    }
    logger.debugLargeJson(`[RELAY API] Downloaded ${messages.length} message(s)`, messages.map((m) => m.id));
    return messages;
}

function describeMessageId(item: unknown): string {
    if (item && typeof item === 'object' && 'id' in item && (typeof item.id === 'number' || typeof item.id === 'string')) {
        return String(item.id);
    }
    return '(no id)';
}

/**
 * Delivery acknowledgment: the relay drops every queued message up to and including `messageId`.
 */
export async function updateHighestMessage(credentials: Credentials, messageId: string): Promise<void> {
    await relayCall(
        {
            method: 'POST',
            path: `/devices/${encodeURIComponent(credentials.deviceId)}/update_highest_message.json`,
            form: { secret: credentials.secret, message: messageId },
        },
        StatusResponseSchema,
    );
}

export async function acknowledgeReceipt(credentials: Credentials, receiptId: string): Promise<void> {
    await relayCall(
        {
            method: 'POST',
            path: `/receipts/${encodeURIComponent(receiptId)}/acknowledge.json`,
            form: { secret: credentials.secret },
        },
        StatusResponseSchema,
    );
}

export const relayApi: RelayApi = {
    downloadMessages,
    updateHighestMessage,
    acknowledgeReceipt,
};

/**
 * Exchange account credentials for a user secret. HTTP 412 means the account
 * has two-factor auth on and `twofa` must be supplied.
 */
export async function loginUser(opts: { email: string; password: string; twofa?: string }): Promise<LoginResponse> {
    const form: Record<string, string> = { email: opts.email, password: opts.password };
    if (opts.twofa) form.twofa = opts.twofa;

    const response = await send({ method: 'POST', path: '/users/login.json', form });
    if (response.status === 412) {
        throw new AppError(ErrorCodes.TWO_FACTOR_REQUIRED, 'Two-factor authentication code required');
    }
    if (response.status >= 400 && response.status < 500) {
        throw new AuthError(`Login failed (${response.status}): ${describeBody(response.data) || 'invalid email or password'}`);
    }
    if (response.status < 200 || response.status >= 300) {
        throw new NetworkError(`Unexpected status from /users/login.json: ${response.status}`);
    }

    const parsed = LoginResponseSchema.safeParse(response.data);
    if (!parsed.success || parsed.data.status !== 1) {
        throw new AuthError(`Login failed: ${describeBody(response.data) || 'malformed response'}`);
    }
    return parsed.data;
}

export async function registerDevice(opts: { secret: string; name: string }): Promise<DeviceRegisterResponse> {
    return await relayCall(
        {
            method: 'POST',
            path: '/devices.json',
            form: { secret: opts.secret, name: opts.name, os: 'O' },
        },
        DeviceRegisterResponseSchema,
    );
}
