import { z } from 'zod';
import { PrioritySchema, priorityFromRelay, type Priority, type RawMessage } from '@pushwatch/protocol';

export type { Priority };

/**
 * Device credentials issued by the relay at login / device registration.
 * The engine passes them through untouched.
 */
export const CredentialsSchema = z.object({
    secret: z.string().min(1),
    deviceId: z.string().min(1),
    userKey: z.string().optional(),
});

export type Credentials = z.infer<typeof CredentialsSchema>;

/**
 * A message as the engine sees it. Built once per relay message and frozen.
 * Timestamps are ms since epoch.
 */
export const MessageSchema = z.object({
    id: z.number().int().min(0),
    idStr: z.string(),
    priority: PrioritySchema,
    title: z.string(),
    body: z.string(),
    app: z.string(),
    receivedAt: z.number().int(),
    expiresAt: z.number().int().optional(),
    receiptId: z.string().optional(),
    retryIntervalMs: z.number().int().min(1).optional(),
    acknowledged: z.boolean(),
    url: z.string().optional(),
    urlTitle: z.string().optional(),
    sound: z.string().optional(),
    html: z.boolean(),
});

export type Message = Readonly<z.infer<typeof MessageSchema>>;

function nonEmpty(value: string | null | undefined): string | undefined {
    return value && value.length > 0 ? value : undefined;
}

export function messageFromRelay(raw: RawMessage): Message {
    const receivedAt = raw.date * 1000;
    const message: z.infer<typeof MessageSchema> = {
        id: raw.id,
        idStr: raw.id_str ?? String(raw.id),
        priority: priorityFromRelay(raw.priority),
        title: nonEmpty(raw.title) ?? raw.app,
        body: raw.message,
        app: raw.app,
        receivedAt,
        acknowledged: raw.acked === 1,
        html: raw.html === 1,
    };

    const receiptId = nonEmpty(raw.receipt);
    if (receiptId) message.receiptId = receiptId;
    if (raw.expire) message.expiresAt = receivedAt + raw.expire * 1000;
    if (raw.retry) message.retryIntervalMs = raw.retry * 1000;
    const url = nonEmpty(raw.url);
    if (url) message.url = url;
    const urlTitle = nonEmpty(raw.url_title);
    if (urlTitle) message.urlTitle = urlTitle;
    const sound = nonEmpty(raw.sound);
    if (sound) message.sound = sound;

    return Object.freeze(message);
}

export function isEmergency(message: Message): boolean {
    return message.priority === 'emergency';
}

/**
 * Persisted form of an unresolved emergency message.
 */
export const AckRecordSchema = z.object({
    receiptId: z.string(),
    message: MessageSchema,
    nextRetryAt: z.number().int(),
    expiresAt: z.number().int(),
    retryIntervalMs: z.number().int().min(1),
});

export type AckRecord = z.infer<typeof AckRecordSchema>;

export type ConnectionState = 'disconnected' | 'connecting' | 'authenticated' | 'idle' | 'signaled';

/**
 * Read-only view of the transport session.
 */
export type SessionSnapshot = {
    token: Credentials | null;
    connectionState: ConnectionState;
    lastMessageId: number;
    retryCount: number;
};
