/**
 * Minimal persistence functions for pushwatch.
 *
 * Everything lives in one JSON settings file under the home dir: device
 * credentials, the dedup ledger's high-water mark and unresolved emergency
 * messages. Writes are serialized and atomic (temp file + rename).
 */

import { existsSync } from 'node:fs';
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { configuration } from '@/configuration';
import { logger } from '@/ui/logger';
import { AsyncLock } from '@/utils/lock';
import { AckRecordSchema, CredentialsSchema, type AckRecord, type Credentials } from '@/api/types';

const SettingsSchema = z.object({
    credentials: CredentialsSchema.optional(),
    lastMessageId: z.number().int().min(0).optional(),
    pendingAcks: z.array(AckRecordSchema).optional(),
});

export type Settings = z.infer<typeof SettingsSchema>;

const settingsLock = new AsyncLock();

export async function readSettings(): Promise<Settings> {
    if (!existsSync(configuration.settingsFile)) {
        return {};
    }

    let raw: unknown;
    try {
        raw = JSON.parse(await readFile(configuration.settingsFile, 'utf8'));
    } catch (error) {
        logger.warn(`[PERSISTENCE] Unreadable settings file ${configuration.settingsFile}, using defaults`, error);
        return {};
    }

    const parsed = SettingsSchema.safeParse(raw);
    if (!parsed.success) {
        logger.warn('[PERSISTENCE] Settings file failed validation, using defaults', parsed.error.issues);
        return {};
    }
    return parsed.data;
}

/**
 * Read-modify-write under the settings lock.
 */
export async function updateSettings(updater: (current: Settings) => Settings): Promise<Settings> {
    return await settingsLock.inLock(async () => {
        const next = updater(await readSettings());
        await mkdir(dirname(configuration.settingsFile), { recursive: true });
        const tmpFile = `${configuration.settingsFile}.${process.pid}.tmp`;
        await writeFile(tmpFile, JSON.stringify(next, null, 2), { encoding: 'utf8', mode: 0o600 });
        await rename(tmpFile, configuration.settingsFile);
        return next;
    });
}

export async function readCredentials(): Promise<Credentials | null> {
    return (await readSettings()).credentials ?? null;
}

export async function writeCredentials(credentials: Credentials): Promise<void> {
    await updateSettings((settings) => ({ ...settings, credentials }));
}

export async function clearCredentials(): Promise<void> {
    await updateSettings(({ credentials: _dropped, ...rest }) => rest);
}

export async function readLastMessageId(): Promise<number> {
    return (await readSettings()).lastMessageId ?? 0;
}

/**
 * Only ever moves the stored id up; a lower value is ignored.
 */
export async function writeLastMessageId(id: number): Promise<number> {
    const next = await updateSettings((settings) => {
        const current = settings.lastMessageId ?? 0;
        return id > current ? { ...settings, lastMessageId: id } : settings;
    });
    return next.lastMessageId ?? 0;
}

export async function readPendingAcks(): Promise<AckRecord[]> {
    return (await readSettings()).pendingAcks ?? [];
}

export async function writePendingAcks(records: AckRecord[]): Promise<void> {
    await updateSettings(({ pendingAcks: _previous, ...rest }) => (records.length > 0 ? { ...rest, pendingAcks: records } : rest));
}

/**
 * Forget the device: credentials, ledger position and pending emergencies.
 */
export async function clearSession(): Promise<void> {
    await updateSettings(() => ({}));
}
