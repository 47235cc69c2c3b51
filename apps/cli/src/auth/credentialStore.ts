import type { Credentials } from '@/api/types';
import { clearCredentials, readCredentials, writeCredentials } from '@/persistence';

/**
 * Where the engine gets its device credentials from. Platform keychains can
 * implement this; the default keeps them in the settings file.
 */
export interface CredentialStore {
    getToken(): Promise<Credentials | null>;
    setToken(token: Credentials): Promise<void>;
    clearToken(): Promise<void>;
}

export class SettingsCredentialStore implements CredentialStore {
    async getToken(): Promise<Credentials | null> {
        return await readCredentials();
    }

    async setToken(token: Credentials): Promise<void> {
        await writeCredentials(token);
    }

    async clearToken(): Promise<void> {
        await clearCredentials();
    }
}

export class MemoryCredentialStore implements CredentialStore {
    constructor(private token: Credentials | null = null) {}

    async getToken(): Promise<Credentials | null> {
        return this.token;
    }

    async setToken(token: Credentials): Promise<void> {
        this.token = token;
    }

    async clearToken(): Promise<void> {
        this.token = null;
    }
}
