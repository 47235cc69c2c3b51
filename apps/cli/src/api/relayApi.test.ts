import { beforeEach, describe, expect, it, vi } from 'vitest';
import axios, { AxiosHeaders, type AxiosResponse } from 'axios';
import { acknowledgeReceipt, downloadMessages, loginUser, updateHighestMessage } from './relayApi';
import { AuthError, ErrorCodes, NetworkError } from '@/utils/errors';

vi.mock('axios');

const credentials = { secret: 'test-secret', deviceId: 'device-1' };

function reply(status: number, data: unknown): AxiosResponse<unknown> {
    return { status, data, statusText: '', headers: {}, config: { headers: new AxiosHeaders() } };
}

describe('relay REST calls', () => {
    beforeEach(() => {
        vi.mocked(axios.get).mockReset();
        vi.mocked(axios.post).mockReset();
    });

    it('downloads and validates pending messages', async () => {
        vi.mocked(axios.get).mockResolvedValue(reply(200, {
            status: 1,
            request: 'req-1',
            messages: [{ id: 9, id_str: '9', message: 'build failed', app: 'CI', date: 1_700_000_000, priority: 1, acked: 0 }],
        }));

        const messages = await downloadMessages(credentials);

        expect(messages).toHaveLength(1);
        expect(messages[0]?.id).toBe(9);
        expect(vi.mocked(axios.get).mock.calls[0]?.[0]).toBe('https://api.pushover.net/1/messages.json');
        expect(vi.mocked(axios.get).mock.calls[0]?.[1]?.params).toEqual({ secret: 'test-secret', device_id: 'device-1' });
    });

    it('skips a malformed message without dropping the rest of the batch', async () => {
        vi.mocked(axios.get).mockResolvedValue(reply(200, {
            status: 1,
            messages: [
                { id: 10, message: 'bad flag', date: 1_700_000_000, acked: 5 },
                { id: 11, message: 'no retry given', date: 1_700_000_000, priority: 2, receipt: 'receipt-11', retry: 0, expire: 0 },
            ],
        }));

        const messages = await downloadMessages(credentials);

        expect(messages.map((m) => m.id)).toEqual([11]);
        expect(messages[0]?.retry).toBe(0);
    });

    it('maps a rejected secret to AuthError', async () => {
        vi.mocked(axios.get).mockResolvedValue(reply(400, { status: 0, secret: 'invalid', errors: ['secret is invalid'] }));

        await expect(downloadMessages(credentials)).rejects.toBeInstanceOf(AuthError);
    });

    it('maps transport failures to NetworkError', async () => {
        vi.mocked(axios.get).mockRejectedValue(new Error('timeout of 15000ms exceeded'));

        const error = await downloadMessages(credentials).catch((e: unknown) => e);
        expect(error).toBeInstanceOf(NetworkError);
        expect(error).toHaveProperty('message', 'GET /messages.json failed: timeout of 15000ms exceeded');
    });

    it('treats a non-1 status without an auth hint as a network failure', async () => {
        vi.mocked(axios.post).mockResolvedValue(reply(200, { status: 0, errors: ['try again later'] }));

        await expect(updateHighestMessage(credentials, '9')).rejects.toBeInstanceOf(NetworkError);
    });

    it('posts the delivery acknowledgment as a form', async () => {
        vi.mocked(axios.post).mockResolvedValue(reply(200, { status: 1 }));

        await updateHighestMessage(credentials, '9');

        const [url, body] = vi.mocked(axios.post).mock.calls[0] ?? [];
        expect(url).toBe('https://api.pushover.net/1/devices/device-1/update_highest_message.json');
        expect(String(body)).toBe('secret=test-secret&message=9');
    });

    it('posts receipt acknowledgments', async () => {
        vi.mocked(axios.post).mockResolvedValue(reply(200, { status: 1 }));

        await acknowledgeReceipt(credentials, 'receipt-1');

        const [url, body] = vi.mocked(axios.post).mock.calls[0] ?? [];
        expect(url).toBe('https://api.pushover.net/1/receipts/receipt-1/acknowledge.json');
        expect(String(body)).toBe('secret=test-secret');
    });

    it('reports a missing two-factor code', async () => {
        vi.mocked(axios.post).mockResolvedValue(reply(412, { status: 0, errors: ['two-factor code required'] }));

        await expect(loginUser({ email: 'user@example.com', password: 'test-password' })).rejects.toMatchObject({
            code: ErrorCodes.TWO_FACTOR_REQUIRED,
        });
    });
});
