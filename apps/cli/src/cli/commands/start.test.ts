import { describe, expect, it, vi } from 'vitest';
import type { RelayApi } from '@/api/relayApi';
import { MemoryCredentialStore } from '@/auth/credentialStore';
import { RelayDaemon } from '@/daemon/relayDaemon';
import { handleDaemonInput } from './start';

async function createDaemon() {
  const api = {
    downloadMessages: vi.fn<RelayApi['downloadMessages']>(async () => []),
    updateHighestMessage: vi.fn<RelayApi['updateHighestMessage']>(async () => {}),
    acknowledgeReceipt: vi.fn<RelayApi['acknowledgeReceipt']>(async () => {}),
  } satisfies RelayApi;
  return await RelayDaemon.create({
    api,
    credentials: new MemoryCredentialStore({ secret: 'test-secret', deviceId: 'device-1' }),
    ledgerStore: { read: async () => 4, write: async (id) => id },
    ackStore: { load: async () => [], save: async () => {} },
    sink: { display: () => {} },
    notice: () => {},
  });
}

describe('handleDaemonInput', () => {
  it('ignores blank lines', async () => {
    const daemon = await createDaemon();

    expect(await handleDaemonInput(daemon, '   ')).toBeNull();
  });

  it('reports the session status', async () => {
    const daemon = await createDaemon();

    expect(await handleDaemonInput(daemon, 'status')).toBe('disconnected, last message 4, pending: none');
  });

  it('reports an unknown receipt instead of throwing', async () => {
    const daemon = await createDaemon();

    expect(await handleDaemonInput(daemon, 'ack receipt-9')).toContain('Unknown receipt receipt-9');
  });
});
