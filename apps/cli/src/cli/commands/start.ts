import chalk from 'chalk';
import { createInterface } from 'node:readline';

import type { CommandContext } from '@/cli/commandRegistry';
import { RelayDaemon } from '@/daemon/relayDaemon';
import { logger } from '@/ui/logger';
import { AppError, ErrorCodes, errorMessage } from '@/utils/errors';
import { registerProcessHandlers } from '@/utils/processHandlers';
import { awaitShutdown, initiateShutdown, onShutdown } from '@/utils/shutdown';

/**
 * Runs one line typed on stdin against the daemon.
 */
export async function handleDaemonInput(daemon: RelayDaemon, line: string): Promise<string | null> {
  const [command = '', ...rest] = line.trim().split(/\s+/);
  switch (command) {
    case '':
      return null;
    case 'ack': {
      const receiptId = rest[0];
      if (!receiptId) return chalk.yellow('Usage: ack <receipt>');
      try {
        await daemon.acknowledge(receiptId);
        return chalk.green(`Acknowledged ${receiptId}`);
      } catch (error) {
        return chalk.red(errorMessage(error));
      }
    }
    case 'status': {
      const { session, pendingAcks } = daemon.status();
      const receipts = pendingAcks.map((s) => s.receiptId).join(', ') || 'none';
      return `${session.connectionState}, last message ${session.lastMessageId}, pending: ${receipts}`;
    }
    case 'quit':
    case 'exit':
      await initiateShutdown('quit');
      return null;
    default:
      return chalk.yellow(`Unknown command "${command}". Try: ack <receipt>, status, quit`);
  }
}

export async function handleStartCliCommand(_context: CommandContext): Promise<void> {
  registerProcessHandlers();

  const daemon = await RelayDaemon.create();
  onShutdown('daemon', () => daemon.stop());

  try {
    await daemon.start();
  } catch (error) {
    if (error instanceof AppError && error.code === ErrorCodes.NOT_LOGGED_IN) {
      console.error(chalk.yellow(error.message));
    } else {
      console.error(chalk.red('Failed to start:'), errorMessage(error));
    }
    await initiateShutdown('start-failed');
    process.exit(1);
  }

  console.log(chalk.gray(`Listening for notifications. Type "ack <receipt>", "status" or "quit". Logs: ${logger.logFilePath}`));

  const rl = createInterface({ input: process.stdin });
  onShutdown('stdin', async () => rl.close());
  rl.on('line', (line) => {
    handleDaemonInput(daemon, line).then(
      (reply) => {
        if (reply) console.log(reply);
      },
      (error: unknown) => logger.error(`[START] Input handling failed: ${errorMessage(error)}`),
    );
  });
  rl.on('close', () => {
    void initiateShutdown('stdin-closed');
  });

  const outcome = await Promise.race([
    daemon.terminated().then((termination) => termination.kind),
    awaitShutdown().then(() => null),
  ]);
  if (outcome) {
    await initiateShutdown(`terminated:${outcome}`);
    process.exitCode = 1;
  }
  logger.debug('[START] Daemon exited');
}
