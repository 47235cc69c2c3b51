import chalk from 'chalk';

import type { CommandContext } from '@/cli/commandRegistry';
import { configuration } from '@/configuration';
import { readSettings } from '@/persistence';
import { logger } from '@/ui/logger';

export async function handleStatusCliCommand(_context: CommandContext): Promise<void> {
  const settings = await readSettings();

  if (settings.credentials) {
    console.log(`${chalk.bold('Device:')} ${settings.credentials.deviceId}`);
  } else {
    console.log(`${chalk.bold('Device:')} ${chalk.yellow('not logged in')}`);
  }
  console.log(`${chalk.bold('Last message:')} ${settings.lastMessageId ?? 0}`);

  const pending = settings.pendingAcks ?? [];
  console.log(`${chalk.bold('Pending emergencies:')} ${pending.length}`);
  for (const record of pending) {
    console.log(`  ${chalk.red(record.receiptId)} ${record.message.title} (expires ${new Date(record.expiresAt).toLocaleString()})`);
  }

  console.log(chalk.gray(`Settings: ${configuration.settingsFile}`));
  console.log(chalk.gray(`Log file: ${logger.logFilePath}`));
}
