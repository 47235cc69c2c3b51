import chalk from 'chalk';

import type { CommandContext } from '@/cli/commandRegistry';
import { clearSession, readCredentials } from '@/persistence';
import { logger } from '@/ui/logger';
import { errorMessage } from '@/utils/errors';

export async function handleLogoutCliCommand(_context: CommandContext): Promise<void> {
  try {
    const credentials = await readCredentials();
    await clearSession();
    if (credentials) {
      logger.info(`[LOGOUT] Forgot device ${credentials.deviceId}`);
      console.log(chalk.green('Logged out.'));
    } else {
      console.log(chalk.yellow('Not logged in.'));
    }
  } catch (error) {
    console.error(chalk.red('Error:'), errorMessage(error));
    if (process.env.DEBUG) {
      console.error(error);
    }
    process.exit(1);
  }
}
