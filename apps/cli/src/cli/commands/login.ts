import chalk from 'chalk';
import type { LoginResponse } from '@pushwatch/protocol';

import { loginUser, registerDevice } from '@/api/relayApi';
import { SettingsCredentialStore } from '@/auth/credentialStore';
import { readFlag } from '@/cli/args';
import type { CommandContext } from '@/cli/commandRegistry';
import { configuration } from '@/configuration';
import { clearSession } from '@/persistence';
import { logger } from '@/ui/logger';
import { prompt } from '@/ui/prompt';
import { AppError, ErrorCodes, errorMessage } from '@/utils/errors';

export async function handleLoginCliCommand(context: CommandContext): Promise<void> {
  try {
    const email = readFlag(context.args, 'email') ?? (await prompt('Email: '));
    const password = await prompt('Password: ');
    const deviceName = readFlag(context.args, 'name') ?? configuration.deviceName;

    let login: LoginResponse;
    try {
      login = await loginUser({ email, password });
    } catch (error) {
      if (!(error instanceof AppError) || error.code !== ErrorCodes.TWO_FACTOR_REQUIRED) throw error;
      const twofa = await prompt('Two-factor code: ');
      login = await loginUser({ email, password, twofa });
    }

    const device = await registerDevice({ secret: login.secret, name: deviceName });

    // A new device starts with an empty queue on the relay.
    await clearSession();
    await new SettingsCredentialStore().setToken({ secret: login.secret, deviceId: device.id, userKey: login.id });

    logger.info(`[LOGIN] Registered device ${deviceName} (${device.id})`);
    console.log(chalk.green(`Logged in. Device "${deviceName}" is registered.`));
    console.log(chalk.gray('Run `pushwatch start` to receive notifications.'));
  } catch (error) {
    console.error(chalk.red('Login failed:'), errorMessage(error));
    if (process.env.DEBUG) {
      console.error(error);
    }
    process.exit(1);
  }
}
