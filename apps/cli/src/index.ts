#!/usr/bin/env node

import chalk from 'chalk';

import { commandRegistry } from '@/cli/commandRegistry';
import { logger } from '@/ui/logger';
import { errorMessage } from '@/utils/errors';

function printHelp(): void {
    console.log(`${chalk.bold('pushwatch')} - receive relay push notifications on this machine\n`);
    for (const [name, command] of Object.entries(commandRegistry)) {
        console.log(`  ${chalk.cyan(name.padEnd(8))} ${command.description}`);
        console.log(chalk.gray(`           ${command.usage}`));
    }
}

async function main(): Promise<void> {
    const [name, ...args] = process.argv.slice(2);
    if (!name || name === 'help' || name === '--help' || name === '-h') {
        printHelp();
        return;
    }

    const command = commandRegistry[name];
    if (!command) {
        console.error(chalk.red(`Unknown command: ${name}\n`));
        printHelp();
        process.exitCode = 1;
        return;
    }

    logger.debug(`[CLI] Running ${name}`, args);
    await command.handler({ args });
}

main().catch((error: unknown) => {
    logger.error(`[CLI] ${errorMessage(error)}`);
    console.error(chalk.red('Error:'), errorMessage(error));
    process.exit(1);
});
