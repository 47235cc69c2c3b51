import { handleLoginCliCommand } from './commands/login';
import { handleLogoutCliCommand } from './commands/logout';
import { handleStartCliCommand } from './commands/start';
import { handleStatusCliCommand } from './commands/status';

export type CommandContext = {
  args: string[];
};

export type CliCommand = {
  description: string;
  usage: string;
  handler: (context: CommandContext) => Promise<void>;
};

export const commandRegistry: Record<string, CliCommand> = {
  login: {
    description: 'Log in and register this machine as a relay device',
    usage: 'pushwatch login [--email <email>] [--name <device name>]',
    handler: handleLoginCliCommand,
  },
  logout: {
    description: 'Forget the device credentials and local state',
    usage: 'pushwatch logout',
    handler: handleLogoutCliCommand,
  },
  status: {
    description: 'Show the device, last delivered message and pending emergencies',
    usage: 'pushwatch status',
    handler: handleStatusCliCommand,
  },
  start: {
    description: 'Receive notifications in the foreground (stdin: ack <receipt>, status, quit)',
    usage: 'pushwatch start',
    handler: handleStartCliCommand,
  },
};
