import chalk from 'chalk';
import type { Message, Priority } from '@/api/types';

/**
 * Where resolved messages go to be shown. Fire-and-forget: the engine never
 * waits on or inspects the result.
 */
export interface NotificationSink {
    display(message: Message): void;
}

const priorityStyle: Record<Priority, (text: string) => string> = {
    lowest: chalk.gray,
    low: chalk.gray,
    normal: chalk.white,
    high: chalk.yellow,
    emergency: chalk.bold.red,
};

function formatTime(epochMs: number): string {
    return new Date(epochMs).toLocaleString();
}

export function formatMessage(message: Message): string {
    const style = priorityStyle[message.priority];
    const lines = [
        `${style(`[${message.priority.toUpperCase()}]`)} ${chalk.bold(message.title)} ${chalk.gray(`(${message.app || 'unknown app'}, ${formatTime(message.receivedAt)})`)}`,
        `  ${message.body}`,
    ];
    if (message.url) {
        lines.push(`  ${chalk.cyan(message.urlTitle ? `${message.urlTitle}: ${message.url}` : message.url)}`);
    }
    if (message.priority === 'emergency' && message.receiptId && !message.acknowledged) {
        lines.push(chalk.red(`  Acknowledge with: ack ${message.receiptId}`));
    }
    return lines.join('\n');
}

export class ConsoleNotificationSink implements NotificationSink {
    constructor(private readonly write: (text: string) => void = (text) => console.log(text)) {}

    display(message: Message): void {
        this.write(formatMessage(message));
    }
}
