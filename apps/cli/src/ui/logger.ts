/**
 * File-backed logger for the daemon.
 *
 * Every line goes to `<homeDir>/logs/<YYYY-MM-DD>.log`. Files roll over when
 * the day changes or the current file passes the size cap, and files older
 * than the retention window are pruned on rollover. Info and above are echoed
 * to the console; debug only when DEBUG is set.
 */

import { appendFileSync, existsSync, readdirSync, statSync, unlinkSync } from 'node:fs';
import { join } from 'node:path';
import { inspect } from 'node:util';
import chalk from 'chalk';
import { configuration } from '@/configuration';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

function pad(value: number, width = 2): string {
    return String(value).padStart(width, '0');
}

function dayStamp(date: Date): string {
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

function timeStamp(date: Date): string {
    return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}.${pad(date.getMilliseconds(), 3)}`;
}

function isMissingFile(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

class Logger {
    private day: string | null = null;
    private part = 0;
    private file: string | null = null;

    constructor(
        private readonly logsDir: string,
        private readonly retentionDays: number,
        private readonly maxFileBytes: number,
        private readonly echo: boolean,
    ) {}

    debug(message: string, ...args: unknown[]): void {
        this.write('debug', message, args);
    }

    info(message: string, ...args: unknown[]): void {
        this.write('info', message, args);
    }

    warn(message: string, ...args: unknown[]): void {
        this.write('warn', message, args);
    }

    error(message: string, ...args: unknown[]): void {
        this.write('error', message, args);
    }

    /**
     * Debug-log a payload, truncating long strings so relay batches don't flood the file.
     */
    debugLargeJson(message: string, payload: unknown, maxStringLength = 200): void {
        const truncated = JSON.stringify(payload, (_key, value: unknown) => {
            if (typeof value === 'string' && value.length > maxStringLength) {
                return `${value.slice(0, maxStringLength)}... [truncated ${value.length - maxStringLength} chars]`;
            }
            return value;
        });
        this.write('debug', message, [truncated]);
    }

    get logFilePath(): string {
        return this.resolveFile(new Date());
    }

    private write(level: LogLevel, message: string, args: unknown[]): void {
        const now = new Date();
        const rendered = args.length > 0
            ? `${message} ${args.map((arg) => (typeof arg === 'string' ? arg : inspect(arg, { depth: 4, breakLength: Infinity }))).join(' ')}`
            : message;
        const line = `[${timeStamp(now)}] [${level.toUpperCase()}] ${rendered}\n`;

        try {
            appendFileSync(this.resolveFile(now), line, 'utf8');
        } catch (error) {
            if (this.echo) {
                console.error(chalk.red('[logger] failed to write log file:'), error instanceof Error ? error.message : error);
            }
        }

        if (!this.echo) return;
        if (level === 'debug' && !process.env.DEBUG) return;
        this.toConsole(level, rendered);
    }

    private toConsole(level: LogLevel, text: string): void {
        switch (level) {
            case 'debug':
                console.log(chalk.gray(text));
                break;
            case 'info':
                console.log(text);
                break;
            case 'warn':
                console.warn(chalk.yellow(text));
                break;
            case 'error':
                console.error(chalk.red(text));
                break;
        }
    }

    private resolveFile(now: Date): string {
        const day = dayStamp(now);
        if (day !== this.day) {
            this.day = day;
            this.part = 0;
            this.file = null;
            this.prune(now);
        }

        if (!this.file) {
            this.file = this.partFile(day, this.part);
        }

        if (existsSync(this.file) && statSync(this.file).size >= this.maxFileBytes) {
            this.part += 1;
            this.file = this.partFile(day, this.part);
        }

        return this.file;
    }

    private partFile(day: string, part: number): string {
        return join(this.logsDir, part === 0 ? `${day}.log` : `${day}.${part}.log`);
    }

    private prune(now: Date): void {
        const cutoff = now.getTime() - this.retentionDays * 24 * 60 * 60 * 1000;
        let entries: string[];
        try {
            entries = readdirSync(this.logsDir);
        } catch (error) {
            if (this.echo) {
                console.error(chalk.red(`[logger] cannot list ${this.logsDir}:`), error instanceof Error ? error.message : error);
            }
            return;
        }
        for (const entry of entries) {
            if (!entry.endsWith('.log')) continue;
            const path = join(this.logsDir, entry);
            try {
                if (statSync(path).mtimeMs < cutoff) {
                    unlinkSync(path);
                }
            } catch (error) {
                // ENOENT: another process pruned it first.
                if (this.echo && !isMissingFile(error)) {
                    console.error(chalk.red(`[logger] failed to prune ${path}:`), error instanceof Error ? error.message : error);
                }
            }
        }
    }
}

export const logger = new Logger(
    configuration.logsDir,
    configuration.logRetentionDays,
    configuration.logMaxFileBytes,
    configuration.logToConsole,
);

export type { Logger };
