import chalk from 'chalk';
import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { configuration, type LogLevel } from '@/configuration';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const LEVEL_COLOR: Record<LogLevel, (text: string) => string> = {
    debug: chalk.gray,
    info: chalk.cyan,
    warn: chalk.yellow,
    error: chalk.red,
};

function formatArg(arg: unknown): string {
    if (arg instanceof Error) {
        return arg.stack ?? `${arg.name}: ${arg.message}`;
    }
    if (typeof arg === 'string') {
        return arg;
    }
    try {
        return JSON.stringify(arg);
    } catch {
        return String(arg);
    }
}

/**
 * Console logger with an optional plain-text log file.
 * Debug lines go only to the file unless the level is `debug`.
 */
export class Logger {
    private level: LogLevel;
    private logFile: string | null;

    constructor(opts: { level: LogLevel; logFile?: string | null }) {
        this.level = opts.level;
        this.logFile = opts.logFile ?? null;
    }

    configure(opts: { level?: LogLevel; logFile?: string | null }): void {
        if (opts.level) this.level = opts.level;
        if (opts.logFile !== undefined) {
            this.logFile = opts.logFile;
            if (this.logFile) {
                mkdirSync(dirname(this.logFile), { recursive: true });
            }
        }
    }

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

    private write(level: LogLevel, message: string, args: unknown[]): void {
        const line = [message, ...args.map(formatArg)].join(' ');
        const timestamp = new Date().toISOString();

        if (this.logFile) {
            try {
                appendFileSync(this.logFile, `${timestamp} ${level.toUpperCase()} ${line}\n`, 'utf8');
            } catch (error) {
                // Stop writing to a file we cannot append to; the console still gets the line.
                this.logFile = null;
                console.error(chalk.red(`[LOGGER] Disabled file logging: ${formatArg(error)}`));
            }
        }

        if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
            return;
        }
        const out = level === 'error' || level === 'warn' ? console.error : console.log;
        out(`${chalk.dim(timestamp)} ${LEVEL_COLOR[level](level.toUpperCase().padEnd(5))} ${line}`);
    }
}

export const logger = new Logger({ level: configuration.logLevel });
