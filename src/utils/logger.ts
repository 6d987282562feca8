import chalk from 'chalk';

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
    silent: 0,
    error: 1,
    warn: 2,
    info: 3,
    debug: 4,
};

export function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === 'string' && value in LEVEL_PRIORITY;
}

/**
 * Process-wide logger. Everything goes to stderr so that stdout stays
 * reserved for the JSON report.
 */
export default class Logger {
    private static level: LogLevel = 'info';
    private static sink: (line: string) => void = (line) => process.stderr.write(line + '\n');

    static setLevel(level: LogLevel): void {
        Logger.level = level;
    }

    static getLevel(): LogLevel {
        return Logger.level;
    }

    /** Redirect output, e.g. to collect lines in tests. */
    static setSink(sink: (line: string) => void): void {
        Logger.sink = sink;
    }

    static error(message: string): void {
        Logger.write('error', chalk.red('[ERROR]'), message);
    }

    static warn(message: string): void {
        Logger.write('warn', chalk.yellow('[WARN]'), message);
    }

    static info(message: string): void {
        Logger.write('info', chalk.cyan('[INFO]'), message);
    }

    static debug(message: string): void {
        Logger.write('debug', chalk.gray('[DEBUG]'), message);
    }

    private static write(level: LogLevel, prefix: string, message: string): void {
        if (LEVEL_PRIORITY[Logger.level] < LEVEL_PRIORITY[level]) {
            return;
        }
        const time = new Date().toISOString().substring(11, 23);
        Logger.sink(`${chalk.dim(time)} ${prefix} ${message}`);
    }
}
