export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type TelemetryHook = (level: LogLevel, message: string, ...args: unknown[]) => void;

const LEVELS: Record<LogLevel | 'silent', number> = {
    'debug': 0,
    'info': 1,
    'warn': 2,
    'error': 3,
    'silent': 4,
};

export function isLogLevel(value: string): value is LogLevel | 'silent' {
    return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

/**
 * A lightweight logging utility with support for different log levels and telemetry hooks.
 * While the terminal canvas owns the screen the level is set to 'silent'; telemetry hooks
 * still receive every message (the bootstrap uses one to append to a log file).
 */
export class Logger {
    private static logLevel: LogLevel | 'silent' = 'warn';
    private static telemetryHooks: TelemetryHook[] = [];

    /**
     * Sets the minimum log level. Messages below this level will not be written to the console.
     */
    public static setLogLevel(level: LogLevel | 'silent'): void {
        Logger.logLevel = level;
    }

    public static getLogLevel(): LogLevel | 'silent' {
        return Logger.logLevel;
    }

    /**
     * Adds a telemetry hook that will be called for every log message.
     * @returns A function removing the hook again.
     */
    public static addTelemetryHook(hook: TelemetryHook): () => void {
        Logger.telemetryHooks.push(hook);
        return () => {
            Logger.telemetryHooks = Logger.telemetryHooks.filter(h => h !== hook);
        };
    }

    private static shouldLog(level: LogLevel): boolean {
        return LEVELS[level] >= LEVELS[Logger.logLevel];
    }

    private static log(level: LogLevel, message: string, ...args: unknown[]): void {
        if (Logger.shouldLog(level)) {
            console[level](`[${level.toUpperCase()}] ${message}`, ...args);
        }
        Logger.telemetryHooks.forEach(hook => hook(level, message, ...args));
    }

    public static debug(message: string, ...args: unknown[]): void {
        Logger.log('debug', message, ...args);
    }

    public static info(message: string, ...args: unknown[]): void {
        Logger.log('info', message, ...args);
    }

    public static warn(message: string, ...args: unknown[]): void {
        Logger.log('warn', message, ...args);
    }

    public static error(message: string, ...args: unknown[]): void {
        Logger.log('error', message, ...args);
    }
}
