import pino, { type Logger } from 'pino';

export type LogFormat = 'json' | 'pretty';

export interface LoggingOptions {
    level: string;
    format: LogFormat;
}

function buildRoot(options: LoggingOptions): Logger {
    return pino({
        name: 'autocabling',
        level: options.level,
        transport:
            options.format === 'pretty'
                ? {
                      target: 'pino-pretty',
                      options: {
                          colorize: true,
                          translateTime: 'SYS:standard',
                      },
                  }
                : undefined,
    });
}

let root: Logger | null = null;

// Used until configureLogging runs; an unknown level falls back to info
function defaultLevel(): string {
    const level = process.env.LOG_LEVEL;
    return level !== undefined && (level === 'silent' || level in pino.levels.values) ? level : 'info';
}

/**
 * Replace the root logger. Loggers created afterwards inherit the new settings.
 */
export function configureLogging(options: LoggingOptions): void {
    root = buildRoot(options);
}

export function createLogger(component: string): Logger {
    if (!root) root = buildRoot({ level: defaultLevel(), format: 'json' });
    return root.child({ component });
}

export type { Logger };
