/**
 * 📝 Logger
 * Console output plus an optional status callback that mirrors every message to the UI
 */

export type LogLevel = 'debug' | 'info' | 'success' | 'warning' | 'error';

export type StatusLogCallback = (message: string, level: LogLevel) => void;

const LEVEL_ORDER: Record<LogLevel | 'silent', number> = {
    debug: 0,
    info: 1,
    success: 1,
    warning: 2,
    error: 3,
    silent: 4
};

const LEVEL_PREFIX: Record<LogLevel, string> = {
    debug: '🔍',
    info: 'ℹ️',
    success: '✅',
    warning: '⚠️',
    error: '❌'
};

export function isLogLevel(value: string): value is LogLevel | 'silent' {
    return Object.hasOwn(LEVEL_ORDER, value);
}

export class Logger {
    private minLevel: LogLevel | 'silent';
    private sink?: StatusLogCallback;

    constructor(minLevel: LogLevel | 'silent' = 'info', sink?: StatusLogCallback) {
        this.minLevel = minLevel;
        this.sink = sink;
    }

    setLevel(level: LogLevel | 'silent'): this {
        this.minLevel = level;
        return this;
    }

    setSink(sink: StatusLogCallback | undefined): this {
        this.sink = sink;
        return this;
    }

    debug(message: string): void {
        this.log('debug', message);
    }

    info(message: string): void {
        this.log('info', message);
    }

    success(message: string): void {
        this.log('success', message);
    }

    warn(message: string): void {
        this.log('warning', message);
    }

    error(message: string): void {
        this.log('error', message);
    }

    /**
     * Sink messages are not filtered by level; the status panel decides what to show.
     */
    log(level: LogLevel, message: string): void {
        this.sink?.(message, level);

        if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;

        const line = `${LEVEL_PREFIX[level]} ${message}`;
        switch (level) {
            case 'error':
                console.error(line);
                break;
            case 'warning':
                console.warn(line);
                break;
            case 'debug':
                console.debug(line);
                break;
            default:
                console.log(line);
        }
    }
}
