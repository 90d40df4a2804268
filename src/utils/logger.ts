/**
 * Leveled stderr logging for the grid engine.
 *
 * The threshold comes from GRID_LOG_LEVEL (debug|info|warn|error|silent,
 * default info). Under NODE_ENV=test it defaults to silent. Every line has the
 * shape
 *
 *   [12:34:56.789] [DEBUG] [Gridsight:Pathfinding] Search finished cells=19 ms=0.42
 *
 * with optional key=value fields appended after the message.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/** Flat context appended to a line as key=value pairs */
export type LogFields = Record<string, string | number | boolean>;

export interface Logger {
    debug(message: string, fields?: LogFields): void;
    info(message: string, fields?: LogFields): void;
    warn(message: string, fields?: LogFields): void;
    error(message: string, fields?: LogFields): void;

    /** Logger whose prefix is this one's plus `:prefix` */
    child(prefix: string): Logger;

    isEnabled(level: LogLevel): boolean;
}

type EmittingLevel = Exclude<LogLevel, 'silent'>;

const SEVERITY: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4
};

function isLogLevel(value: string): value is LogLevel {
    return Object.prototype.hasOwnProperty.call(SEVERITY, value);
}

// ───────────────────────────────────────────────────────────────────────────
// Threshold
// ───────────────────────────────────────────────────────────────────────────

let threshold: LogLevel | undefined;

function levelFromEnv(): LogLevel {
    const fromEnv = process.env.GRID_LOG_LEVEL?.trim().toLowerCase();
    if (fromEnv !== undefined && isLogLevel(fromEnv)) {
        return fromEnv;
    }
    return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

function currentThreshold(): LogLevel {
    threshold ??= levelFromEnv();
    return threshold;
}

/** Forget any override and re-read the environment on the next log call */
export function resetLogLevel(): void {
    threshold = undefined;
}

export function setLogLevel(level: LogLevel): void {
    threshold = level;
}

// ───────────────────────────────────────────────────────────────────────────
// Formatting
// ───────────────────────────────────────────────────────────────────────────

function formatFields(fields: LogFields | undefined): string {
    if (fields === undefined) return '';

    return Object.entries(fields)
        .map(([key, value]) => ` ${key}=${value}`)
        .join('');
}

function formatLine(level: EmittingLevel, prefix: string, message: string, fields?: LogFields): string {
    const clock = new Date().toISOString().slice(11, 23);
    return `[${clock}] [${level.toUpperCase().padEnd(5)}] [${prefix}] ${message}${formatFields(fields)}`;
}

class StderrLogger implements Logger {
    constructor(private readonly prefix: string) { }

    isEnabled(level: LogLevel): boolean {
        return level !== 'silent' && SEVERITY[level] >= SEVERITY[currentThreshold()];
    }

    private emit(level: EmittingLevel, message: string, fields?: LogFields): void {
        if (this.isEnabled(level)) {
            console.error(formatLine(level, this.prefix, message, fields));
        }
    }

    debug(message: string, fields?: LogFields): void {
        this.emit('debug', message, fields);
    }

    info(message: string, fields?: LogFields): void {
        this.emit('info', message, fields);
    }

    warn(message: string, fields?: LogFields): void {
        this.emit('warn', message, fields);
    }

    error(message: string, fields?: LogFields): void {
        this.emit('error', message, fields);
    }

    child(prefix: string): Logger {
        return new StderrLogger(`${this.prefix}:${prefix}`);
    }
}

/**
 * @example
 * const log = createLogger('Fov');
 * log.debug('Buffer recomputed', { x: 2, y: 5, radius: 10 });
 * // [12:34:56.789] [DEBUG] [Fov] Buffer recomputed x=2 y=5 radius=10
 */
export function createLogger(prefix: string): Logger {
    return new StderrLogger(prefix);
}

export const logger = createLogger('Gridsight');

/**
 * Measures from creation to `done()`, which logs at debug level with an `ms` field
 */
export function createTimer(log: Logger): { done: (message: string, fields?: LogFields) => void } {
    const startedAt = performance.now();
    return {
        done(message: string, fields: LogFields = {}): void {
            const ms = (performance.now() - startedAt).toFixed(2);
            log.debug(message, { ...fields, ms });
        }
    };
}
