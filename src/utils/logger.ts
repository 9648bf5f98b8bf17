export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";
export type LogContext = Record<string, unknown>;

export interface Logger {
    debug: (message: string, ...args: unknown[]) => void;
    info: (message: string, ...args: unknown[]) => void;
    warn: (message: string, ...args: unknown[]) => void;
    error: (message: string, ...args: unknown[]) => void;
    child: (scope: string) => Logger;
}

const LOG_LEVELS: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

export function isLogLevel(value: string): value is LogLevel {
    return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

function defaultLogLevel(): LogLevel {
    const configured = process.env.LOG_LEVEL?.trim().toLowerCase();
    if (configured && isLogLevel(configured)) {
        return configured;
    }
    if (configured) {
        return "silent";
    }
    return process.env.NODE_ENV === "production" ? "warn" : "debug";
}

let currentLevel: LogLevel = defaultLogLevel();

/** Overrides the process-wide level once configuration has been validated. */
export function setLogLevel(level: LogLevel): void {
    currentLevel = level;
}

function isLogContextCandidate(value: unknown): value is LogContext {
    return (
        typeof value === "object" &&
        value !== null &&
        !Array.isArray(value) &&
        !(value instanceof Error)
    );
}

function normalizeError(error: unknown): unknown {
    if (!(error instanceof Error)) {
        return error;
    }

    return {
        name: error.name,
        message: error.message,
        stack: error.stack,
    };
}

function normalizeArgs(args: unknown[]): unknown[] {
    const [first, ...rest] = args;
    if (!isLogContextCandidate(first)) {
        return args.map(normalizeError);
    }

    const context: LogContext = {};
    for (const [key, value] of Object.entries(first)) {
        context[key] = normalizeError(value);
    }
    return [context, ...rest.map(normalizeError)];
}

const writers: Record<Exclude<LogLevel, "silent">, (...data: unknown[]) => void> = {
    debug: (...data) => console.debug(...data),
    info: (...data) => console.info(...data),
    warn: (...data) => console.warn(...data),
    error: (...data) => console.error(...data),
};

function emit(
    level: Exclude<LogLevel, "silent">,
    scope: string | null,
    message: string,
    args: unknown[],
): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[currentLevel]) {
        return;
    }

    const prefix = scope
        ? `[${level.toUpperCase()}] [${scope}] ${message}`
        : `[${level.toUpperCase()}] ${message}`;

    writers[level](prefix, ...normalizeArgs(args));
}

export function createLogger(scope?: string): Logger {
    const scoped = scope?.trim() || null;

    return {
        debug: (message, ...args) => emit("debug", scoped, message, args),
        info: (message, ...args) => emit("info", scoped, message, args),
        warn: (message, ...args) => emit("warn", scoped, message, args),
        error: (message, ...args) => emit("error", scoped, message, args),
        child: (childScope: string) => {
            const trimmed = childScope.trim();
            return createLogger(scoped ? `${scoped}.${trimmed}` : trimmed);
        },
    };
}

export function logErrorWithContext(
    loggerInstance: Logger,
    message: string,
    error: unknown,
    context: LogContext = {},
): void {
    loggerInstance.error(message, {
        ...context,
        error,
    });
}

export const logger = createLogger();
