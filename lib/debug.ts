// lib/debug.ts - Level-gated console logging

const LEVELS = { debug: 10, info: 20, warn: 30, error: 40, silent: 50 } as const;
export type LogLevel = keyof typeof LEVELS;

export const isLogLevel = (value: string): value is LogLevel => Object.hasOwn(LEVELS, value);

/**
 * Active threshold. LOG_LEVEL wins; otherwise development shows everything
 * and every other environment only warnings and errors.
 */
function threshold(): number {
    const configured = (process.env.LOG_LEVEL || "").trim().toLowerCase();
    if (isLogLevel(configured)) return LEVELS[configured];
    return process.env.NODE_ENV === "development" ? LEVELS.debug : LEVELS.warn;
}

const enabled = (level: Exclude<LogLevel, "silent">) => LEVELS[level] >= threshold();

/**
 * Debug logging, development only unless LOG_LEVEL says otherwise
 * @param args - Arguments to log
 */
export const debug = (...args: unknown[]) => {
    if (enabled("debug")) {
        console.log(...args);
    }
};

export const logInfo = (...args: unknown[]) => {
    if (enabled("info")) {
        console.info(...args);
    }
};

export const logWarning = (...args: unknown[]) => {
    if (enabled("warn")) {
        console.warn(...args);
    }
};

/**
 * Error logging; only LOG_LEVEL=silent turns it off
 * @param args - Arguments to log
 */
export const logError = (...args: unknown[]) => {
    if (enabled("error")) {
        console.error(...args);
    }
};
