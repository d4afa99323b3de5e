/**
 * Structured logging on top of pino.
 *
 * Call sites use a message-first signature (`logger.info("msg", { ctx })`);
 * the adapter flips it to pino's object-first form.
 *
 * @module logger
 */

import pino from "pino";

export type LogContext = Record<string, unknown>;

export interface Logger {
    debug(message: string, context?: LogContext): void;
    info(message: string, context?: LogContext): void;
    warn(message: string, context?: LogContext): void;
    error(message: string, context?: LogContext): void;
}

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

/** Unset, blank or unknown values fall back to `info`; pino throws on them. */
export function resolveLogLevel(value: string | undefined): LogLevel {
    const level = value?.trim().toLowerCase() ?? "";
    return isLogLevel(level) ? level : "info";
}

const root = pino({
    name: "invoice-extract",
    level: resolveLogLevel(process.env.LOG_LEVEL),
});

// pino children copy the level at creation, so track them for setLogLevel.
const children: pino.Logger[] = [];

export function createLogger(module: string): Logger {
    const child = root.child({ module });
    children.push(child);

    return {
        debug: (message, context) => child.debug(context ?? {}, message),
        info: (message, context) => child.info(context ?? {}, message),
        warn: (message, context) => child.warn(context ?? {}, message),
        error: (message, context) => child.error(context ?? {}, message),
    };
}

/** Apply a level from loaded config after startup. */
export function setLogLevel(level: string): void {
    const resolved = resolveLogLevel(level);
    root.level = resolved;
    for (const child of children) {
        child.level = resolved;
    }
}
