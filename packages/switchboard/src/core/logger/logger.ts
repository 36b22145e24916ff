import type { LoggerContext } from "../types";
import type { LogEntry, LogHandler, LoggerOptions, LogLevel } from "./types";

const SEVERITY: Record<LogLevel, number> = { debug: 0, warn: 1, error: 2 };

/**
 * Transport logger: entries fan out to every registered handler.
 * Without handlers it is silent, which makes it the default for signals and managers.
 */
export class Logger implements LoggerContext {
    private readonly handlers: Set<LogHandler> = new Set();
    private threshold: LogLevel;

    constructor(options: LoggerOptions = {}) {
        this.threshold = options.level ?? "debug";
    }

    get level(): LogLevel {
        return this.threshold;
    }

    setLevel(level: LogLevel): void {
        this.threshold = level;
    }

    addHandler(handler: LogHandler): void {
        this.handlers.add(handler);
    }

    removeHandler(handler: LogHandler): void {
        this.handlers.delete(handler);
    }

    debug(code: string, message: string, details?: Record<string, unknown>): void {
        this.emit("debug", code, message, details);
    }

    warn(code: string, message: string, details?: Record<string, unknown>): void {
        this.emit("warn", code, message, details);
    }

    error(code: string, message: string, details?: Record<string, unknown>): void {
        this.emit("error", code, message, details);
    }

    private emit(level: LogLevel, code: string, message: string, details?: Record<string, unknown>): void {
        if (this.handlers.size === 0 || SEVERITY[level] < SEVERITY[this.threshold]) return;
        const entry: LogEntry = { level, code, message, details, timestamp: Date.now() };
        for (const handler of this.handlers) {
            handler(entry);
        }
    }
}
