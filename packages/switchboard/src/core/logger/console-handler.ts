import type { LogEntry, LogHandler } from "./types";

type Palette = { dim: string; cyan: string; green: string; yellow: string; magenta: string; reset: string };

const ANSI: Palette = {
    dim: "\x1b[90m",
    cyan: "\x1b[36m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
    magenta: "\x1b[35m",
    reset: "\x1b[0m",
};

const PLAIN: Palette = { dim: "", cyan: "", green: "", yellow: "", magenta: "", reset: "" };

export type ConsoleHandlerOptions = {
    /** Emit ANSI colors. Defaults to `true`. */
    colors?: boolean;
};

function formatTime(ts: number): string {
    const d = new Date(ts);
    const h = String(d.getHours()).padStart(2, "0");
    const m = String(d.getMinutes()).padStart(2, "0");
    const s = String(d.getSeconds()).padStart(2, "0");
    return `${h}:${m}:${s}`;
}

function formatValue(value: unknown, p: Palette): string {
    if (value === null) return `${p.magenta}null${p.reset}`;
    if (value === undefined) return `${p.dim}undefined${p.reset}`;
    if (typeof value === "string") return `${p.green}"${value}"${p.reset}`;
    if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
        return `${p.yellow}${value}${p.reset}`;
    }
    if (Array.isArray(value)) {
        if (value.length === 0) return "[]";
        return `[${value.map((item) => formatValue(item, p)).join(`${p.dim},${p.reset} `)}]`;
    }
    if (typeof value === "object") {
        const entries = Object.entries(value);
        if (entries.length === 0) return "{}";
        const pairs = entries.map(([k, v]) => `${p.cyan}${k}${p.reset}${p.dim}:${p.reset} ${formatValue(v, p)}`);
        return `${p.dim}{${p.reset} ${pairs.join(`${p.dim},${p.reset} `)} ${p.dim}}${p.reset}`;
    }
    return String(value);
}

/** Prints `HH:MM:SS [level] code → message {details}` to the matching console method. */
export function createConsoleHandler(options: ConsoleHandlerOptions = {}): LogHandler {
    const palette = options.colors === false ? PLAIN : ANSI;

    return (entry: LogEntry) => {
        const tag = entry.level === "debug" ? "switchboard" : entry.level;
        const detailsPart = entry.details ? ` ${formatValue(entry.details, palette)}` : "";
        const line = `${formatTime(entry.timestamp)} [${tag}] ${entry.code} → ${entry.message}${detailsPart}`;

        if (entry.level === "error") {
            console.error(line);
        } else if (entry.level === "warn") {
            console.warn(line);
        } else {
            console.log(line);
        }
    };
}
