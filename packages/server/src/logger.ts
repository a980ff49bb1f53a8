/**
 * logger.ts: line-oriented request and startup logging
 *
 * Every line is `<ISO timestamp> <LEVEL> [scope] message`. The sink is
 * stderr unless a log file was configured at startup; the file is opened
 * once in append mode and shared by every request.
 */

import { createWriteStream } from "fs";
import { once } from "events";
import type { Writable } from "stream";

export type LogLevel = "INFO" | "WARN" | "ERROR";

export interface Logger {
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

export interface LogRecord {
    level: LogLevel;
    scope: string;
    message: string;
}

export function formatLogLine(record: LogRecord, at: Date = new Date()): string {
    return `${at.toISOString()} ${record.level} [${record.scope}] ${record.message}\n`;
}

export function createLogger(sink: Writable, scope: string): Logger {
    const write = (level: LogLevel, message: string) => {
        sink.write(formatLogLine({ level, scope, message }));
    };

    return {
        info: (message) => write("INFO", message),
        warn: (message) => write("WARN", message),
        error: (message) => write("ERROR", message),
    };
}

/**
 * Open the configured log destination. `null` means stderr. Resolves only
 * once the file is open, so an unwritable path fails startup.
 */
export async function openLogSink(logFile: string | null): Promise<Writable> {
    if (logFile === null) return process.stderr;

    const stream = createWriteStream(logFile, { flags: "a", mode: 0o660 });
    // once() rejects if "error" fires first
    await once(stream, "open");
    return stream;
}

export interface MemoryLogger extends Logger {
    records: LogRecord[];
    /** Messages only, in order. */
    lines(): string[];
}

export function createMemoryLogger(scope = "test"): MemoryLogger {
    const records: LogRecord[] = [];
    const push = (level: LogLevel) => (message: string) => {
        records.push({ level, scope, message });
    };

    return {
        records,
        info: push("INFO"),
        warn: push("WARN"),
        error: push("ERROR"),
        lines: () => records.map((r) => r.message),
    };
}
