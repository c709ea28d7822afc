import * as fs from "node:fs";
import * as path from "node:path";

const DEFAULT_MAX_LOG_SIZE_MB = 10;
const DEFAULT_MAX_LOG_FILES = 5;

export type LogLevel = "error" | "warn" | "info" | "debug";

export const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];

/** Where log lines go besides the optional log file. */
export type LogSink = (line: string) => void;

export interface LoggerOptions {
    /** Most verbose level written (default: warn) */
    level?: LogLevel;
    /** Also append lines to this file, rotating it by size */
    logFile?: string;
    maxLogSizeMB?: number;
    maxLogFiles?: number;
    /** Defaults to stderr; pass null to write to the log file only */
    sink?: LogSink | null;
}

export function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

export class Logger {
    private level: LogLevel;
    private logFile: string | undefined;
    private maxLogSize: number;
    private maxLogFiles: number;
    private sink: LogSink | null;

    constructor(options: LoggerOptions = {}) {
        this.level = options.level ?? "warn";
        this.logFile = options.logFile;
        this.maxLogSize = (options.maxLogSizeMB ?? DEFAULT_MAX_LOG_SIZE_MB) * 1024 * 1024;
        this.maxLogFiles = options.maxLogFiles ?? DEFAULT_MAX_LOG_FILES;
        this.sink = options.sink === undefined ? (line) => process.stderr.write(line) : options.sink;
        if (this.logFile) {
            fs.mkdirSync(path.dirname(this.logFile), { recursive: true });
        }
    }

    /**
     * Get the path to the current log file, if file logging is on.
     */
    getLogFilePath(): string | undefined {
        return this.logFile;
    }

    isEnabled(level: LogLevel): boolean {
        return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(this.level);
    }

    error(message: string): void {
        this.write("error", message);
    }

    warn(message: string): void {
        this.write("warn", message);
    }

    info(message: string): void {
        this.write("info", message);
    }

    debug(message: string): void {
        this.write("debug", message);
    }

    private write(level: LogLevel, message: string): void {
        if (!this.isEnabled(level)) return;

        const timestamp = new Date().toISOString();
        const line = `[${timestamp}] [${level.toUpperCase()}] ${message}\n`;

        this.sink?.(line);
        if (this.logFile) {
            this.rotateIfNeeded(this.logFile);
            fs.appendFileSync(this.logFile, line, "utf-8");
        }
    }

    private rotateIfNeeded(logFile: string): void {
        try {
            if (!fs.existsSync(logFile)) return;

            const stat = fs.statSync(logFile);
            if (stat.size < this.maxLogSize) return;

            const ext = path.extname(logFile);
            const base = logFile.slice(0, logFile.length - ext.length);
            const numbered = (i: number): string => `${base}.${i}${ext}`;

            // Shift existing numbered logs, dropping the oldest
            for (let i = this.maxLogFiles - 1; i > 0; i--) {
                const from = numbered(i);
                if (fs.existsSync(from)) {
                    if (i + 1 >= this.maxLogFiles) {
                        fs.unlinkSync(from);
                    } else {
                        fs.renameSync(from, numbered(i + 1));
                    }
                }
            }

            fs.renameSync(logFile, numbered(1));
        } catch (err) {
            // Keep writing to the current file
            const message = err instanceof Error ? err.message : String(err);
            this.sink?.(`[${new Date().toISOString()}] [WARN] Log rotation failed: ${message}\n`);
        }
    }
}
