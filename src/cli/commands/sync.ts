import { loadConfig } from "../../config/loader.js";
import type { SaveSyncConfig } from "../../config/types.js";
import { parseSaveFormat, type SaveFormat } from "../../saves/formats.js";
import { SyncEngine, type SyncOptions } from "../../sync/engine.js";
import { formatReport } from "../../sync/report.js";
import { isLogLevel, Logger, LOG_LEVELS, type LogLevel } from "../../utils/logger.js";

export interface SyncCommandOptions {
    romDir?: string;
    srcFormat?: string;
    srcDir?: string;
    dstFormat?: string;
    dstDir?: string;
    /** false with --no-backup, undefined when not given */
    backup?: boolean;
    /** Overwrite regardless of modified times */
    force?: boolean;
    recursive?: boolean;
    loglevel?: string;
    config?: string;
}

function required(value: string | undefined, option: string): string {
    if (value === undefined || value.trim() === "") {
        throw new Error(`Missing required option ${option} (or set it under "defaults" in the config file)`);
    }
    return value;
}

function resolveFormat(value: string | undefined, fallback: SaveFormat | undefined, option: string): SaveFormat {
    if (value !== undefined) {
        return parseSaveFormat(value);
    }
    if (fallback !== undefined) {
        return fallback;
    }
    throw new Error(`Missing required option ${option} (or set it under "defaults" in the config file)`);
}

/**
 * Merge command-line options over the config file. Options given on the command line win.
 */
export function resolveSyncOptions(options: SyncCommandOptions, config: SaveSyncConfig): SyncOptions {
    const defaults = config.defaults;
    return {
        romDir: required(options.romDir ?? defaults.romDir, "--rom-dir"),
        srcFormat: resolveFormat(options.srcFormat, defaults.srcFormat, "--src-format"),
        srcDir: required(options.srcDir ?? defaults.srcDir, "--src-dir"),
        dstFormat: resolveFormat(options.dstFormat, defaults.dstFormat, "--dst-format"),
        dstDir: required(options.dstDir ?? defaults.dstDir, "--dst-dir"),
        backup: options.backup ?? config.backup,
        overwriteOnlyIfNewer: options.force ? false : config.overwriteOnlyIfNewer,
        recursive: options.recursive ?? config.recursive,
        ignore: config.ignore,
    };
}

export function resolveLogLevel(value: string | undefined, config: SaveSyncConfig): LogLevel {
    if (value === undefined) return config.logLevel;
    const level = value.toLowerCase();
    if (!isLogLevel(level)) {
        throw new Error(`Invalid log level: ${value} (expected ${LOG_LEVELS.join(", ")})`);
    }
    return level;
}

export function syncCommand(options: SyncCommandOptions): void {
    try {
        const config = loadConfig(options.config);
        const logger = new Logger({
            level: resolveLogLevel(options.loglevel, config),
            logFile: config.logFile,
            maxLogSizeMB: config.maxLogSizeMB,
            maxLogFiles: config.maxLogFiles,
        });

        const syncOptions = resolveSyncOptions(options, config);
        const report = new SyncEngine({ logger }).sync(syncOptions);

        // Per-file failures are in the report and don't change the exit code
        process.stdout.write(formatReport(report));
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error(`Error: ${message}`);
        process.exit(1);
    }
}
