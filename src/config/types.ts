import type { SaveFormat } from "../saves/formats.js";
import type { LogLevel } from "../utils/logger.js";

/**
 * Directories and formats used when the matching CLI option is left out.
 */
export interface SyncDefaults {
    romDir?: string;
    srcFormat?: SaveFormat;
    srcDir?: string;
    dstFormat?: SaveFormat;
    dstDir?: string;
}

/**
 * Top-level configuration (maps to .n64savesync.yml).
 */
export interface SaveSyncConfig {
    /** Back up destination saves before overwriting them */
    backup: boolean;
    /** Only overwrite a destination save older than its source */
    overwriteOnlyIfNewer: boolean;
    /** Search the ROM directory recursively */
    recursive: boolean;
    /** Glob patterns of ROM files to leave out, relative to the ROM directory */
    ignore: string[];
    /** Most verbose log level written */
    logLevel: LogLevel;
    /** Optional log file, in addition to stderr */
    logFile?: string;
    /** Maximum size of a single log file in MB before rotation (default: 10) */
    maxLogSizeMB: number;
    /** Maximum number of rotated log files to keep (default: 5) */
    maxLogFiles: number;
    defaults: SyncDefaults;
}

const DEFAULT_LOG_LEVEL: LogLevel = "warn";

/** Default configuration values */
export const CONFIG_DEFAULTS = {
    backup: true,
    overwriteOnlyIfNewer: true,
    recursive: false,
    logLevel: DEFAULT_LOG_LEVEL,
    maxLogSizeMB: 10,
    maxLogFiles: 5,
    configFileName: ".n64savesync.yml",
} as const;
