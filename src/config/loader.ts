import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import * as yaml from "yaml";
import { isSaveFormat } from "../saves/formats.js";
import { isLogLevel, LOG_LEVELS } from "../utils/logger.js";
import type { SaveSyncConfig, SyncDefaults } from "./types.js";
import { CONFIG_DEFAULTS } from "./types.js";

/**
 * Returns the config home directory: ~/.n64savesync
 */
export function getConfigHome(): string {
    return path.join(os.homedir(), ".n64savesync");
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readBoolean(raw: Record<string, unknown>, key: string, fallback: boolean): boolean {
    const value = raw[key];
    if (value === undefined || value === null) return fallback;
    if (typeof value !== "boolean") {
        throw new Error(`${key} must be true or false`);
    }
    return value;
}

function validateDefaults(value: unknown): SyncDefaults {
    if (value === undefined || value === null) return {};
    if (!isRecord(value)) {
        throw new Error("defaults must be an object");
    }

    const defaults: SyncDefaults = {};
    for (const key of ["romDir", "srcDir", "dstDir"] as const) {
        const dir = value[key];
        if (dir === undefined || dir === null) continue;
        if (typeof dir !== "string" || dir.trim() === "") {
            throw new Error(`defaults.${key} must be a non-empty string`);
        }
        defaults[key] = dir;
    }
    for (const key of ["srcFormat", "dstFormat"] as const) {
        const format = value[key];
        if (format === undefined || format === null) continue;
        const normalized = typeof format === "string" ? format.trim().toLowerCase() : "";
        if (!isSaveFormat(normalized)) {
            throw new Error(`defaults.${key} must be one of project64, mupen64plus, everdrive`);
        }
        defaults[key] = normalized;
    }
    return defaults;
}

/**
 * Validate a loaded configuration object. Throws on invalid config.
 * A missing or empty document yields the defaults.
 */
export function validateConfig(config: unknown): SaveSyncConfig {
    if (config === undefined || config === null) {
        config = {};
    }
    if (!isRecord(config)) {
        throw new Error("Configuration must be a YAML object");
    }
    const raw = config;

    const backup = readBoolean(raw, "backup", CONFIG_DEFAULTS.backup);
    const overwriteOnlyIfNewer = readBoolean(raw, "overwriteOnlyIfNewer", CONFIG_DEFAULTS.overwriteOnlyIfNewer);
    const recursive = readBoolean(raw, "recursive", CONFIG_DEFAULTS.recursive);

    const rawIgnore = raw.ignore ?? [];
    if (!Array.isArray(rawIgnore)) {
        throw new Error("ignore must be an array of glob patterns");
    }
    const ignore = rawIgnore.filter((i): i is string => typeof i === "string");

    const rawLogLevel = raw.logLevel ?? CONFIG_DEFAULTS.logLevel;
    if (typeof rawLogLevel !== "string" || !isLogLevel(rawLogLevel)) {
        throw new Error(`logLevel must be one of ${LOG_LEVELS.join(", ")}`);
    }
    const logLevel = rawLogLevel;

    const maxLogSizeMB =
        typeof raw.maxLogSizeMB === "number" ? raw.maxLogSizeMB : CONFIG_DEFAULTS.maxLogSizeMB;
    if (maxLogSizeMB <= 0) {
        throw new Error("maxLogSizeMB must be a positive number");
    }

    const maxLogFiles =
        typeof raw.maxLogFiles === "number" ? raw.maxLogFiles : CONFIG_DEFAULTS.maxLogFiles;
    if (maxLogFiles <= 0 || !Number.isInteger(maxLogFiles)) {
        throw new Error("maxLogFiles must be a positive integer");
    }

    const result: SaveSyncConfig = {
        backup,
        overwriteOnlyIfNewer,
        recursive,
        ignore,
        logLevel,
        maxLogSizeMB,
        maxLogFiles,
        defaults: validateDefaults(raw.defaults),
    };

    const logFile = raw.logFile;
    if (typeof logFile === "string" && logFile.trim() !== "") {
        result.logFile = logFile.trim();
    }

    return result;
}

/**
 * Load and validate the config from a YAML file.
 * Returns the defaults when the file doesn't exist.
 * @param configDir Directory containing the config file (defaults to ~/.n64savesync)
 */
export function loadConfig(configDir?: string): SaveSyncConfig {
    const dir = configDir ?? getConfigHome();
    const configPath = path.join(dir, CONFIG_DEFAULTS.configFileName);

    if (!fs.existsSync(configPath)) {
        return validateConfig({});
    }

    const raw = fs.readFileSync(configPath, "utf-8");
    let parsed: unknown;
    try {
        parsed = yaml.parse(raw);
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new Error(`Invalid YAML in ${configPath}: ${message}`);
    }
    return validateConfig(parsed);
}

/**
 * Write a default .n64savesync.yml configuration file.
 * @param configDir Directory to write the config file to (defaults to ~/.n64savesync)
 * @returns The path of the created file
 */
export function writeDefaultConfig(configDir?: string): string {
    const dir = configDir ?? getConfigHome();
    const configPath = path.join(dir, CONFIG_DEFAULTS.configFileName);

    if (fs.existsSync(configPath)) {
        throw new Error(`Config file already exists: ${configPath}`);
    }

    fs.mkdirSync(dir, { recursive: true });

    const template = [
        "# N64 save sync configuration",
        "",
        "# Copy the destination save into <dst-dir>/backup before overwriting it",
        "backup: true",
        "",
        "# Only overwrite a destination save that is older than the source",
        "overwriteOnlyIfNewer: true",
        "",
        "# Search the ROM directory recursively",
        "recursive: false",
        "",
        "# Glob patterns of ROM files to skip, relative to the ROM directory",
        "ignore: []",
        "",
        "# Log level: error | warn | info | debug",
        "logLevel: warn",
        "",
        "# Log to a file as well as stderr (optional)",
        "# logFile: /home/user/.n64savesync/logs/n64savesync.log",
        "# maxLogSizeMB: 10    # Max log file size in MB before rotation (default: 10)",
        "# maxLogFiles: 5      # Max number of rotated log files to keep (default: 5)",
        "",
        "# Values used when the matching command-line option is left out (optional)",
        "# Formats: project64 | mupen64plus | everdrive",
        "defaults:",
        "#   romDir: /home/user/roms/n64",
        "#   srcFormat: project64",
        "#   srcDir: /home/user/Project64/Save",
        "#   dstFormat: everdrive",
        "#   dstDir: /media/sdcard/ED64/gamedata",
    ].join("\n") + "\n";

    fs.writeFileSync(configPath, template, "utf-8");
    return configPath;
}
