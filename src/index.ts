export { loadConfig, writeDefaultConfig, validateConfig } from "./config/index.js";
export type { SaveSyncConfig, SyncDefaults } from "./config/index.js";
export { SyncEngine, BACKUP_DIR_NAME, formatReport } from "./sync/index.js";
export type { SyncOptions, SyncReport, SyncStatus, GameSyncResult, KindSyncResult } from "./sync/index.js";
export { scanRoms, readRomHeader } from "./roms/index.js";
export type { RomEntry, RomHeader } from "./roms/index.js";
export { locateSaves, getFormatRules, parseSaveFormat, ALL_SAVE_KINDS, saveKindLabel } from "./saves/index.js";
export type { SaveFormat, SaveKind, SavePathEntry } from "./saves/index.js";
export {
    DirectoryNotFoundError,
    CopyFailedError,
    UnsupportedFormatError,
    SameDirectoryError,
} from "./errors.js";
export { Logger } from "./utils/logger.js";
export type { LogLevel } from "./utils/logger.js";
