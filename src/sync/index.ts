export { SyncEngine, BACKUP_DIR_NAME } from "./engine.js";
export type {
    SyncOptions,
    SyncReport,
    SyncStatus,
    GameSyncResult,
    KindSyncResult,
} from "./engine.js";
export { formatReport, formatGame } from "./report.js";
