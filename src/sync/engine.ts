import * as fs from "node:fs";
import * as path from "node:path";
import { DirectoryNotFoundError, SameDirectoryError, CopyFailedError } from "../errors.js";
import { scanRoms } from "../roms/scanner.js";
import type { SaveFormat } from "../saves/formats.js";
import { ALL_SAVE_KINDS, saveKindLabel, type SaveKind } from "../saves/kinds.js";
import { locateSaves, type SavePathEntry } from "../saves/locator.js";
import { backupFile, copyFilePreservingTimes, isDirectory, isNewer } from "../utils/fileops.js";
import { Logger } from "../utils/logger.js";

/** Name of the folder, under the destination save root, holding pre-overwrite copies */
export const BACKUP_DIR_NAME = "backup";

/**
 * What happened to one save kind of one game.
 * - `copied`: destination was missing (or backups are off) and the source was copied
 * - `backed_up_and_copied`: destination was backed up, then overwritten
 * - `skipped_not_newer`: destination is as new as the source or newer
 * - `skipped_no_source`: no source save of this kind
 * - `skipped_no_destination`: destination format has no place for this save, or the
 *   destination file already takes another kind of the same game
 * - `failed`: backup or copy raised an error
 */
export type SyncStatus =
    | "copied"
    | "backed_up_and_copied"
    | "skipped_not_newer"
    | "skipped_no_source"
    | "skipped_no_destination"
    | "failed";

export interface KindSyncResult {
    kind: SaveKind;
    status: SyncStatus;
    sourcePath?: string;
    destPath?: string;
    backupPath?: string;
    /** Error message, for `failed` */
    error?: string;
}

export interface GameSyncResult {
    gameName: string;
    romPath: string;
    kinds: KindSyncResult[];
}

export interface SyncReport {
    games: GameSyncResult[];
    copied: number;
    backedUp: number;
    skipped: number;
    failed: number;
}

export interface SyncOptions {
    romDir: string;
    srcFormat: SaveFormat;
    srcDir: string;
    dstFormat: SaveFormat;
    dstDir: string;
    /** Back up destination files before overwriting them (default: true) */
    backup?: boolean;
    /** Only overwrite a destination file older than its source (default: true) */
    overwriteOnlyIfNewer?: boolean;
    /** Walk subdirectories of the ROM directory (default: false) */
    recursive?: boolean;
    /** Glob patterns of ROM files to leave out */
    ignore?: string[];
}

export interface SyncEngineOptions {
    logger?: Logger;
}

/**
 * Copies each game's saves from one save format to another.
 */
export class SyncEngine {
    private logger: Logger;

    constructor(options: SyncEngineOptions = {}) {
        this.logger = options.logger ?? new Logger({ sink: null });
    }

    /**
     * Sync the saves of every ROM in `options.romDir`.
     * Per-file failures are recorded in the report; only unusable directories throw.
     * @throws DirectoryNotFoundError if a root directory is missing
     * @throws SameDirectoryError if source and destination are the same directory
     */
    sync(options: SyncOptions): SyncReport {
        const backup = options.backup ?? true;
        const overwriteOnlyIfNewer = options.overwriteOnlyIfNewer ?? true;
        const srcDir = path.resolve(options.srcDir);
        const dstDir = path.resolve(options.dstDir);

        const roms = scanRoms(options.romDir, {
            recursive: options.recursive,
            ignore: options.ignore,
            onUnreadableDir: (dirPath, err) => {
                const message = err instanceof Error ? err.message : String(err);
                this.logger.warn(`Skipping unreadable ROM directory ${dirPath}: ${message}`);
            },
        });
        if (!isDirectory(srcDir)) {
            throw new DirectoryNotFoundError("source save", srcDir);
        }
        if (!isDirectory(dstDir)) {
            throw new DirectoryNotFoundError("destination save", dstDir);
        }
        if (fs.realpathSync(srcDir) === fs.realpathSync(dstDir)) {
            throw new SameDirectoryError(srcDir);
        }

        this.logger.info(`Source: ${options.srcFormat} ${srcDir}`);
        this.logger.info(`Destination: ${options.dstFormat} ${dstDir}`);

        const report: SyncReport = { games: [], copied: 0, backedUp: 0, skipped: 0, failed: 0 };

        for (const rom of roms) {
            this.logger.debug(`ROM: ${rom.path}`);
            const sources = locateSaves(rom.name, options.srcFormat, srcDir, { romPath: rom.path });
            const destinations = locateSaves(rom.name, options.dstFormat, dstDir, { romPath: rom.path });

            const game: GameSyncResult = { gameName: rom.name, romPath: rom.path, kinds: [] };
            const claimed = new Set<string>();
            for (const kind of ALL_SAVE_KINDS) {
                const label = saveKindLabel(kind);
                const result = this.syncKind(
                    kind,
                    sources.get(label),
                    destinations.get(label),
                    claimed,
                    path.join(dstDir, BACKUP_DIR_NAME),
                    backup,
                    overwriteOnlyIfNewer,
                );
                game.kinds.push(result);
                this.tally(report, result);
            }
            report.games.push(game);
        }

        this.logger.info(
            `Sync complete: ${report.games.length} game(s), copied:${report.copied} ` +
            `backed up:${report.backedUp} skipped:${report.skipped} failed:${report.failed}`,
        );
        return report;
    }

    private syncKind(
        kind: SaveKind,
        source: SavePathEntry | undefined,
        dest: SavePathEntry | undefined,
        claimed: Set<string>,
        backupDir: string,
        backup: boolean,
        overwriteOnlyIfNewer: boolean,
    ): KindSyncResult {
        // A file shared by several kinds belongs to the first of them
        if (!source || !source.exists || source.path === null || source.aliasOf !== undefined) {
            return { kind, status: "skipped_no_source" };
        }
        const sourcePath = source.path;

        if (!dest || dest.path === null) {
            this.logger.warn(
                `No destination for ${sourcePath} (${saveKindLabel(kind)}): ` +
                "the format can't hold it or the game's save folder doesn't exist",
            );
            return { kind, status: "skipped_no_destination", sourcePath };
        }
        const destPath = dest.path;

        // One source per destination file: Mupen64Plus keeps all cartridge saves in one .srm
        if (claimed.has(destPath)) {
            this.logger.warn(
                `Not copying ${sourcePath} (${saveKindLabel(kind)}): ${destPath} already takes another save of this game`,
            );
            return { kind, status: "skipped_no_destination", sourcePath, destPath };
        }
        claimed.add(destPath);

        if (dest.exists && overwriteOnlyIfNewer && !isNewer(source.mtimeMs ?? 0, dest.mtimeMs ?? 0)) {
            this.logger.debug(`Not newer, skipping: ${sourcePath} → ${destPath}`);
            return { kind, status: "skipped_not_newer", sourcePath, destPath };
        }

        let backupPath: string | undefined;
        try {
            if (dest.exists && backup) {
                backupPath = backupFile(destPath, backupDir);
                this.logger.info(`Backed up ${destPath} → ${backupPath}`);
            }
            copyFilePreservingTimes(sourcePath, destPath);
        } catch (err) {
            const error = new CopyFailedError(sourcePath, destPath, err);
            this.logger.error(error.message);
            return { kind, status: "failed", sourcePath, destPath, backupPath, error: error.message };
        }

        this.logger.info(`Copied ${sourcePath} → ${destPath}`);
        return backupPath !== undefined
            ? { kind, status: "backed_up_and_copied", sourcePath, destPath, backupPath }
            : { kind, status: "copied", sourcePath, destPath };
    }

    private tally(report: SyncReport, result: KindSyncResult): void {
        switch (result.status) {
            case "copied":
                report.copied++;
                break;
            case "backed_up_and_copied":
                report.copied++;
                report.backedUp++;
                break;
            case "failed":
                report.failed++;
                break;
            case "skipped_not_newer":
            case "skipped_no_destination":
                report.skipped++;
                break;
            case "skipped_no_source":
                break;
        }
    }
}
