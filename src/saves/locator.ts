import * as fs from "node:fs";
import * as path from "node:path";
import { readRomHeader } from "../roms/header.js";
import { getFormatRules, saveFileName, type SaveFormat, type SaveFormatRules } from "./formats.js";
import { ALL_SAVE_KINDS, saveKindLabel, type SaveKind } from "./kinds.js";

/**
 * Where a game's save of one kind lives (or would live) for a given format.
 */
export interface SavePathEntry {
    gameName: string;
    kind: SaveKind;
    /** Absolute file path, or null when the format has no place for this save */
    path: string | null;
    exists: boolean;
    /** Last modified time (ms since epoch), present when the file exists */
    mtimeMs?: number;
    /** Label of an earlier kind resolving to the same file, if any */
    aliasOf?: string;
}

export interface LocateOptions {
    /** ROM file of the game; its header name is tried when looking up per-game folders */
    romPath?: string;
}

/**
 * Strip bracketed tags such as "(USA)", "(Rev 1)" or "[!]" from a canonical name.
 */
export function stripTags(gameName: string): string {
    return gameName.replace(/\s*[([][^)\]]*[)\]]/g, "").trim();
}

/**
 * Find the existing per-game folder for a title in `baseDir`.
 * The folder's hash-like id is never computed: the folder must already be on disk.
 */
export function findGameFolder(
    rules: SaveFormatRules,
    baseDir: string,
    titles: string[],
): { dirName: string; title: string } | null {
    const matchSubfolder = rules.matchSubfolder;
    if (!matchSubfolder) return null;

    let dirNames: string[];
    try {
        dirNames = fs
            .readdirSync(baseDir, { withFileTypes: true })
            .filter((entry) => entry.isDirectory())
            .map((entry) => entry.name)
            .sort();
    } catch {
        return null;
    }

    for (const title of titles) {
        for (const dirName of dirNames) {
            const match = matchSubfolder(dirName, title);
            if (match) {
                return { dirName, title: match.title };
            }
        }
    }
    return null;
}

function titleCandidates(gameName: string, romPath?: string): string[] {
    const titles = [stripTags(gameName), gameName];
    if (romPath) {
        const header = readRomHeader(romPath);
        if (header && header.internalName !== "") {
            titles.push(header.internalName);
        }
    }
    return [...new Set(titles.filter((title) => title !== ""))];
}

function statFile(filePath: string): { exists: boolean; mtimeMs?: number } {
    try {
        const stat = fs.statSync(filePath);
        if (stat.isFile()) {
            return { exists: true, mtimeMs: stat.mtimeMs };
        }
    } catch {
        // Missing saves are the common case
    }
    return { exists: false };
}

/**
 * Resolve every save kind of a game for one format.
 * Returns a map keyed by {@link saveKindLabel}, in {@link ALL_SAVE_KINDS} order.
 *
 * Kinds that share a file (Mupen64Plus keeps one .srm per game) carry `aliasOf`
 * pointing at the first kind that resolved to it.
 */
export function locateSaves(
    gameName: string,
    format: SaveFormat,
    baseDir: string,
    options: LocateOptions = {},
): Map<string, SavePathEntry> {
    const rules = getFormatRules(format);
    const root = path.resolve(baseDir);

    let saveDir: string | null = root;
    let baseName = gameName;
    if (rules.layout === "per-game-folder") {
        const folder = findGameFolder(rules, root, titleCandidates(gameName, options.romPath));
        saveDir = folder ? path.join(root, folder.dirName) : null;
        baseName = folder ? folder.title : baseName;
    }

    const entries = new Map<string, SavePathEntry>();
    const firstKindByPath = new Map<string, string>();

    for (const kind of ALL_SAVE_KINDS) {
        const fileName = saveFileName(rules, baseName, kind);
        if (saveDir === null || fileName === undefined) {
            entries.set(saveKindLabel(kind), { gameName, kind, path: null, exists: false });
            continue;
        }

        const label = saveKindLabel(kind);
        const filePath = path.join(saveDir, fileName);
        const entry: SavePathEntry = { gameName, kind, path: filePath, ...statFile(filePath) };
        const aliasOf = firstKindByPath.get(filePath);
        if (aliasOf !== undefined) {
            entry.aliasOf = aliasOf;
        } else {
            firstKindByPath.set(filePath, label);
        }
        entries.set(label, entry);
    }

    return entries;
}
