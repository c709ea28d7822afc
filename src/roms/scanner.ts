import * as fs from "node:fs";
import * as path from "node:path";
import { minimatch } from "minimatch";
import { DirectoryNotFoundError } from "../errors.js";
import { isDirectory } from "../utils/fileops.js";

/** ROM file extensions, matched case-insensitively */
export const ROM_EXTENSIONS = [".z64", ".n64", ".v64"] as const;

const ROM_PATTERN = `*{${ROM_EXTENSIONS.join(",")}}`;

/**
 * A ROM found in the catalog directory.
 */
export interface RomEntry {
    /** Canonical game name: file name without extension, tags in brackets kept */
    name: string;
    /** Absolute path of the ROM file */
    path: string;
}

export interface ScanOptions {
    /** Walk subdirectories too (default: false) */
    recursive?: boolean;
    /** Glob patterns, relative to the ROM directory, of files to leave out */
    ignore?: string[];
    /** Called for a subdirectory that can't be read; the walk skips it and carries on */
    onUnreadableDir?: (dirPath: string, err: unknown) => void;
}

export function isRomFileName(fileName: string): boolean {
    return minimatch(fileName, ROM_PATTERN, { nocase: true, dot: true });
}

/**
 * Canonical game name of a ROM file: its base name without the extension.
 */
export function canonicalGameName(romPath: string): string {
    const baseName = path.basename(romPath);
    return baseName.slice(0, baseName.length - path.extname(baseName).length);
}

/**
 * Check the ROM directory and enumerate its ROMs lazily, sorted by path.
 * The directory check happens immediately, not on first iteration.
 * @throws DirectoryNotFoundError if `romDir` is missing or not a directory
 */
export function scanRoms(romDir: string, options: ScanOptions = {}): Generator<RomEntry> {
    const root = path.resolve(romDir);
    if (!isDirectory(root)) {
        throw new DirectoryNotFoundError("ROM", root);
    }
    return walk(root, root, options.recursive ?? false, options.ignore ?? [], options.onUnreadableDir);
}

/** Follows symbolic links; false for dangling ones. */
function isRegularFile(entry: fs.Dirent, fullPath: string): boolean {
    if (entry.isFile()) return true;
    if (!entry.isSymbolicLink()) return false;
    try {
        return fs.statSync(fullPath).isFile();
    } catch {
        return false;
    }
}

function* walk(
    currentPath: string,
    root: string,
    recursive: boolean,
    ignorePatterns: string[],
    onUnreadableDir?: (dirPath: string, err: unknown) => void,
): Generator<RomEntry> {
    let entries: fs.Dirent[];
    try {
        entries = fs.readdirSync(currentPath, { withFileTypes: true });
    } catch (err) {
        if (currentPath === root || !onUnreadableDir) throw err;
        onUnreadableDir(currentPath, err);
        return;
    }
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
        const fullPath = path.join(currentPath, entry.name);
        const relativePath = path.relative(root, fullPath).split(path.sep).join("/");

        if (ignorePatterns.some((pattern) => minimatch(relativePath, pattern, { dot: true }))) {
            continue;
        }

        if (entry.isDirectory()) {
            if (recursive) {
                yield* walk(fullPath, root, recursive, ignorePatterns, onUnreadableDir);
            }
        } else if (isRomFileName(entry.name) && isRegularFile(entry, fullPath)) {
            yield { name: canonicalGameName(entry.name), path: fullPath };
        }
    }
}

