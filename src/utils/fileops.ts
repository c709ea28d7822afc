import * as fs from "node:fs";
import * as path from "node:path";

/**
 * Copy a file byte for byte, then give the copy the source's access and modified times.
 * Creates parent directories as needed.
 */
export function copyFilePreservingTimes(srcPath: string, destPath: string): void {
    // Check source is accessible
    try {
        fs.accessSync(srcPath, fs.constants.R_OK);
    } catch {
        throw new Error(`Permission denied reading: ${srcPath}`);
    }

    const destParent = path.dirname(destPath);
    fs.mkdirSync(destParent, { recursive: true });

    try {
        fs.accessSync(destParent, fs.constants.W_OK);
    } catch {
        throw new Error(`Permission denied writing to: ${destParent}`);
    }

    if (fs.existsSync(destPath)) {
        try {
            fs.accessSync(destPath, fs.constants.W_OK);
        } catch {
            throw new Error(`File locked or permission denied: ${destPath}`);
        }
    }

    fs.copyFileSync(srcPath, destPath);

    // Seconds as a float keep sub-millisecond precision, Date objects would truncate it
    const srcStat = fs.statSync(srcPath);
    fs.utimesSync(destPath, srcStat.atimeMs / 1000, srcStat.mtimeMs / 1000);
}

/**
 * Copy `filePath` into `backupDir` under the same file name, replacing an earlier backup.
 * @returns The path of the backup copy
 */
export function backupFile(filePath: string, backupDir: string): string {
    const backupPath = path.join(backupDir, path.basename(filePath));
    copyFilePreservingTimes(filePath, backupPath);
    return backupPath;
}

/**
 * Check if a path exists and is a directory.
 */
export function isDirectory(dirPath: string): boolean {
    try {
        return fs.statSync(dirPath).isDirectory();
    } catch {
        return false;
    }
}

/**
 * Modified times compared at whole-millisecond precision, so a copy whose time
 * went through utimes compares equal to its source.
 */
export function isNewer(srcMtimeMs: number, destMtimeMs: number): boolean {
    return Math.round(srcMtimeMs) > Math.round(destMtimeMs);
}
