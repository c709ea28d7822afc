/** Which root directory a {@link DirectoryNotFoundError} refers to. */
export type DirectoryRole = "ROM" | "source save" | "destination save";

export class DirectoryNotFoundError extends Error {
    constructor(public role: DirectoryRole, public dirPath: string) {
        super(`${role} directory does not exist or is not a directory: ${dirPath}`);
        this.name = "DirectoryNotFoundError";
    }
}

export class SameDirectoryError extends Error {
    constructor(public dirPath: string) {
        super(`Source and destination save directories are the same: ${dirPath}`);
        this.name = "SameDirectoryError";
    }
}

export class UnsupportedFormatError extends Error {
    constructor(public value: string) {
        super(`Unsupported save format: ${value} (expected project64, mupen64plus or everdrive)`);
        this.name = "UnsupportedFormatError";
    }
}

export class CopyFailedError extends Error {
    constructor(public sourcePath: string, public destPath: string, public cause?: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super(`Failed to copy ${sourcePath} → ${destPath}: ${reason}`);
        this.name = "CopyFailedError";
    }
}
