import { UnsupportedFormatError } from "../errors.js";
import type { ControllerPakSlot, SaveKind } from "./kinds.js";

/**
 * Save-storage convention of an N64 emulation platform.
 * - `project64`: one folder per game, named "<INTERNAL NAME>-<hex id>"
 * - `mupen64plus`: flat, one consolidated .srm per game (also used by RetroArch)
 * - `everdrive`: flat, one file per save kind, named after the ROM
 */
export type SaveFormat = "project64" | "mupen64plus" | "everdrive";

export const SAVE_FORMATS: readonly SaveFormat[] = ["project64", "mupen64plus", "everdrive"];

/**
 * Whether a format keeps a game's saves in the save root or in a folder of their own.
 */
export type SaveLayout = "flat" | "per-game-folder";

/**
 * Result of matching a directory name against a per-game folder pattern.
 */
export interface SubfolderMatch {
    /** Title part of the folder name, as found on disk */
    title: string;
    /** Opaque identifier after the title; never computed, only read back */
    id: string;
}

/**
 * Naming and layout rules of one save format. Pure lookups, no I/O.
 */
export interface SaveFormatRules {
    format: SaveFormat;
    layout: SaveLayout;
    /**
     * Match a directory name against this format's per-game folder naming.
     * Returns null for names that don't belong to `title`.
     * Only defined for per-game-folder layouts.
     */
    matchSubfolder?(dirName: string, title: string): SubfolderMatch | null;
    /** File extension (with dot) for a save kind, or undefined if the format can't hold it */
    extensionFor(kind: SaveKind): string | undefined;
    /** Suffix appended to the base name before the extension of a controller pak file */
    controllerPakSuffix(slot: ControllerPakSlot): string;
}

/** "<title>-<hex id>", the id being 8 to 32 hex digits. */
const PER_GAME_FOLDER_PATTERN = /^(.+)-([0-9A-Fa-f]{8,32})$/;

function matchPerGameFolder(dirName: string, title: string): SubfolderMatch | null {
    const match = PER_GAME_FOLDER_PATTERN.exec(dirName);
    if (!match) return null;
    const [, folderTitle, id] = match;
    if (folderTitle.trim().toLowerCase() !== title.trim().toLowerCase()) {
        return null;
    }
    return { title: folderTitle, id };
}

function slotSuffixExceptFirst(slot: ControllerPakSlot): string {
    return slot === 1 ? "" : `_Cont_${slot}`;
}

const EVERDRIVE_RULES: SaveFormatRules = {
    format: "everdrive",
    layout: "flat",
    extensionFor(kind) {
        switch (kind.type) {
            case "sram":
                return ".srm";
            case "eeprom":
                return ".eep";
            case "flashram":
                return ".fla";
            case "controller-pak":
                return ".mpk";
        }
    },
    controllerPakSuffix: slotSuffixExceptFirst,
};

const MUPEN64PLUS_RULES: SaveFormatRules = {
    format: "mupen64plus",
    layout: "flat",
    extensionFor(kind) {
        // Controller paks live inside the consolidated .srm and aren't copied per slot
        return kind.type === "controller-pak" ? undefined : ".srm";
    },
    controllerPakSuffix: slotSuffixExceptFirst,
};

const PROJECT64_RULES: SaveFormatRules = {
    format: "project64",
    layout: "per-game-folder",
    matchSubfolder: matchPerGameFolder,
    extensionFor(kind) {
        switch (kind.type) {
            case "sram":
                return ".sra";
            case "eeprom":
                return ".eep";
            case "flashram":
                return ".fla";
            case "controller-pak":
                return ".mpk";
        }
    },
    // Project64 numbers every pak, the first one included
    controllerPakSuffix: (slot) => `_Cont_${slot}`,
};

const REGISTRY: Record<SaveFormat, SaveFormatRules> = {
    everdrive: EVERDRIVE_RULES,
    mupen64plus: MUPEN64PLUS_RULES,
    project64: PROJECT64_RULES,
};

/**
 * Look up the rules of a save format. An unknown format is a programming error.
 */
export function getFormatRules(format: SaveFormat): SaveFormatRules {
    const rules = REGISTRY[format];
    if (!rules) {
        throw new UnsupportedFormatError(String(format));
    }
    return rules;
}

export function isSaveFormat(value: string): value is SaveFormat {
    return SAVE_FORMATS.some((format) => format === value);
}

/**
 * Parse a user-supplied format name (case-insensitive).
 */
export function parseSaveFormat(value: string): SaveFormat {
    const normalized = value.trim().toLowerCase();
    if (!isSaveFormat(normalized)) {
        throw new UnsupportedFormatError(value);
    }
    return normalized;
}

/**
 * File name (without directory) of a save kind for a given base name, or undefined
 * if the format has no file for that kind.
 */
export function saveFileName(rules: SaveFormatRules, baseName: string, kind: SaveKind): string | undefined {
    const extension = rules.extensionFor(kind);
    if (extension === undefined) return undefined;
    const suffix = kind.type === "controller-pak" ? rules.controllerPakSuffix(kind.slot) : "";
    return `${baseName}${suffix}${extension}`;
}
