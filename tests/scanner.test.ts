import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { canonicalGameName, isRomFileName, scanRoms } from "../src/roms/scanner.js";
import { DirectoryNotFoundError } from "../src/errors.js";

function createTempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), "n64savesync-scan-test-"));
}

function cleanupDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}

describe("ROM Catalog Scanner", () => {
    let romDir: string;

    beforeEach(() => {
        romDir = createTempDir();
    });

    afterEach(() => {
        cleanupDir(romDir);
    });

    describe("isRomFileName", () => {
        it("should accept .z64, .n64 and .v64 in any case", () => {
            expect(isRomFileName("Game.z64")).toBe(true);
            expect(isRomFileName("Game.N64")).toBe(true);
            expect(isRomFileName("Game.V64")).toBe(true);
        });

        it("should reject other extensions", () => {
            expect(isRomFileName("Game.zip")).toBe(false);
            expect(isRomFileName("Game.z64.txt")).toBe(false);
            expect(isRomFileName("z64")).toBe(false);
        });
    });

    describe("canonicalGameName", () => {
        it("should strip only the extension and keep bracketed tags", () => {
            expect(canonicalGameName("/roms/Perfect Dark (USA) (Rev 1).z64")).toBe("Perfect Dark (USA) (Rev 1)");
            expect(canonicalGameName("F-Zero X (USA).V64")).toBe("F-Zero X (USA)");
        });
    });

    describe("scanRoms", () => {
        it("should list ROMs sorted by name and skip other files", () => {
            fs.writeFileSync(path.join(romDir, "Wave Race 64 (USA).n64"), "rom");
            fs.writeFileSync(path.join(romDir, "F-Zero X (USA).z64"), "rom");
            fs.writeFileSync(path.join(romDir, "readme.txt"), "text");
            fs.writeFileSync(path.join(romDir, "Perfect Dark (USA).V64"), "rom");

            const roms = [...scanRoms(romDir)];
            expect(roms.map((rom) => rom.name)).toEqual([
                "F-Zero X (USA)",
                "Perfect Dark (USA)",
                "Wave Race 64 (USA)",
            ]);
            expect(roms[0].path).toBe(path.join(romDir, "F-Zero X (USA).z64"));
        });

        it("should not recurse into subdirectories by default", () => {
            fs.mkdirSync(path.join(romDir, "extra"));
            fs.writeFileSync(path.join(romDir, "extra", "Nested.z64"), "rom");
            fs.writeFileSync(path.join(romDir, "Top.z64"), "rom");

            expect([...scanRoms(romDir)].map((rom) => rom.name)).toEqual(["Top"]);
        });

        it("should recurse into subdirectories when asked", () => {
            fs.mkdirSync(path.join(romDir, "extra"));
            fs.writeFileSync(path.join(romDir, "extra", "Nested.z64"), "rom");
            fs.writeFileSync(path.join(romDir, "Top.z64"), "rom");

            // Entries are sorted per directory by code point: "Top.z64" < "extra"
            expect([...scanRoms(romDir, { recursive: true })].map((rom) => rom.name)).toEqual([
                "Top",
                "Nested",
            ]);
        });

        it("should skip files matching ignore patterns", () => {
            fs.writeFileSync(path.join(romDir, "Keep.z64"), "rom");
            fs.writeFileSync(path.join(romDir, "Hack (Beta).z64"), "rom");
            fs.mkdirSync(path.join(romDir, "hacks"));
            fs.writeFileSync(path.join(romDir, "hacks", "Other.z64"), "rom");

            const roms = [...scanRoms(romDir, { recursive: true, ignore: ["Hack*", "hacks/**"] })];
            expect(roms.map((rom) => rom.name)).toEqual(["Keep"]);
        });

        it("should follow symbolic links to ROM files and skip dangling ones", () => {
            fs.writeFileSync(path.join(romDir, "rom.bin"), "rom");
            fs.symlinkSync(path.join(romDir, "rom.bin"), path.join(romDir, "Linked.z64"));
            fs.symlinkSync(path.join(romDir, "gone.bin"), path.join(romDir, "Broken.z64"));

            const roms = [...scanRoms(romDir)];
            expect(roms).toEqual([{ name: "Linked", path: path.join(romDir, "Linked.z64") }]);
        });

        it("should skip directories named like ROMs", () => {
            fs.mkdirSync(path.join(romDir, "Folder.z64"));
            expect([...scanRoms(romDir)]).toEqual([]);
        });

        it("should throw DirectoryNotFoundError for a missing directory", () => {
            const missing = path.join(romDir, "missing");
            expect(() => scanRoms(missing)).toThrow(DirectoryNotFoundError);
        });

        it("should throw DirectoryNotFoundError when the path is a file", () => {
            const file = path.join(romDir, "Game.z64");
            fs.writeFileSync(file, "rom");
            expect(() => scanRoms(file)).toThrow("ROM directory does not exist or is not a directory");
        });
    });
});
