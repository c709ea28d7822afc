import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { detectByteOrder, parseRomHeader, readRomHeader, toBigEndian } from "../src/roms/header.js";

function createTempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), "n64savesync-header-test-"));
}

function cleanupDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}

/** Big-endian (z64) ROM header with the given internal name. */
function z64Header(internalName: string): Buffer {
    const header = Buffer.alloc(0x40);
    header.writeUInt32BE(0x80371240, 0);
    header.write(internalName.padEnd(20, " "), 0x20, "latin1");
    header.write("N", 0x3b, "latin1");
    header.write("PD", 0x3c, "latin1");
    header.write("E", 0x3e, "latin1");
    header[0x3f] = 1;
    return header;
}

describe("ROM header", () => {
    let tempDir: string;

    beforeEach(() => {
        tempDir = createTempDir();
    });

    afterEach(() => {
        cleanupDir(tempDir);
    });

    describe("detectByteOrder", () => {
        it("should recognise the three dump byte orders", () => {
            expect(detectByteOrder(Buffer.from([0x80, 0x37, 0x12, 0x40]))).toBe("z64");
            expect(detectByteOrder(Buffer.from([0x37, 0x80, 0x40, 0x12]))).toBe("v64");
            expect(detectByteOrder(Buffer.from([0x40, 0x12, 0x37, 0x80]))).toBe("n64");
        });

        it("should return null for unknown data", () => {
            expect(detectByteOrder(Buffer.from([0, 0, 0, 0]))).toBeNull();
            expect(detectByteOrder(Buffer.from([0x80]))).toBeNull();
        });
    });

    describe("parseRomHeader", () => {
        it("should read the header fields of a z64 dump", () => {
            expect(parseRomHeader(z64Header("Perfect Dark"))).toEqual({
                byteOrder: "z64",
                internalName: "Perfect Dark",
                cartridgeId: "PD",
                regionCode: "E",
                version: 1,
            });
        });

        it("should read byte-swapped and word-swapped dumps", () => {
            const v64 = Buffer.from(z64Header("F-ZERO X")).swap16();
            const n64 = Buffer.from(z64Header("F-ZERO X")).swap32();

            expect(parseRomHeader(v64)?.byteOrder).toBe("v64");
            expect(parseRomHeader(v64)?.internalName).toBe("F-ZERO X");
            expect(parseRomHeader(n64)?.byteOrder).toBe("n64");
            expect(parseRomHeader(n64)?.internalName).toBe("F-ZERO X");
        });

        it("should return null for short or foreign data", () => {
            expect(parseRomHeader(Buffer.alloc(0x20))).toBeNull();
            expect(parseRomHeader(Buffer.alloc(0x40))).toBeNull();
        });
    });

    describe("toBigEndian", () => {
        it("should not modify its input", () => {
            const v64 = Buffer.from([0x37, 0x80, 0x40, 0x12]);
            expect([...toBigEndian(v64, "v64")]).toEqual([0x80, 0x37, 0x12, 0x40]);
            expect([...v64]).toEqual([0x37, 0x80, 0x40, 0x12]);
        });
    });

    describe("readRomHeader", () => {
        it("should read the header from a ROM file", () => {
            const romPath = path.join(tempDir, "Perfect Dark (USA).z64");
            fs.writeFileSync(romPath, Buffer.concat([z64Header("Perfect Dark"), Buffer.alloc(0x100)]));
            expect(readRomHeader(romPath)?.internalName).toBe("Perfect Dark");
        });

        it("should return null for a missing or non-ROM file", () => {
            const notRom = path.join(tempDir, "notes.z64");
            fs.writeFileSync(notRom, "not a rom");
            expect(readRomHeader(notRom)).toBeNull();
            expect(readRomHeader(path.join(tempDir, "missing.z64"))).toBeNull();
        });
    });
});
