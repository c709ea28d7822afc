import * as fs from "node:fs";

/**
 * N64 ROM header (first 64 bytes, big-endian):
 * 0x00-0x03: PI BSD DOM1 config (magic)
 * 0x20-0x33: Internal name (20 bytes, ASCII, space padded)
 * 0x3B:      Media format
 * 0x3C-0x3D: Cartridge ID
 * 0x3E:      Region code
 * 0x3F:      Version
 */
const HEADER_SIZE = 0x40;

/**
 * Byte order a ROM dump is stored in, named after its usual file extension.
 * - `z64`: big-endian (native)
 * - `v64`: 16-bit byte-swapped
 * - `n64`: 32-bit word-swapped (little-endian)
 */
export type RomByteOrder = "z64" | "v64" | "n64";

export interface RomHeader {
    byteOrder: RomByteOrder;
    internalName: string;
    cartridgeId: string;
    regionCode: string;
    version: number;
}

export function detectByteOrder(data: Buffer): RomByteOrder | null {
    if (data.length < 4) return null;
    const first4 = data.readUInt32BE(0);
    if (first4 === 0x80371240) return "z64";
    if (first4 === 0x37804012) return "v64";
    if (first4 === 0x40123780) return "n64";
    return null;
}

/**
 * Return a big-endian copy of `data`.
 */
export function toBigEndian(data: Buffer, byteOrder: RomByteOrder): Buffer {
    const result = Buffer.from(data);
    if (byteOrder === "v64") {
        result.swap16();
    } else if (byteOrder === "n64") {
        result.swap32();
    }
    return result;
}

/**
 * Parse a ROM header. Returns null if the buffer is too short or not an N64 ROM.
 */
export function parseRomHeader(data: Buffer): RomHeader | null {
    if (data.length < HEADER_SIZE) return null;
    const byteOrder = detectByteOrder(data);
    if (byteOrder === null) return null;

    const header = toBigEndian(data.subarray(0, HEADER_SIZE), byteOrder);
    return {
        byteOrder,
        internalName: header.toString("latin1", 0x20, 0x34).replace(/\0/g, "").trim(),
        cartridgeId: header.toString("latin1", 0x3c, 0x3e),
        regionCode: header.toString("latin1", 0x3e, 0x3f),
        version: header[0x3f],
    };
}

/**
 * Read the header of a ROM file. Returns null when the file can't be read or isn't a ROM.
 */
export function readRomHeader(romPath: string): RomHeader | null {
    let fd: number | undefined;
    try {
        fd = fs.openSync(romPath, "r");
        const buffer = Buffer.alloc(HEADER_SIZE);
        const bytesRead = fs.readSync(fd, buffer, 0, HEADER_SIZE, 0);
        return parseRomHeader(buffer.subarray(0, bytesRead));
    } catch {
        return null;
    } finally {
        if (fd !== undefined) {
            fs.closeSync(fd);
        }
    }
}
