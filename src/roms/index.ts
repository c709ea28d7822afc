export { scanRoms, canonicalGameName, isRomFileName, ROM_EXTENSIONS } from "./scanner.js";
export type { RomEntry, ScanOptions } from "./scanner.js";
export { readRomHeader, parseRomHeader, detectByteOrder, toBigEndian } from "./header.js";
export type { RomHeader, RomByteOrder } from "./header.js";
