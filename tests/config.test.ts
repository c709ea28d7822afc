import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { loadConfig, writeDefaultConfig, validateConfig } from "../src/config/loader.js";

function createTempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), "n64savesync-test-"));
}

function cleanupDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}

describe("Config Loader", () => {
    let tempDir: string;

    beforeEach(() => {
        tempDir = createTempDir();
    });

    afterEach(() => {
        cleanupDir(tempDir);
    });

    describe("writeDefaultConfig", () => {
        it("should create a default config file", () => {
            const configPath = writeDefaultConfig(tempDir);
            expect(configPath).toBe(path.join(tempDir, ".n64savesync.yml"));

            const content = fs.readFileSync(configPath, "utf-8");
            expect(content).toContain("backup: true");
            expect(content).toContain("overwriteOnlyIfNewer: true");
            expect(content).toContain("logLevel: warn");
        });

        it("should throw if config already exists", () => {
            writeDefaultConfig(tempDir);
            expect(() => writeDefaultConfig(tempDir)).toThrow("already exists");
        });
    });

    describe("loadConfig", () => {
        it("should load the default config file", () => {
            writeDefaultConfig(tempDir);
            const config = loadConfig(tempDir);
            expect(config).toEqual({
                backup: true,
                overwriteOnlyIfNewer: true,
                recursive: false,
                ignore: [],
                logLevel: "warn",
                maxLogSizeMB: 10,
                maxLogFiles: 5,
                defaults: {},
            });
        });

        it("should return defaults when the config file does not exist", () => {
            const config = loadConfig(tempDir);
            expect(config.backup).toBe(true);
            expect(config.defaults).toEqual({});
        });

        it("should read defaults from YAML", () => {
            const content = [
                "backup: false",
                "defaults:",
                "  romDir: /roms",
                "  srcFormat: Project64",
                "  dstFormat: everdrive",
            ].join("\n") + "\n";
            fs.writeFileSync(path.join(tempDir, ".n64savesync.yml"), content, "utf-8");

            const config = loadConfig(tempDir);
            expect(config.backup).toBe(false);
            expect(config.defaults).toEqual({ romDir: "/roms", srcFormat: "project64", dstFormat: "everdrive" });
        });

        it("should report invalid YAML with the file path", () => {
            fs.writeFileSync(path.join(tempDir, ".n64savesync.yml"), "backup: [unclosed", "utf-8");
            expect(() => loadConfig(tempDir)).toThrow("Invalid YAML");
        });
    });

    describe("validateConfig", () => {
        it("should accept a full config", () => {
            const config = validateConfig({
                backup: false,
                overwriteOnlyIfNewer: false,
                recursive: true,
                ignore: ["*(Beta)*", 42],
                logLevel: "debug",
                logFile: " /tmp/n64savesync.log ",
                maxLogSizeMB: 1,
                maxLogFiles: 2,
                defaults: { srcDir: "/saves/pj64", dstDir: "/saves/ed64" },
            });
            expect(config).toEqual({
                backup: false,
                overwriteOnlyIfNewer: false,
                recursive: true,
                ignore: ["*(Beta)*"],
                logLevel: "debug",
                logFile: "/tmp/n64savesync.log",
                maxLogSizeMB: 1,
                maxLogFiles: 2,
                defaults: { srcDir: "/saves/pj64", dstDir: "/saves/ed64" },
            });
        });

        it("should treat an empty document as defaults", () => {
            expect(validateConfig(null).logLevel).toBe("warn");
        });

        it("should reject non-object config", () => {
            expect(() => validateConfig("string")).toThrow("must be a YAML object");
            expect(() => validateConfig([])).toThrow("must be a YAML object");
        });

        it("should reject non-boolean flags", () => {
            expect(() => validateConfig({ backup: "yes" })).toThrow("backup must be true or false");
        });

        it("should reject a non-array ignore", () => {
            expect(() => validateConfig({ ignore: "*.v64" })).toThrow("ignore must be an array");
        });

        it("should reject unknown log levels", () => {
            expect(() => validateConfig({ logLevel: "verbose" })).toThrow(
                "logLevel must be one of error, warn, info, debug",
            );
        });

        it("should reject unknown formats in defaults", () => {
            expect(() => validateConfig({ defaults: { srcFormat: "retroarch" } })).toThrow(
                "defaults.srcFormat must be one of",
            );
        });

        it("should reject empty directories in defaults", () => {
            expect(() => validateConfig({ defaults: { romDir: " " } })).toThrow(
                "defaults.romDir must be a non-empty string",
            );
        });

        it("should reject non-positive maxLogSizeMB", () => {
            expect(() => validateConfig({ maxLogSizeMB: 0 })).toThrow("maxLogSizeMB must be a positive number");
        });

        it("should reject non-integer maxLogFiles", () => {
            expect(() => validateConfig({ maxLogFiles: 2.5 })).toThrow("maxLogFiles must be a positive integer");
        });
    });
});
