#!/usr/bin/env node
import { Command } from "commander";
import { initCommand } from "./commands/init.js";
import { syncCommand } from "./commands/sync.js";

const program = new Command();

program
    .name("n64savesync")
    .description("Copy Nintendo 64 saves between Project64, Mupen64Plus and Everdrive 64 formats")
    .version("0.1.0");

program
    .command("sync", { isDefault: true })
    .description("Copy the saves of every ROM from one save format to another")
    .option("--rom-dir <path>", "Directory of N64 ROMs")
    .option("--src-format <format>", "Source save format: project64 | mupen64plus | everdrive")
    .option("--src-dir <path>", "Source save directory")
    .option("--dst-format <format>", "Destination save format: project64 | mupen64plus | everdrive")
    .option("--dst-dir <path>", "Destination save directory")
    .option("--backup", "Back up destination saves before overwriting them (default)")
    .option("--no-backup", "Overwrite destination saves without a backup")
    .option("--force", "Overwrite destination saves even when they are newer")
    .option("-r, --recursive", "Search the ROM directory recursively")
    .option("--loglevel <level>", "Log level: error | warn | info | debug")
    .option("--config <dir>", "Directory containing the config file (defaults to ~/.n64savesync)")
    .addHelpText(
        "after",
        [
            "",
            "Example: convert Project64 saves to Everdrive 64 format",
            "  n64savesync --rom-dir ~/roms/n64 \\",
            "    --src-format project64 --src-dir ~/Project64/Save \\",
            "    --dst-format everdrive --dst-dir /media/sdcard/ED64/gamedata",
        ].join("\n"),
    )
    .action(syncCommand);

program
    .command("init")
    .description("Create a .n64savesync.yml configuration file in ~/.n64savesync")
    .option("--config <dir>", "Directory to write the config file to (defaults to ~/.n64savesync)")
    .action(initCommand);

program.parse();
