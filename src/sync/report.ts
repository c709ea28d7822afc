import { saveKindLabel } from "../saves/kinds.js";
import type { GameSyncResult, KindSyncResult, SyncReport, SyncStatus } from "./engine.js";

const STATUS_LABELS: Record<SyncStatus, string> = {
    copied: "copied",
    backed_up_and_copied: "backed up and copied",
    skipped_not_newer: "skipped (destination is not older)",
    skipped_no_source: "skipped (no source save)",
    skipped_no_destination: "skipped (no destination for this save)",
    failed: "FAILED",
};

function formatKind(result: KindSyncResult): string {
    const line = `  ${saveKindLabel(result.kind)}: ${STATUS_LABELS[result.status]}`;
    return result.error ? `${line}: ${result.error}` : line;
}

/**
 * Summary lines of one game. Kinds without a source save are left out;
 * a game with no saves at all gets a single line.
 */
export function formatGame(game: GameSyncResult): string[] {
    const lines = [game.gameName];
    const present = game.kinds.filter((kind) => kind.status !== "skipped_no_source");
    if (present.length === 0) {
        lines.push("  no saves found");
    } else {
        lines.push(...present.map(formatKind));
    }
    return lines;
}

/**
 * Render a sync report as the per-game summary printed by the CLI.
 */
export function formatReport(report: SyncReport): string {
    const lines = report.games.flatMap(formatGame);
    if (report.games.length === 0) {
        lines.push("No ROMs found.");
    }
    lines.push("");
    lines.push(
        `${report.games.length} game(s): ${report.copied} copied ` +
        `(${report.backedUp} with backup), ${report.skipped} skipped, ${report.failed} failed`,
    );
    return lines.join("\n") + "\n";
}
