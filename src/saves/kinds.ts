/** Controller pak slot, one per controller port. */
export type ControllerPakSlot = 1 | 2 | 3 | 4;

/**
 * Category of persistent game data.
 * A cartridge uses at most one of sram / eeprom / flashram, plus any number of controller paks.
 */
export type SaveKind =
    | { type: "sram" }
    | { type: "eeprom" }
    | { type: "flashram" }
    | { type: "controller-pak"; slot: ControllerPakSlot };

export const CONTROLLER_PAK_SLOTS: readonly ControllerPakSlot[] = [1, 2, 3, 4];

/** Every save kind, in the order the locator and engine walk them. */
export const ALL_SAVE_KINDS: readonly SaveKind[] = [
    { type: "sram" },
    { type: "eeprom" },
    { type: "flashram" },
    ...CONTROLLER_PAK_SLOTS.map((slot): SaveKind => ({ type: "controller-pak", slot })),
];

/**
 * Stable label for a save kind, e.g. "eeprom" or "controller-pak-2".
 * Also used as the key of locator results.
 */
export function saveKindLabel(kind: SaveKind): string {
    return kind.type === "controller-pak" ? `controller-pak-${kind.slot}` : kind.type;
}
