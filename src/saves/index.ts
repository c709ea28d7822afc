export { ALL_SAVE_KINDS, CONTROLLER_PAK_SLOTS, saveKindLabel } from "./kinds.js";
export type { SaveKind, ControllerPakSlot } from "./kinds.js";
export { SAVE_FORMATS, getFormatRules, parseSaveFormat, isSaveFormat, saveFileName } from "./formats.js";
export type { SaveFormat, SaveFormatRules, SaveLayout, SubfolderMatch } from "./formats.js";
export { locateSaves, findGameFolder, stripTags } from "./locator.js";
export type { SavePathEntry, LocateOptions } from "./locator.js";
