export { loadConfig, writeDefaultConfig, validateConfig, getConfigHome } from "./loader.js";
export type { SaveSyncConfig, SyncDefaults } from "./types.js";
export { CONFIG_DEFAULTS } from "./types.js";
