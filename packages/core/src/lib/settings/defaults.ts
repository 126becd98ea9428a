import type { SettingsConfig } from "./types";

/**
 * Settings used when no file exists. Bundled descriptors, protocol
 * deployments and well-known tokens need no settings entries.
 */
export const DEFAULT_SETTINGS_CONFIG: SettingsConfig = Object.freeze({
  version: "1.0",
  descriptorDirs: [],
  signatures: {},
  contracts: [],
  disabledVisualizers: [],
});
