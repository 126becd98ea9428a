export type { ContractEntry, SettingsConfig, SettingsInput, SignatureDatabase } from "./types";
export { contractEntrySchema, settingsConfigSchema, signatureDatabaseSchema } from "./types";
export { DEFAULT_SETTINGS_CONFIG } from "./defaults";
export {
  describeSchemaIssues,
  importSettingsConfig,
  loadSettingsConfig,
  resetSettingsConfig,
  saveSettingsConfig,
} from "./store";
export type { SettingsLoadResult, SettingsLoadWarning, SettingsLoadWarningKind, SettingsStore } from "./store";
export { computeSettingsFingerprint } from "./fingerprint";
