// ============================================================================
// BARREL RE-EXPORTS: config public API
// ============================================================================

export type { AutopilotConfig, RawConfig } from "./schema";
export {
  rawConfigSchema,
  DEFAULT_MAX_STEPS,
  DEFAULT_WAIT_SECS,
  DEFAULT_PROFILE_NAME,
} from "./schema";
export { defaultChromeUserDataDir } from "./defaults";
export { loadConfigFile, cliToRaw, resolveConfig } from "./resolve";
export type { CliOptions } from "./resolve";
