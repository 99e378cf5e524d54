// ============================================================================
// CONFIG SCHEMA: keys shared by the JSON config file and the CLI flags
// ============================================================================

import { z } from "zod";

/** Default step budget and per-wait timeout */
export const DEFAULT_MAX_STEPS = 200;
export const DEFAULT_WAIT_SECS = 20;
export const DEFAULT_PROFILE_NAME = "Default";

const optionalText = z.string().trim().min(1).nullable().optional();

/**
 * Raw configuration with snake_case keys, as written in the JSON file. Every
 * key is optional; unknown keys are dropped.
 */
export const rawConfigSchema = z.object({
  chrome_user_data_dir: optionalText,
  chrome_profile_name: optionalText,
  headless: z.boolean().optional(),
  story_path: optionalText,
  max_steps: z.coerce.number().int().positive().optional(),
  wait_secs: z.coerce.number().positive().optional(),
  username: optionalText,
  password: z.string().min(1).nullable().optional(),
});

export type RawConfig = z.infer<typeof rawConfigSchema>;

export interface AutopilotConfig {
  chromeUserDataDir: string;
  chromeProfileName: string;
  headless: boolean;
  /** Story path ("/en/es-juan-1") or full URL; null opens the first story on the grid */
  storyPath: string | null;
  maxSteps: number;
  waitSecs: number;
  username: string | null;
  password: string | null;
  /** Explicit browser binary (CHROME_PATH); unset means installed Chrome */
  executablePath?: string;
}
