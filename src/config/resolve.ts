// ============================================================================
// CONFIG RESOLUTION: file over CLI over defaults
// ============================================================================

import { readFile } from "fs/promises";
import type { ZodError } from "zod";
import { ConfigError } from "../errors";
import {
  rawConfigSchema,
  DEFAULT_MAX_STEPS,
  DEFAULT_WAIT_SECS,
  DEFAULT_PROFILE_NAME,
} from "./schema";
import type { AutopilotConfig, RawConfig } from "./schema";
import { defaultChromeUserDataDir } from "./defaults";

/** Flag values as commander hands them over (numbers still as strings). */
export interface CliOptions {
  chromeUserDataDir?: string;
  chromeProfileName?: string;
  storyPath?: string;
  headless?: boolean;
  maxSteps?: string;
  waitSecs?: string;
  username?: string;
  password?: string;
  config?: string;
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

function parseRaw(input: unknown, source: string): RawConfig {
  const result = rawConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(`Invalid ${source}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/** Read and validate a JSON config file. */
export async function loadConfigFile(filePath: string): Promise<RawConfig> {
  let text: string;
  try {
    text = await readFile(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Config file ${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseRaw(json, `config file ${filePath}`);
}

export function cliToRaw(cli: CliOptions): RawConfig {
  return parseRaw({
    chrome_user_data_dir: cli.chromeUserDataDir,
    chrome_profile_name: cli.chromeProfileName,
    headless: cli.headless,
    story_path: cli.storyPath,
    max_steps: cli.maxSteps,
    wait_secs: cli.waitSecs,
    username: cli.username,
    password: cli.password,
  }, "command-line options");
}

/**
 * Merge sources. A key present in the config file wins; otherwise the CLI
 * value; otherwise the default. Credentials fall back to the environment.
 */
export function resolveConfig(
  cli: RawConfig,
  file: RawConfig = {},
  env: NodeJS.ProcessEnv = process.env
): AutopilotConfig {
  const pick = <K extends keyof RawConfig>(key: K): RawConfig[K] =>
    file[key] !== undefined ? file[key] : cli[key];

  return {
    chromeUserDataDir: pick("chrome_user_data_dir") ?? defaultChromeUserDataDir(process.platform, env),
    chromeProfileName: pick("chrome_profile_name") ?? DEFAULT_PROFILE_NAME,
    headless: pick("headless") ?? false,
    storyPath: pick("story_path") ?? null,
    maxSteps: pick("max_steps") ?? DEFAULT_MAX_STEPS,
    waitSecs: pick("wait_secs") ?? DEFAULT_WAIT_SECS,
    username: pick("username") ?? env.STORY_AUTOPILOT_USERNAME ?? null,
    password: pick("password") ?? env.STORY_AUTOPILOT_PASSWORD ?? null,
    ...(env.CHROME_PATH ? { executablePath: env.CHROME_PATH } : {}),
  };
}
