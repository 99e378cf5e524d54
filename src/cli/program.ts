// ============================================================================
// CLI PROGRAM: flags → config → run → exit code
// ============================================================================

import { Command } from "commander";
import { cliToRaw, loadConfigFile, resolveConfig, DEFAULT_MAX_STEPS, DEFAULT_WAIT_SECS } from "../config";
import type { AutopilotConfig, CliOptions, RawConfig } from "../config";
import { launchBrowserSession, promptingCredentials } from "../session";
import { exitCodeFor, formatRunSummary } from "../step-loop";
import type { RunReport } from "../step-loop";
import { runStory } from "../run";
import { ConfigError } from "../errors";

/** Exit code for unusable flags or config file */
export const CONFIG_ERROR_EXIT_CODE = 2;

export type StoryRunner = (config: AutopilotConfig) => Promise<RunReport>;

export const defaultStoryRunner: StoryRunner = (config) =>
  runStory(config, {
    openSession: () => launchBrowserSession(config),
    credentials: promptingCredentials({ username: config.username, password: config.password }),
  });

/** Resolve configuration and run; returns the process exit code. */
export async function runCli(options: CliOptions, run: StoryRunner = defaultStoryRunner): Promise<number> {
  let config: AutopilotConfig;
  try {
    const cli = cliToRaw(options);
    const file: RawConfig = options.config ? await loadConfigFile(options.config) : {};
    config = resolveConfig(cli, file);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Error: ${error.message}`);
      return CONFIG_ERROR_EXIT_CODE;
    }
    throw error;
  }

  const report = await run(config);
  const summary = formatRunSummary(report);
  if (report.status === "failed") console.error(summary);
  else console.log(summary);
  return exitCodeFor(report.status);
}

export function createProgram(run: StoryRunner = defaultStoryRunner): Command {
  const program = new Command();

  program
    .name("story-autopilot")
    .description("Play a story to completion in a real Chrome profile")
    .version("0.1.0")
    .option("--chrome-user-data-dir <dir>", "Chrome user data dir (so your session cookies are used)")
    .option("--chrome-profile-name <name>", "Chrome profile directory name, e.g. 'Default' or 'Profile 1'")
    .option("--story-path <path>", "Story path or full URL, e.g. '/en/es-juan-1'; omit to open the first story")
    .option("--headless", "Run Chrome headless")
    .option("--max-steps <n>", `Step budget (default ${DEFAULT_MAX_STEPS})`)
    .option("--wait-secs <n>", `Upper bound for each wait, in seconds (default ${DEFAULT_WAIT_SECS})`)
    .option("--username <username>", "Username or email")
    .option("--password <password>", "Password (leave out to be prompted)")
    .option("--config <file>", "JSON config with the same keys as the flags (snake_case); its values win")
    .action(async (options: CliOptions) => {
      process.exitCode = await runCli(options, run);
    });

  return program;
}
