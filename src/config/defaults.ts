// ============================================================================
// PLATFORM DEFAULTS
// ============================================================================

import os from "os";
import path from "path";

/** Where Google Chrome keeps its user data on this platform. */
export function defaultChromeUserDataDir(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
  home: string = os.homedir()
): string {
  switch (platform) {
    case "win32": {
      const localAppData = env.LOCALAPPDATA ?? path.win32.join(home, "AppData", "Local");
      return path.win32.join(localAppData, "Google", "Chrome", "User Data");
    }
    case "darwin":
      return path.posix.join(home, "Library", "Application Support", "Google", "Chrome");
    default:
      return path.posix.join(home, ".config", "google-chrome");
  }
}
