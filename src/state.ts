import { existsSync, readFileSync } from "fs";
import Config from "./struct/Config";

function loadConfig(): Config {
  const configPath = Config.configFilePath;
  if (!existsSync(configPath)) return Config.generateConfig();

  try {
    return new Config(readFileSync(configPath, "utf8"));
  } catch {
    // Already written to the error log; ask for the settings again
    return new Config(undefined, true);
  }
}

// Global application state
export const config = loadConfig();
