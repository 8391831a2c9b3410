/**
 * Environment resolution shared by every command
 */

import {
  ConfigManager,
  currentSnapshot,
  initLogger,
  LogLevel,
  type EnvironmentSnapshot,
} from "@os-family/core";

/**
 * Options every command accepts
 */
export type GlobalOptions = {
  config?: string;
  verbose?: boolean;
};

/**
 * Environment variable naming a configuration file when --config is absent
 */
export const CONFIG_ENV_VARIABLE = "OS_FAMILY_CONFIG";

/**
 * Resolve the snapshot a command evaluates against.
 *
 * Without a configuration file this is the process-wide host snapshot. With
 * one, its `environment` section overrides the host values and its `logging`
 * section configures the logger.
 */
export async function resolveEnvironment(options: GlobalOptions): Promise<EnvironmentSnapshot> {
  const configPath = options.config ?? process.env[CONFIG_ENV_VARIABLE];

  if (!configPath) {
    initLogger({ level: options.verbose ? LogLevel.DEBUG : LogLevel.WARN });
    return currentSnapshot();
  }

  const configManager = new ConfigManager(configPath);
  const config = await configManager.load();
  initLogger({
    level: options.verbose ? LogLevel.DEBUG : config.logging.level,
    logToFile: config.logging.logToFile,
  });
  return ConfigManager.resolveSnapshot(config);
}
