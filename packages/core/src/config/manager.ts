/**
 * Configuration Manager
 * Handles loading, saving and applying the YAML configuration file
 */

import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import yaml from "js-yaml";
import { ConfigurationError } from "../errors.js";
import { createSnapshot, detectHostEnvironment, readEnvironmentOverrides } from "../os/snapshot.js";
import type { EnvironmentSnapshot, RawEnvironment } from "../os/snapshot.js";
import { logger, LogLevel } from "../utils/logger.js";
import { DEFAULT_CONFIG } from "./types.js";
import type { LoggingConfig, OsFamilyConfig } from "./types.js";

const ENVIRONMENT_KEYS: ReadonlyArray<keyof RawEnvironment> = ["name", "arch", "version", "pathSeparator"];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Configuration Manager class
 */
export class ConfigManager {
  private config: OsFamilyConfig | null = null;
  private configPath: string;

  /**
   * @param configPath Optional path to the configuration file
   */
  constructor(configPath?: string) {
    this.configPath = configPath ?? ConfigManager.getDefaultConfigPath();
  }

  /**
   * Default location: ~/.os-family/config.yaml
   */
  public static getDefaultConfigPath(): string {
    return path.join(os.homedir(), ".os-family", "config.yaml");
  }

  public getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Load configuration from file. A missing file yields the defaults.
   *
   * @throws ConfigurationError if the file is not valid YAML or has the wrong shape
   */
  public async load(): Promise<OsFamilyConfig> {
    let fileContent: string;
    try {
      fileContent = await fs.readFile(this.configPath, "utf-8");
    } catch (error) {
      if (isRecord(error) && error.code === "ENOENT") {
        logger.warn("Configuration file not found, using defaults", { path: this.configPath });
        this.config = ConfigManager.mergeWithDefaults({});
        return this.config;
      }
      logger.error("Failed to read configuration", error);
      throw error;
    }

    let loaded: unknown;
    try {
      loaded = yaml.load(fileContent);
    } catch (error) {
      throw new ConfigurationError(`Failed to parse configuration: ${error instanceof Error ? error.message : String(error)}`, {
        path: this.configPath,
      });
    }

    this.config = ConfigManager.mergeWithDefaults(ConfigManager.parse(loaded ?? {}, this.configPath));
    logger.info("Configuration loaded successfully", { path: this.configPath });
    return this.config;
  }

  /**
   * Save configuration to file
   * @param config Optional configuration to save (uses current config if not provided)
   */
  public async save(config?: OsFamilyConfig): Promise<void> {
    const configToSave = config ?? this.config;

    if (!configToSave) {
      throw new ConfigurationError("No configuration to save", { path: this.configPath });
    }

    await fs.mkdir(path.dirname(this.configPath), { recursive: true });

    const yamlContent = yaml.dump(configToSave, {
      indent: 2,
      lineWidth: 100,
      noRefs: true,
    });

    await fs.writeFile(this.configPath, yamlContent, "utf-8");

    this.config = configToSave;
    logger.info("Configuration saved successfully", { path: this.configPath });
  }

  /**
   * Get the loaded configuration
   */
  public getConfig(): OsFamilyConfig {
    if (!this.config) {
      throw new ConfigurationError("Configuration not loaded. Call load() first.", { path: this.configPath });
    }
    return this.config;
  }

  /**
   * Build the snapshot conditions are evaluated against. Precedence, lowest
   * first: host values, OS_FAMILY_* environment variables, the file's
   * `environment` section.
   */
  public static resolveSnapshot(
    config: OsFamilyConfig,
    host: RawEnvironment = detectHostEnvironment(),
    env: NodeJS.ProcessEnv = process.env
  ): EnvironmentSnapshot {
    return createSnapshot({ ...host, ...readEnvironmentOverrides(env), ...config.environment });
  }

  /**
   * Validate the shape of a parsed configuration document
   */
  public static parse(raw: unknown, source: string): Partial<OsFamilyConfig> {
    if (!isRecord(raw)) {
      throw new ConfigurationError("Configuration must be a mapping", { path: source });
    }

    const result: Partial<OsFamilyConfig> = {};

    if (raw.environment !== undefined && raw.environment !== null) {
      if (!isRecord(raw.environment)) {
        throw new ConfigurationError("environment must be a mapping", { path: source });
      }
      const environment: Partial<RawEnvironment> = {};
      for (const key of ENVIRONMENT_KEYS) {
        const value = raw.environment[key];
        if (value === undefined || value === null) continue;
        if (typeof value !== "string" && typeof value !== "number") {
          throw new ConfigurationError(`environment.${key} must be a string`, { path: source });
        }
        // YAML reads unquoted versions such as 10.0 as numbers
        environment[key] = String(value);
      }
      result.environment = environment;
    }

    if (raw.logging !== undefined && raw.logging !== null) {
      if (!isRecord(raw.logging)) {
        throw new ConfigurationError("logging must be a mapping", { path: source });
      }
      const logging: Partial<LoggingConfig> = {};
      const { level, logToFile } = raw.logging;
      if (level !== undefined) {
        const parsed = Object.values(LogLevel).find((candidate) => candidate === level);
        if (!parsed) {
          throw new ConfigurationError(`logging.level must be one of ${Object.values(LogLevel).join(", ")}`, {
            path: source,
          });
        }
        logging.level = parsed;
      }
      if (logToFile !== undefined) {
        if (typeof logToFile !== "boolean") {
          throw new ConfigurationError("logging.logToFile must be a boolean", { path: source });
        }
        logging.logToFile = logToFile;
      }
      result.logging = { ...DEFAULT_CONFIG.logging, ...logging };
    }

    return result;
  }

  /**
   * Merge loaded configuration with defaults
   */
  private static mergeWithDefaults(loaded: Partial<OsFamilyConfig>): OsFamilyConfig {
    return {
      ...DEFAULT_CONFIG,
      ...loaded,
      logging: { ...DEFAULT_CONFIG.logging, ...loaded.logging },
    };
  }
}
