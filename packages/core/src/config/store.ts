/**
 * Config Store
 * Persists service configurations as JSON, one file per service name
 */

import fs from "node:fs/promises";
import path from "node:path";
import { logger } from "../utils/logger.js";
import { InvalidConfigError } from "../utils/errors.js";
import { resolvePaths } from "./paths.js";
import { parseServiceConfig, validateServiceName } from "./validate.js";
import type { ServiceConfig } from "./types.js";

/**
 * Config Store class
 *
 * No locking: two writers of the same name race and the last one wins.
 */
export class ConfigStore {
  private configDir: string;

  /**
   * @param configDir Directory holding `<name>.json` files (defaults to the user config directory)
   */
  constructor(configDir: string = resolvePaths().configDir) {
    this.configDir = configDir;
  }

  public getConfigDir(): string {
    return this.configDir;
  }

  /**
   * Path a configuration with this name is stored at
   */
  public getConfigPath(name: string): string {
    const problem = validateServiceName(name);
    if (problem) {
      throw new InvalidConfigError(problem);
    }
    return path.join(this.configDir, `${name}.json`);
  }

  /**
   * Save configuration as 2-space indented JSON, overwriting any previous file
   * @returns Path of the written file
   */
  public async save(config: ServiceConfig): Promise<string> {
    const configPath = this.getConfigPath(config.name);

    try {
      await fs.mkdir(this.configDir, { recursive: true });
      await fs.writeFile(configPath, `${JSON.stringify(config, null, 2)}\n`, "utf-8");
      logger.info("Configuration saved successfully", { path: configPath });
      return configPath;
    } catch (error) {
      logger.info("Failed to save configuration", { path: configPath, error });
      throw new Error(`Failed to save configuration: ${(error as Error).message}`);
    }
  }

  /**
   * Load a saved configuration by service name
   * @returns The configuration, or undefined when no file exists
   */
  public async load(name: string): Promise<ServiceConfig | undefined> {
    return this.loadFromPath(this.getConfigPath(name));
  }

  /**
   * Load a configuration from an explicit file path
   * @returns The configuration, or undefined when the file does not exist
   */
  public async loadFromPath(configPath: string): Promise<ServiceConfig | undefined> {
    let fileContent: string;
    try {
      fileContent = await fs.readFile(configPath, "utf-8");
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        logger.debug("Configuration file not found", { path: configPath });
        return undefined;
      }
      logger.info("Failed to read configuration", { path: configPath, error });
      throw new Error(`Failed to read configuration: ${(error as Error).message}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fileContent);
    } catch (error) {
      throw new InvalidConfigError(`Configuration is not valid JSON: ${(error as Error).message}`, configPath);
    }

    const config = parseServiceConfig(parsed, configPath);
    logger.info("Configuration loaded successfully", { path: configPath });
    return config;
  }

  /**
   * Names of every saved configuration, sorted
   */
  public async list(): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.configDir, { withFileTypes: true });
      return entries
        .filter((entry) => (entry.isFile() || entry.isSymbolicLink()) && entry.name.endsWith(".json"))
        .map((entry) => path.basename(entry.name, ".json"))
        .sort();
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        return [];
      }
      throw error;
    }
  }
}
