/**
 * Service File Manager
 * Writes generated unit files and copies them into the systemd directory
 */

import fs from "node:fs/promises";
import path from "node:path";
import { logger } from "../utils/logger.js";
import { SYSTEM_UNIT_DIR } from "../config/paths.js";
import type { OperationResult } from "../types/common.js";
import type { CommandExecutor } from "./executor.js";
import { describeFailure } from "./executor.js";
import type { WriteResult } from "./types.js";

/**
 * Service File Manager class
 */
export class ServiceFileManager {
  /**
   * File name systemd expects for a unit
   */
  public static unitFileName(serviceName: string): string {
    return `${serviceName}.service`;
  }

  /**
   * Path the unit is installed at inside the system unit directory
   */
  public static systemUnitPath(serviceName: string, systemUnitDir: string = SYSTEM_UNIT_DIR): string {
    return path.join(systemUnitDir, this.unitFileName(serviceName));
  }

  /**
   * Write rendered unit text to `<outputDir>/<name>.service`, creating the directory
   */
  public static async writeServiceFile(outputDir: string, serviceName: string, content: string): Promise<WriteResult> {
    const servicePath = path.join(outputDir, this.unitFileName(serviceName));

    try {
      await fs.mkdir(outputDir, { recursive: true });
      await fs.writeFile(servicePath, content, "utf-8");
      logger.info("Service file written", { path: servicePath });
      return { success: true, message: `Service file created at: ${servicePath}`, path: servicePath };
    } catch (error) {
      logger.info("Failed to write service file", { path: servicePath, error });
      return { success: false, message: (error as Error).message, path: servicePath };
    }
  }

  /**
   * Read a generated unit file back for display
   */
  public static async readServiceFile(servicePath: string): Promise<string> {
    return fs.readFile(servicePath, "utf-8");
  }

  /**
   * Copy a unit file into the system unit directory with sudo
   */
  public static async installServiceFile(
    executor: CommandExecutor,
    sourcePath: string,
    serviceName: string,
    systemUnitDir: string = SYSTEM_UNIT_DIR
  ): Promise<OperationResult> {
    const destination = this.systemUnitPath(serviceName, systemUnitDir);
    logger.info("Installing service file", { source: sourcePath, destination });

    const result = await executor.run("sudo", ["cp", sourcePath, destination]);
    if (!result.success) {
      logger.info("Failed to copy service file", { source: sourcePath, destination, stderr: result.stderr });
      return { success: false, message: `Failed to deploy service: ${describeFailure(result)}` };
    }

    return { success: true, message: `Copied ${sourcePath} to ${destination}` };
  }
}
