/**
 * Deployer
 * Installs a rendered unit and brings the service up, one gated step at a time.
 * Completed steps are never rolled back; a failed step ends the sequence.
 */

import { logger } from "../utils/logger.js";
import { SYSTEM_UNIT_DIR } from "../config/paths.js";
import type { OperationResult } from "../types/common.js";
import type { CommandExecutor } from "./executor.js";
import { LocalCommandExecutor } from "./executor.js";
import { ServiceFileManager } from "./file-manager.js";
import { ServiceManager } from "./manager.js";
import type { WriteResult } from "./types.js";

export interface DeployerOptions {
  executor?: CommandExecutor;
  systemUnitDir?: string;
}

export class Deployer {
  private serviceName: string;
  private executor: CommandExecutor;
  private systemUnitDir: string;
  private serviceManager: ServiceManager;

  constructor(serviceName: string, options: DeployerOptions = {}) {
    this.serviceName = serviceName;
    this.executor = options.executor ?? new LocalCommandExecutor();
    this.systemUnitDir = options.systemUnitDir ?? SYSTEM_UNIT_DIR;
    this.serviceManager = new ServiceManager(serviceName, { executor: this.executor });
  }

  /**
   * Step 1: write the rendered unit into the output directory
   */
  public async writeUnitFile(outputDir: string, content: string): Promise<WriteResult> {
    return ServiceFileManager.writeServiceFile(outputDir, this.serviceName, content);
  }

  /**
   * Steps 2-3: copy the unit into place, then reload systemd
   */
  public async install(unitFilePath: string): Promise<OperationResult> {
    const copied = await ServiceFileManager.installServiceFile(
      this.executor,
      unitFilePath,
      this.serviceName,
      this.systemUnitDir
    );
    if (!copied.success) {
      return copied;
    }

    const reloaded = await this.serviceManager.daemonReload();
    if (!reloaded.success) {
      return reloaded;
    }

    logger.info("Service deployed", { service: this.serviceName });
    return { success: true, message: `Service ${this.serviceName} deployed successfully` };
  }

  /**
   * Step 4: enable at boot, start, and confirm it is active
   */
  public async enableAndStart(): Promise<OperationResult> {
    return this.serviceManager.enableAndStart();
  }

  public async status(): Promise<OperationResult> {
    return this.serviceManager.statusText();
  }
}
