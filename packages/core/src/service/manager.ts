/**
 * Service Manager
 * Drives systemd through systemctl for a single unit
 */

import { logger } from "../utils/logger.js";
import type { ExecutionResult, OperationResult } from "../types/common.js";
import type { CommandExecutor } from "./executor.js";
import { LocalCommandExecutor, describeFailure } from "./executor.js";
import { ServiceStatus } from "./types.js";

export interface ServiceManagerOptions {
  executor?: CommandExecutor;
  /** Prefix privileged commands with sudo (default true) */
  useSudo?: boolean;
}

/**
 * Service Manager class
 */
export class ServiceManager {
  private serviceName: string;
  private executor: CommandExecutor;
  private useSudo: boolean;

  /**
   * Create a new ServiceManager instance
   * @param serviceName Unit name without the `.service` suffix
   */
  constructor(serviceName: string, options: ServiceManagerOptions = {}) {
    this.serviceName = serviceName;
    this.executor = options.executor ?? new LocalCommandExecutor();
    this.useSudo = options.useSudo ?? true;
  }

  /**
   * Run a systemctl command with elevated privileges
   */
  private async systemctlSudo(...args: string[]): Promise<ExecutionResult> {
    return this.useSudo
      ? this.executor.run("sudo", ["systemctl", ...args])
      : this.executor.run("systemctl", args);
  }

  /**
   * Ask systemd to re-read unit definitions
   */
  public async daemonReload(): Promise<OperationResult> {
    logger.info("Reloading systemd unit definitions", { service: this.serviceName });
    const result = await this.systemctlSudo("daemon-reload");

    if (!result.success) {
      logger.info("daemon-reload failed", { service: this.serviceName, stderr: result.stderr });
      return { success: false, message: `Failed to reload systemd: ${describeFailure(result)}` };
    }
    return { success: true, message: "systemd unit definitions reloaded" };
  }

  /**
   * Enable the service at boot
   */
  public async enable(): Promise<OperationResult> {
    logger.info("Enabling service", { service: this.serviceName });
    const result = await this.systemctlSudo("enable", this.serviceName);

    if (!result.success) {
      logger.info("Failed to enable service", { service: this.serviceName, stderr: result.stderr });
      return { success: false, message: `Failed to enable service: ${describeFailure(result)}` };
    }
    return { success: true, message: `Service ${this.serviceName} enabled` };
  }

  /**
   * Start the service
   */
  public async start(): Promise<OperationResult> {
    logger.info("Starting service", { service: this.serviceName });
    const result = await this.systemctlSudo("start", this.serviceName);

    if (!result.success) {
      logger.info("Failed to start service", { service: this.serviceName, stderr: result.stderr });
      return { success: false, message: `Failed to start service: ${describeFailure(result)}` };
    }
    return { success: true, message: `Service ${this.serviceName} started` };
  }

  /**
   * Stop the service
   */
  public async stop(): Promise<OperationResult> {
    logger.info("Stopping service", { service: this.serviceName });
    const result = await this.systemctlSudo("stop", this.serviceName);

    if (!result.success) {
      logger.info("Failed to stop service", { service: this.serviceName, stderr: result.stderr });
      return { success: false, message: `Failed to stop service: ${describeFailure(result)}` };
    }
    return { success: true, message: `Service ${this.serviceName} stopped` };
  }

  /**
   * Current active state (`systemctl is-active`, no privileges needed)
   */
  public async activeState(): Promise<ServiceStatus> {
    const result = await this.executor.run("systemctl", ["is-active", this.serviceName]);
    return this.parseStatus(result.stdout);
  }

  /**
   * Enable, start, then confirm the unit reports exactly "active"
   */
  public async enableAndStart(): Promise<OperationResult> {
    const enabled = await this.enable();
    if (!enabled.success) {
      return enabled;
    }

    const started = await this.start();
    if (!started.success) {
      return started;
    }

    const state = await this.activeState();
    if (state === ServiceStatus.ACTIVE) {
      logger.info("Service is active", { service: this.serviceName });
      return { success: true, message: `Service ${this.serviceName} is now active and enabled at boot` };
    }

    logger.info("Service did not become active", { service: this.serviceName, state });
    return {
      success: false,
      message: `Service ${this.serviceName} is not active, check logs with: sudo journalctl -u ${this.serviceName}`,
    };
  }

  /**
   * Full `systemctl status` text.
   * systemctl exits non-zero for stopped units, so any printed output counts.
   */
  public async statusText(): Promise<OperationResult> {
    const result = await this.executor.run("systemctl", ["status", this.serviceName]);
    const output = result.stdout || result.stderr;

    if (!output.trim()) {
      return { success: false, message: `Failed to get status for ${this.serviceName}` };
    }
    return { success: true, message: output };
  }

  /**
   * Parse service status from `is-active` output
   */
  private parseStatus(output: string): ServiceStatus {
    const trimmed = output.trim();

    if (trimmed === "active") return ServiceStatus.ACTIVE;
    if (trimmed === "inactive") return ServiceStatus.INACTIVE;
    if (trimmed === "failed") return ServiceStatus.FAILED;
    return ServiceStatus.UNKNOWN;
  }
}
