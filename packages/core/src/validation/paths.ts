/**
 * Path Validation
 * Advisory checks run before a unit file is rendered; they never throw
 */

import fs from "node:fs/promises";
import path from "node:path";
import { logger } from "../utils/logger.js";
import type { ServiceConfig } from "../config/types.js";

export interface ValidationResult {
  valid: boolean;
  message: string;
}

/**
 * A named check, so the caller can say which one failed
 */
export interface PathCheck extends ValidationResult {
  check: "script" | "venv";
  label: string;
}

/**
 * Activation script every virtual environment carries
 */
export const VENV_ACTIVATE_SCRIPT = path.join("bin", "activate");

/**
 * The script must exist and be a regular file
 */
export async function validateScript(scriptPath: string): Promise<ValidationResult> {
  try {
    const stats = await fs.stat(scriptPath);
    if (!stats.isFile()) {
      return { valid: false, message: `${scriptPath} is not a file` };
    }
    return { valid: true, message: "Script is valid" };
  } catch (error) {
    logger.debug("Script check failed", { scriptPath, error: (error as Error).message });
    return { valid: false, message: `Script ${scriptPath} does not exist` };
  }
}

/**
 * The environment root must contain bin/activate
 */
export async function validateVenv(venvPath: string): Promise<ValidationResult> {
  try {
    await fs.access(path.join(venvPath, VENV_ACTIVATE_SCRIPT));
    return { valid: true, message: "Virtual environment is valid" };
  } catch (error) {
    logger.debug("Virtual environment check failed", { venvPath, error: (error as Error).message });
    return { valid: false, message: `Virtual environment not found at ${venvPath}` };
  }
}

/**
 * Run every check that applies to the configuration.
 * The checks are read-only and independent, so they run concurrently;
 * results come back in venv, script order.
 */
export async function validateServicePaths(config: ServiceConfig): Promise<PathCheck[]> {
  const checks: Array<Promise<PathCheck>> = [
    validateVenv(config.venv_path).then((result): PathCheck => ({ ...result, check: "venv", label: "Virtual environment" })),
  ];

  if (config.template === "standard_python") {
    checks.push(
      validateScript(config.script_path).then((result): PathCheck => ({ ...result, check: "script", label: "Script" }))
    );
  }

  return Promise.all(checks);
}
