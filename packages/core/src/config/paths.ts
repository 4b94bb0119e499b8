/**
 * Filesystem locations used by the wizard
 */

import os from "node:os";
import path from "node:path";

export interface WizardPaths {
  /** Saved service configurations, one `<name>.json` per service */
  configDir: string;
  /** Default destination for generated unit files */
  outputDir: string;
  /** Where the service manager reads unit files from */
  systemUnitDir: string;
  logDir: string;
}

export const SYSTEM_UNIT_DIR = "/etc/systemd/system";

/**
 * Resolve wizard directories, honouring SERVICE_WIZARD_* overrides
 */
export function resolvePaths(env: NodeJS.ProcessEnv = process.env, homeDir: string = os.homedir()): WizardPaths {
  return {
    configDir: env.SERVICE_WIZARD_CONFIG_DIR || path.join(homeDir, ".config", "service-wizard"),
    outputDir: env.SERVICE_WIZARD_OUTPUT_DIR || path.join(homeDir, "systemd-services"),
    systemUnitDir: SYSTEM_UNIT_DIR,
    logDir: env.SERVICE_WIZARD_LOG_DIR || path.join(homeDir, ".service-wizard", "logs"),
  };
}

/**
 * Expand a leading `~` and make the path absolute
 */
export function toAbsolutePath(input: string, cwd: string = process.cwd(), homeDir: string = os.homedir()): string {
  let expanded = input;
  if (input === "~") {
    expanded = homeDir;
  } else if (input.startsWith("~/")) {
    expanded = path.join(homeDir, input.slice(2));
  }
  return path.resolve(cwd, expanded);
}
