#!/usr/bin/env node

/**
 * Service Wizard CLI
 * Main entry point
 */

import { Command, InvalidArgumentError } from "commander";
import { initLogger, logger, parseLogLevel, LogLevel } from "@service-wizard/core";
import { createCommand } from "./commands/create.js";
import { listCommand } from "./commands/list.js";
import { statusCommand } from "./commands/status.js";
import { startCommand } from "./commands/start.js";
import { stopCommand } from "./commands/stop.js";
import { printError } from "./utils/display.js";

const toLogLevel = (value: string): LogLevel => {
  const level = parseLogLevel(value);
  if (!level) {
    throw new InvalidArgumentError(`Expected one of: ${Object.values(LogLevel).join(", ")}`);
  }
  return level;
};

const program = new Command();

/**
 * CLI Version and description
 */
program
  .name("service-wizard")
  .description("Generate, deploy and manage systemd services for Python applications")
  .version("1.0.0")
  .option("--log-level <level>", "Console log level (error, warn, info, debug)", toLogLevel)
  .hook("preAction", (command) => {
    const { logLevel } = command.opts<{ logLevel?: LogLevel }>();
    if (logLevel) {
      initLogger({ consoleLevel: logLevel });
    }
  });

/**
 * Create command - Build a unit file and optionally deploy it
 */
program
  .command("create")
  .description("Create a new systemd service")
  .option("-i, --interactive", "Use the interactive wizard")
  .option("--load <path>", "Load a saved configuration file")
  .option("--name <name>", "Service name")
  .option("--template <template>", "Template to use (standard_python, gunicorn)")
  .option("--description <text>", "Service description")
  .option("--working-dir <path>", "Working directory")
  .option("--venv-path <path>", "Path to the virtual environment")
  .option("--script-path <path>", "Path to the Python script (standard_python)")
  .option("--script-args <args>", "Arguments for the Python script")
  .option("--bind-address <address>", "Bind address for gunicorn", "0.0.0.0:8000")
  .option("--app-module <module>", "App module for gunicorn (e.g. app:app)")
  .option("--user <user>", "User to run the service as")
  .option("--group <group>", "Group to run the service as")
  .option("--restart <policy>", "Restart policy", "always")
  .option("--restart-sec <seconds>", "Restart delay in seconds", "3")
  .option("--env <vars>", 'Additional environment variables (e.g. "KEY1=VALUE1 KEY2=VALUE2")')
  .option("--preview", "Preview the service file before creating it")
  .option("--edit", "Edit the configuration before creating the service")
  .option("--output <dir>", "Output directory for the service file")
  .addHelpText(
    "after",
    `
Examples:
  $ service-wizard create --interactive
  $ service-wizard create --name demo --template standard_python --venv-path /opt/demo/venv --script-path /opt/demo/main.py
  $ service-wizard create --load ~/.config/service-wizard/demo.json --edit
  `
  )
  .action(createCommand);

/**
 * List command - Browse saved configurations
 */
program.command("list").description("List saved service configurations").action(listCommand);

/**
 * Status command - Show systemctl status
 */
program.command("status <name>").description("Check the status of a service").action(statusCommand);

/**
 * Stop command - Stop a service
 */
program.command("stop <name>").description("Stop a service").action(stopCommand);

/**
 * Start command - Start a service
 */
program.command("start <name>").description("Start a service").action(startCommand);

/**
 * Parse and execute commands
 */
async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    logger.info("CLI error", { error: (error as Error).message });
    printError((error as Error).message);
    process.exit(1);
  }
}

void main();

export { program };
