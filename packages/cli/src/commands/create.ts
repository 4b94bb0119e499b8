/**
 * Create Command
 * Build a service configuration, render its unit file and optionally deploy it
 */

import ora from 'ora';
import chalk from 'chalk';
import {
  logger,
  buildFromFlags,
  hasRequiredFlags,
  toAbsolutePath,
  validateServicePaths,
  renderServiceConfig,
  previewServiceFile,
  Deployer,
  ServiceFileManager,
  ServiceWizardError,
  type ServiceConfig,
  type ServiceFlags,
} from '@service-wizard/core';
import { createCliContext, type CliContext } from '../context.js';
import { gatherServiceInfo } from '../prompts/wizard.js';
import { editServiceInfo } from '../prompts/editor.js';
import { printError, printWarning, wait } from '../utils/display.js';

export interface CreateOptions extends ServiceFlags {
  interactive?: boolean;
  load?: string;
  preview?: boolean;
  edit?: boolean;
  output?: string;
}

/**
 * Resolve the record from --load, the interactive wizard or the flags.
 * Returns undefined when the operator cancels the wizard.
 */
async function buildServiceConfig(options: CreateOptions, context: CliContext): Promise<ServiceConfig | undefined> {
  if (options.load) {
    const loadPath = toAbsolutePath(options.load, context.build.cwd, context.build.homeDir);
    const loaded = await context.store.loadFromPath(loadPath);
    if (!loaded) {
      throw new ServiceWizardError(`Could not load configuration from ${options.load}`);
    }
    console.log(chalk.green(`Loaded service configuration from ${options.load}`));
    return loaded;
  }

  if (options.interactive || !hasRequiredFlags(options)) {
    return gatherServiceInfo(context.prompter, context.build);
  }

  return buildFromFlags(options, context.build);
}

/**
 * Run the advisory path checks; false when the operator declines to go on
 */
async function confirmPaths(config: ServiceConfig, context: CliContext): Promise<boolean> {
  console.log(chalk.gray(`\nValidating virtual environment at ${config.venv_path}...`));
  if (config.template === 'standard_python') {
    console.log(chalk.gray(`Validating script at ${config.script_path}...`));
  }

  const checks = await validateServicePaths(config);
  for (const check of checks) {
    if (check.valid) {
      continue;
    }
    printWarning(check.message);
    const proceed = await context.prompter.confirm(`${check.label} validation failed. Proceed anyway?`, false);
    if (!proceed) {
      return false;
    }
  }
  return true;
}

/**
 * Copy the unit into place and, if asked, enable and start it
 */
async function deploy(
  deployer: Deployer,
  config: ServiceConfig,
  unitFilePath: string,
  context: CliContext
): Promise<number> {
  const spinner = ora('Deploying service...').start();
  const installed = await deployer.install(unitFilePath);
  if (!installed.success) {
    spinner.fail(chalk.red(installed.message));
    return 1;
  }
  spinner.succeed(chalk.green(installed.message));

  const start = await context.prompter.confirm('Start and enable service?', true);
  if (!start) {
    return 0;
  }

  const startSpinner = ora(`Starting ${config.name}...`).start();
  const started = await deployer.enableAndStart();
  if (!started.success) {
    startSpinner.fail(chalk.red(started.message));
    return 1;
  }
  startSpinner.succeed(chalk.green(started.message));

  await wait(context.settleDelayMs);
  const status = await deployer.status();
  console.log(chalk.bold('\nService Status:'));
  console.log(status.message);
  return 0;
}

/**
 * Create flow; resolves to the process exit code
 */
export async function runCreate(options: CreateOptions, context: CliContext): Promise<number> {
  try {
    let config = await buildServiceConfig(options, context);
    if (!config) {
      return 0;
    }

    if (options.edit) {
      config = await editServiceInfo(context.prompter, config, context.build);
    }

    if (!(await confirmPaths(config, context))) {
      return 1;
    }

    // Nothing is written for a record that cannot be rendered
    const content = renderServiceConfig(config);

    if (options.preview) {
      console.log(previewServiceFile(config));
      const proceed = await context.prompter.confirm('Proceed with creation?', true);
      if (!proceed) {
        return 0;
      }
    }

    const configPath = await context.store.save(config);
    console.log(chalk.green(`Configuration saved to: ${configPath}`));

    const outputDir = options.output
      ? toAbsolutePath(options.output, context.build.cwd, context.build.homeDir)
      : context.paths.outputDir;
    const deployer = new Deployer(config.name, {
      executor: context.executor,
      systemUnitDir: context.paths.systemUnitDir,
    });

    const spinner = ora('Creating service file...').start();
    const written = await deployer.writeUnitFile(outputDir, content);
    if (!written.success) {
      spinner.fail(chalk.red(`Error creating service file: ${written.message}`));
      return 1;
    }
    spinner.succeed(chalk.green(written.message));

    const writtenContent = await ServiceFileManager.readServiceFile(written.path);
    console.log(chalk.bold.cyan('\n=== Service File ==='));
    console.log(writtenContent.trimEnd());
    console.log(chalk.bold.cyan('==================='));

    const deployNow = await context.prompter.confirm('Deploy service now?', false);
    if (!deployNow) {
      return 0;
    }

    return await deploy(deployer, config, written.path, context);
  } catch (error) {
    if (error instanceof ServiceWizardError) {
      logger.info('Create failed', { error: error.message });
      printError(error.message);
      return 1;
    }
    throw error;
  }
}

/**
 * Create command handler
 */
export async function createCommand(options: CreateOptions): Promise<void> {
  process.exitCode = await runCreate(options, createCliContext());
}
