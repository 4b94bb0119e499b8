/**
 * Command Executor
 * Runs external commands (sudo, systemctl, cp) without a shell
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { logger } from "../utils/logger.js";
import type { ExecutionResult } from "../types/common.js";

const execFileAsync = promisify(execFile);

/**
 * Anything that can run a command and report its output and exit code.
 * Non-zero exits are reported in the result, never thrown.
 */
export interface CommandExecutor {
  run(command: string, args: readonly string[]): Promise<ExecutionResult>;
}

/**
 * Executes commands on the local machine
 */
export class LocalCommandExecutor implements CommandExecutor {
  public async run(command: string, args: readonly string[]): Promise<ExecutionResult> {
    logger.debug("Executing command", { command, args });

    try {
      const { stdout, stderr } = await execFileAsync(command, [...args], { encoding: "utf8" });
      return { stdout, stderr, code: 0, success: true };
    } catch (error) {
      const execError = error as { message?: string; stdout?: unknown; stderr?: unknown; code?: unknown };
      const result: ExecutionResult = {
        stdout: typeof execError.stdout === "string" ? execError.stdout : "",
        stderr: typeof execError.stderr === "string" && execError.stderr ? execError.stderr : execError.message ?? "",
        // A string code (ENOENT, EACCES) means the command never ran
        code: typeof execError.code === "number" ? execError.code : 1,
        success: false,
      };
      logger.debug("Command failed", { command, args, code: result.code, stderr: result.stderr });
      return result;
    }
  }
}

/**
 * Best human-readable explanation of a failed command
 */
export function describeFailure(result: ExecutionResult): string {
  return result.stderr.trim() || result.stdout.trim() || `exit code ${result.code}`;
}
