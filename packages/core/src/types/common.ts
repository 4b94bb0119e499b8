/**
 * Common types used across the core package
 */

/**
 * Outcome of a step that talks to the service manager or the filesystem
 */
export interface OperationResult {
  success: boolean;
  message: string;
}

/**
 * Execution result for commands
 */
export interface ExecutionResult {
  stdout: string;
  stderr: string;
  code: number;
  success: boolean;
}
