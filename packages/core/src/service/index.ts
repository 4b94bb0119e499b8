/**
 * Service Module - unit file installation and systemctl control
 */

export { ServiceManager } from './manager.js';
export type { ServiceManagerOptions } from './manager.js';
export { ServiceFileManager } from './file-manager.js';
export { Deployer } from './deployer.js';
export type { DeployerOptions } from './deployer.js';
export { LocalCommandExecutor, describeFailure } from './executor.js';
export type { CommandExecutor } from './executor.js';
export type { WriteResult } from './types.js';
export { ServiceStatus } from './types.js';
