/**
 * Service Module Types
 */

import type { OperationResult } from "../types/common.js";

/**
 * Service status as reported by `systemctl is-active`
 */
export enum ServiceStatus {
  ACTIVE = "active",
  INACTIVE = "inactive",
  FAILED = "failed",
  UNKNOWN = "unknown",
}

/**
 * Result of writing a unit file
 */
export interface WriteResult extends OperationResult {
  path: string;
}
