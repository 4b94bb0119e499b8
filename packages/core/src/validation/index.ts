/**
 * Validation Module - advisory filesystem checks
 */

export { validateScript, validateVenv, validateServicePaths, VENV_ACTIVATE_SCRIPT } from "./paths.js";
export type { ValidationResult, PathCheck } from "./paths.js";
