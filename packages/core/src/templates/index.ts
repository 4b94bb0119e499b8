/**
 * Templates Module - unit-file templates and rendering
 */

export { getTemplate, listTemplates } from "./registry.js";
export type { ServiceTemplate } from "./registry.js";
export { renderServiceFile, renderServiceConfig, previewServiceFile, formatEnvironmentLine } from "./renderer.js";
