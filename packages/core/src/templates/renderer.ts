/**
 * Service File Renderer
 * Turns a template and a service configuration into unit-file text
 */

import { getTemplate } from "./registry.js";
import { MissingFieldError } from "../utils/errors.js";
import type { ServiceConfig } from "../config/types.js";

const PLACEHOLDER = /\{\{\s*(\w+)\s*\}\}/g;
const ENV_BLOCK_LINE = /^\s*\{\{\s*additional_env_vars\s*\}\}\s*$/;

/**
 * Format one `KEY=VALUE` entry as a unit-file line
 */
export function formatEnvironmentLine(entry: string): string {
  return `Environment="${entry}"`;
}

function lookup(values: Map<string, unknown>, field: string): string {
  const value = values.get(field);
  if (typeof value === "string") {
    return value;
  }
  if (Array.isArray(value)) {
    return value.join(" ");
  }
  throw new MissingFieldError(field);
}

/**
 * Render unit-file text for `templateId` from the given configuration.
 * Throws UnknownTemplateError or MissingFieldError; performs no I/O.
 */
export function renderServiceFile(templateId: string, config: ServiceConfig): string {
  const template = getTemplate(templateId);
  const values = new Map<string, unknown>(Object.entries(config));

  for (const field of template.requiredFields) {
    if (!lookup(values, field).trim()) {
      throw new MissingFieldError(field, `${field} is required for ${template.id} template`);
    }
  }

  const lines: string[] = [];
  for (const line of template.body.split("\n")) {
    if (ENV_BLOCK_LINE.test(line)) {
      lines.push(...config.additional_env_vars.map(formatEnvironmentLine));
      continue;
    }
    lines.push(line.replace(PLACEHOLDER, (_match, field: string) => lookup(values, field)));
  }

  return lines.join("\n");
}

/**
 * Render using the template named by the configuration itself
 */
export function renderServiceConfig(config: ServiceConfig): string {
  return renderServiceFile(config.template, config);
}

/**
 * Rendered unit wrapped in the banner shown before creation
 */
export function previewServiceFile(config: ServiceConfig): string {
  return ["=== Service File Preview ===", renderServiceConfig(config), "==========================="].join("\n");
}
