/**
 * Service configuration types
 *
 * Records are persisted as JSON with these exact snake_case keys, so a
 * saved file and the in-memory value have the same shape.
 */

/**
 * Built-in unit-file templates, in menu order
 */
export const TEMPLATE_IDS = ["standard_python", "gunicorn"] as const;
export type TemplateId = (typeof TEMPLATE_IDS)[number];

/**
 * systemd `Restart=` values, in menu order
 */
export const RESTART_POLICIES = [
  "no",
  "always",
  "on-success",
  "on-failure",
  "on-abnormal",
  "on-abort",
  "on-watchdog",
] as const;
export type RestartPolicy = (typeof RESTART_POLICIES)[number];

/**
 * Fields shared by every template
 */
export interface BaseServiceConfig {
  name: string;
  description: string;
  working_directory: string;
  venv_path: string;
  user: string;
  group: string;
  restart_policy: RestartPolicy;
  /** Non-negative integer seconds, kept as text */
  restart_sec: string;
  /** `KEY=VALUE` entries in operator order */
  additional_env_vars: string[];
}

export interface StandardPythonServiceConfig extends BaseServiceConfig {
  template: "standard_python";
  script_path: string;
  script_args: string;
}

export interface GunicornServiceConfig extends BaseServiceConfig {
  template: "gunicorn";
  /** host:port */
  bind_address: string;
  /** module:object, e.g. `app:app` or `wsgi:application` */
  app_module: string;
}

export type ServiceConfig = StandardPythonServiceConfig | GunicornServiceConfig;

/**
 * Any field name a config record can carry
 */
export type ServiceConfigField =
  | keyof StandardPythonServiceConfig
  | keyof GunicornServiceConfig;

/**
 * Defaults applied when a prompt is left blank or a flag is omitted
 */
export const DEFAULT_SERVICE_VALUES = {
  restartPolicy: "always",
  restartSec: "3",
  bindAddress: "0.0.0.0:8000",
} as const satisfies {
  restartPolicy: RestartPolicy;
  restartSec: string;
  bindAddress: string;
};

export function isTemplateId(value: string): value is TemplateId {
  return TEMPLATE_IDS.some((id) => id === value);
}

export function isRestartPolicy(value: string): value is RestartPolicy {
  return RESTART_POLICIES.some((policy) => policy === value);
}
