import type { GunicornServiceConfig, StandardPythonServiceConfig } from "../../src/index.js";

export const standardConfig = (overrides: Partial<StandardPythonServiceConfig> = {}): StandardPythonServiceConfig => ({
  name: "demo",
  description: "Demo worker",
  template: "standard_python",
  working_directory: "/srv/demo",
  venv_path: "/srv/demo/venv",
  script_path: "/srv/demo/main.py",
  script_args: "--verbose",
  user: "deploy",
  group: "deploy",
  restart_policy: "always",
  restart_sec: "3",
  additional_env_vars: [],
  ...overrides,
});

export const gunicornConfig = (overrides: Partial<GunicornServiceConfig> = {}): GunicornServiceConfig => ({
  name: "webapp",
  description: "Web application",
  template: "gunicorn",
  working_directory: "/srv/webapp",
  venv_path: "/srv/webapp/venv",
  bind_address: "127.0.0.1:9000",
  app_module: "app:app",
  user: "www",
  group: "www",
  restart_policy: "on-failure",
  restart_sec: "5",
  additional_env_vars: [],
  ...overrides,
});
