import { describe, it, expect } from "vitest";
import {
  buildFromFlags,
  hasRequiredFlags,
  parseServiceConfig,
  validateServiceName,
  validateRestartSec,
  composeServiceConfig,
  fieldsForTemplate,
  getFieldValue,
  resolvePaths,
  toAbsolutePath,
  InvalidConfigError,
  MissingFieldError,
  UnknownTemplateError,
  type BuildContext,
} from "../src/index.js";
import { gunicornConfig, standardConfig } from "./helpers/fixtures.js";

const context: BuildContext = { cwd: "/work", homeDir: "/home/tester", user: "tester" };

describe("validateServiceName", () => {
  it("accepts unit-style names", () => {
    expect(validateServiceName("demo")).toBeUndefined();
    expect(validateServiceName("worker@1.api-v2_x")).toBeUndefined();
  });

  it("rejects empty names and path characters", () => {
    expect(validateServiceName("")).toBe("Service name is required");
    expect(validateServiceName("../etc")).toBe(
      "Invalid service name '../etc': use letters, digits, '_', '.', '@' or '-'"
    );
    expect(validateServiceName("-flag")).toBeDefined();
    expect(validateServiceName("my service")).toBeDefined();
  });
});

describe("validateRestartSec", () => {
  it("accepts non-negative integers only", () => {
    expect(validateRestartSec("0")).toBeUndefined();
    expect(validateRestartSec("30")).toBeUndefined();
    expect(validateRestartSec("-1")).toBe("Restart delay must be a non-negative integer, got '-1'");
    expect(validateRestartSec("1.5")).toBeDefined();
    expect(validateRestartSec("")).toBeDefined();
  });
});

describe("composeServiceConfig", () => {
  it("orders keys the way they are prompted and drops the other template's fields", () => {
    const config = composeServiceConfig({
      ...standardConfig(),
      bind_address: "0.0.0.0:8000",
      app_module: "app:app",
    });
    expect(Object.keys(config)).toEqual([...fieldsForTemplate("standard_python")]);
  });

  it("switching template keeps the shared fields", () => {
    const config = composeServiceConfig({ ...standardConfig(), template: "gunicorn", app_module: "wsgi:application" });
    expect(config).toEqual({
      name: "demo",
      description: "Demo worker",
      template: "gunicorn",
      working_directory: "/srv/demo",
      venv_path: "/srv/demo/venv",
      bind_address: "",
      app_module: "wsgi:application",
      user: "deploy",
      group: "deploy",
      restart_policy: "always",
      restart_sec: "3",
      additional_env_vars: [],
    });
  });
});

describe("getFieldValue", () => {
  it("reads scalar and list fields", () => {
    const config = gunicornConfig({ additional_env_vars: ["A=1"] });
    expect(getFieldValue(config, "bind_address")).toBe("127.0.0.1:9000");
    expect(getFieldValue(config, "additional_env_vars")).toEqual(["A=1"]);
    expect(getFieldValue(config, "script_path")).toBeUndefined();
  });
});

describe("hasRequiredFlags", () => {
  it("needs name, template and venv path", () => {
    expect(hasRequiredFlags({ name: "demo", template: "gunicorn", venvPath: "/v" })).toBe(true);
    expect(hasRequiredFlags({ name: "demo", template: "gunicorn" })).toBe(false);
    expect(hasRequiredFlags({})).toBe(false);
  });
});

describe("buildFromFlags", () => {
  it("applies defaults for a standard_python service", () => {
    const config = buildFromFlags(
      { name: "demo", template: "standard_python", venvPath: "venv", scriptPath: "~/app/main.py" },
      context
    );
    expect(config).toEqual({
      name: "demo",
      description: "Python service demo",
      template: "standard_python",
      working_directory: "/work",
      venv_path: "/work/venv",
      script_path: "/home/tester/app/main.py",
      script_args: "",
      user: "tester",
      group: "tester",
      restart_policy: "always",
      restart_sec: "3",
      additional_env_vars: [],
    });
  });

  it("builds a gunicorn service with explicit values", () => {
    const config = buildFromFlags(
      {
        name: "webapp",
        template: "gunicorn",
        description: "Web",
        workingDir: "/srv/webapp",
        venvPath: "/srv/webapp/venv",
        appModule: "wsgi:application",
        user: "www",
        restart: "on-failure",
        restartSec: "10",
        env: 'DEBUG=0 "GREETING=hello world"',
      },
      context
    );
    expect(config).toEqual({
      name: "webapp",
      description: "Web",
      template: "gunicorn",
      working_directory: "/srv/webapp",
      venv_path: "/srv/webapp/venv",
      bind_address: "0.0.0.0:8000",
      app_module: "wsgi:application",
      user: "www",
      group: "tester",
      restart_policy: "on-failure",
      restart_sec: "10",
      additional_env_vars: ["DEBUG=0", "GREETING=hello world"],
    });
  });

  it("requires the template-specific flag", () => {
    expect(() => buildFromFlags({ name: "demo", template: "standard_python", venvPath: "/v" }, context)).toThrow(
      "--script-path is required for standard_python template"
    );
    expect(() => buildFromFlags({ name: "demo", template: "gunicorn", venvPath: "/v" }, context)).toThrow(
      "--app-module is required for gunicorn template"
    );
    expect(() => buildFromFlags({ name: "demo", template: "gunicorn", venvPath: "/v" }, context)).toThrow(
      MissingFieldError
    );
  });

  it("rejects unknown templates and restart policies", () => {
    expect(() => buildFromFlags({ name: "demo", template: "uwsgi", venvPath: "/v" }, context)).toThrow(
      UnknownTemplateError
    );
    expect(() =>
      buildFromFlags(
        { name: "demo", template: "gunicorn", venvPath: "/v", appModule: "app:app", restart: "sometimes" },
        context
      )
    ).toThrow("Invalid restart policy 'sometimes'");
  });

  it("rejects a bad delay, name or env token", () => {
    const base = { template: "gunicorn", venvPath: "/v", appModule: "app:app" };
    expect(() => buildFromFlags({ ...base, name: "demo", restartSec: "soon" }, context)).toThrow(InvalidConfigError);
    expect(() => buildFromFlags({ ...base, name: "a/b" }, context)).toThrow(InvalidConfigError);
    expect(() => buildFromFlags({ ...base, name: "demo", env: "BROKEN" }, context)).toThrow(
      "Environment variable 'BROKEN' must contain exactly one '=' (KEY=VALUE) (command-line flags)"
    );
  });
});

describe("parseServiceConfig", () => {
  it("accepts a saved record", () => {
    expect(parseServiceConfig(JSON.parse(JSON.stringify(standardConfig())))).toEqual(standardConfig());
  });

  it("drops fields of the other template", () => {
    const raw = { ...gunicornConfig(), script_path: "/stale.py" };
    expect(parseServiceConfig(raw)).toEqual(gunicornConfig());
  });

  it("rejects non-objects and wrong field types", () => {
    expect(() => parseServiceConfig([])).toThrow("Configuration must be a JSON object");
    expect(() => parseServiceConfig({ ...standardConfig(), user: 42 }, "demo.json")).toThrow(
      "Field 'user' must be a string (demo.json)"
    );
    expect(() => parseServiceConfig({ ...standardConfig(), additional_env_vars: "A=1" })).toThrow(
      "Field 'additional_env_vars' must be a list of strings"
    );
  });

  it("rejects unknown templates and missing required fields", () => {
    expect(() => parseServiceConfig({ ...standardConfig(), template: "uwsgi" })).toThrow(InvalidConfigError);
    const { app_module: _dropped, ...withoutModule } = gunicornConfig();
    expect(() => parseServiceConfig(withoutModule)).toThrow("app_module is required for gunicorn template");
  });
});

describe("paths", () => {
  it("resolves defaults under the home directory", () => {
    expect(resolvePaths({}, "/home/tester")).toEqual({
      configDir: "/home/tester/.config/service-wizard",
      outputDir: "/home/tester/systemd-services",
      systemUnitDir: "/etc/systemd/system",
      logDir: "/home/tester/.service-wizard/logs",
    });
  });

  it("honours environment overrides", () => {
    const paths = resolvePaths(
      { SERVICE_WIZARD_CONFIG_DIR: "/tmp/configs", SERVICE_WIZARD_OUTPUT_DIR: "/tmp/units" },
      "/home/tester"
    );
    expect(paths.configDir).toBe("/tmp/configs");
    expect(paths.outputDir).toBe("/tmp/units");
  });

  it("expands ~ and resolves relative paths", () => {
    expect(toAbsolutePath("~", "/work", "/home/tester")).toBe("/home/tester");
    expect(toAbsolutePath("~/venv", "/work", "/home/tester")).toBe("/home/tester/venv");
    expect(toAbsolutePath("venv/../env", "/work", "/home/tester")).toBe("/work/env");
  });
});
