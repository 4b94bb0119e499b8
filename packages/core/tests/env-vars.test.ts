import { describe, it, expect } from "vitest";
import {
  buildFromFlags,
  parseEnvVars,
  formatEnvVars,
  validateEnvLine,
  validateEnvVar,
  validateEnvVars,
} from "../src/index.js";

describe("parseEnvVars", () => {
  it("returns an empty list for empty input", () => {
    expect(parseEnvVars("")).toEqual([]);
    expect(parseEnvVars(undefined)).toEqual([]);
    expect(parseEnvVars("   ")).toEqual([]);
  });

  it("splits on whitespace", () => {
    expect(parseEnvVars("KEY1=VALUE1  KEY2=VALUE2")).toEqual(["KEY1=VALUE1", "KEY2=VALUE2"]);
  });

  it("keeps quoted whitespace and drops the quote characters", () => {
    expect(parseEnvVars('KEY1=VALUE1 "KEY2=VALUE WITH SPACES"')).toEqual([
      "KEY1=VALUE1",
      "KEY2=VALUE WITH SPACES",
    ]);
  });

  it("handles quotes that open mid-token", () => {
    expect(parseEnvVars('KEY="a b" OTHER=c')).toEqual(["KEY=a b", "OTHER=c"]);
  });
});

describe("formatEnvVars", () => {
  it("quotes entries containing whitespace", () => {
    expect(formatEnvVars(["A=1", "B=two words"])).toBe('A=1 "B=two words"');
  });

  it("produces a line that parses back to the same list", () => {
    const entries = ["A=1", "B=two words", "C="];
    expect(parseEnvVars(formatEnvVars(entries))).toEqual(entries);
  });
});

describe("validateEnvVar", () => {
  it("accepts KEY=VALUE and an empty value", () => {
    expect(validateEnvVar("KEY=VALUE")).toBeUndefined();
    expect(validateEnvVar("KEY=")).toBeUndefined();
  });

  it("requires exactly one '='", () => {
    expect(validateEnvVar("KEY")).toBe("Environment variable 'KEY' must contain exactly one '=' (KEY=VALUE)");
    expect(validateEnvVar("A=b=c")).toBe("Environment variable 'A=b=c' must contain exactly one '=' (KEY=VALUE)");
  });

  it("rejects an empty key", () => {
    expect(validateEnvVar("=VALUE")).toBe("Environment variable '=VALUE' has an empty key");
  });

  it("rejects whitespace in the key", () => {
    expect(validateEnvVar("MY KEY=1")).toBe("Environment variable key 'MY KEY' must not contain whitespace");
  });

  it("rejects double quotes", () => {
    expect(validateEnvVar('KEY=a"b')).toBe("Environment variable 'KEY=a\"b' must not contain double quotes");
  });

  it("reports the first invalid entry of a list", () => {
    expect(validateEnvVars(["A=1", "BROKEN", "=x"])).toBe(
      "Environment variable 'BROKEN' must contain exactly one '=' (KEY=VALUE)"
    );
    expect(validateEnvVars(["A=1"])).toBeUndefined();
  });
});

describe("validateEnvLine", () => {
  it("accepts balanced quotes and an empty line", () => {
    expect(validateEnvLine('A=1 "B=two words"')).toBeUndefined();
    expect(validateEnvLine("")).toBeUndefined();
  });

  it("rejects a quote that is never closed", () => {
    expect(validateEnvLine('A="x y')).toBe("Unterminated quote in environment variables");
  });

  it("reports the entry problem once quotes are balanced", () => {
    expect(validateEnvLine("A=1 BROKEN")).toBe("Environment variable 'BROKEN' must contain exactly one '=' (KEY=VALUE)");
  });

  it("makes --env with an unclosed quote an input error", () => {
    const context = { cwd: "/work", homeDir: "/home/tester", user: "tester" };
    expect(() =>
      buildFromFlags(
        { name: "demo", template: "gunicorn", venvPath: "/v", appModule: "app:app", env: 'A="x y' },
        context
      )
    ).toThrow("Unterminated quote in environment variables (command-line flags)");
  });
});
