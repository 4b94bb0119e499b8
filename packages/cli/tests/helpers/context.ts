import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { vi } from "vitest";
import type { CommandExecutor } from "@service-wizard/core";
import { createCliContext, type CliContext } from "../../src/context.js";
import type { Prompter } from "../../src/prompts/prompter.js";

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "service-wizard-cli-"));
}

/**
 * Context rooted in a temp directory, with no delays and the current user "tester"
 */
export function testContext(root: string, prompter: Prompter, executor: CommandExecutor): CliContext {
  return createCliContext({
    prompter,
    executor,
    paths: {
      configDir: path.join(root, "configs"),
      outputDir: path.join(root, "units"),
      systemUnitDir: "/etc/systemd/system",
      logDir: path.join(root, "logs"),
    },
    build: { cwd: root, homeDir: root, user: "tester" },
    settleDelayMs: 0,
    startDelayMs: 0,
  });
}

const ANSI_ESCAPE = /\u001b\[[0-9;]*m/g;

/**
 * Capture console.log; `lines()` returns each call joined into one string
 * with colors stripped, and `text()` everything as one block
 */
export function captureConsole() {
  const spy = vi.spyOn(console, "log").mockImplementation(() => undefined);
  const lines = (): string[] => spy.mock.calls.map((args) => args.map(String).join(" ").replace(ANSI_ESCAPE, ""));
  return {
    spy,
    lines,
    text: () => lines().join("\n"),
  };
}
