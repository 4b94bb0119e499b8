import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { Deployer, ServiceFileManager, ServiceManager, ServiceStatus, describeFailure } from "../src/index.js";
import { FakeCommandExecutor } from "./helpers/fake-executor.js";

describe("ServiceManager", () => {
  let executor: FakeCommandExecutor;
  let manager: ServiceManager;

  beforeEach(() => {
    executor = new FakeCommandExecutor();
    manager = new ServiceManager("demo", { executor });
  });

  it("enables, starts and confirms the unit is active", async () => {
    executor.respond("systemctl is-active demo", { stdout: "active\n" });

    const result = await manager.enableAndStart();

    expect(result).toEqual({ success: true, message: "Service demo is now active and enabled at boot" });
    expect(executor.calls).toEqual(["sudo systemctl enable demo", "sudo systemctl start demo", "systemctl is-active demo"]);
  });

  it("reports a unit that did not become active", async () => {
    executor.respond("systemctl is-active demo", { stdout: "activating\n", code: 3 });

    const result = await manager.enableAndStart();

    expect(result).toEqual({
      success: false,
      message: "Service demo is not active, check logs with: sudo journalctl -u demo",
    });
  });

  it("stops at the first failing step with the command's stderr", async () => {
    executor.respond("sudo systemctl enable demo", { code: 1, stderr: "Unit demo.service not found.\n" });

    const result = await manager.enableAndStart();

    expect(result).toEqual({ success: false, message: "Failed to enable service: Unit demo.service not found." });
    expect(executor.calls).toEqual(["sudo systemctl enable demo"]);
  });

  it("returns status text even when systemctl exits non-zero", async () => {
    const output = "○ demo.service - Demo worker\n     Active: inactive (dead)\n";
    executor.respond("systemctl status demo", { stdout: output, code: 3 });

    expect(await manager.statusText()).toEqual({ success: true, message: output });
  });

  it("reports a status call with no output", async () => {
    executor.respond("systemctl status demo", { code: 4 });

    expect(await manager.statusText()).toEqual({ success: false, message: "Failed to get status for demo" });
  });

  it("stops and starts through sudo", async () => {
    expect(await manager.stop()).toEqual({ success: true, message: "Service demo stopped" });
    expect(await manager.start()).toEqual({ success: true, message: "Service demo started" });
    expect(executor.calls).toEqual(["sudo systemctl stop demo", "sudo systemctl start demo"]);
  });

  it("formats a failed stop", async () => {
    executor.respond("sudo systemctl stop demo", { code: 5, stderr: "Failed to stop demo.service: Unit not loaded." });

    expect(await manager.stop()).toEqual({
      success: false,
      message: "Failed to stop service: Failed to stop demo.service: Unit not loaded.",
    });
  });

  it("runs systemctl directly when sudo is disabled", async () => {
    const direct = new ServiceManager("demo", { executor, useSudo: false });
    await direct.daemonReload();
    expect(executor.calls).toEqual(["systemctl daemon-reload"]);
  });

  it("maps is-active output to a status", async () => {
    executor.respond("systemctl is-active demo", { stdout: "failed\n", code: 3 });
    expect(await manager.activeState()).toBe(ServiceStatus.FAILED);
  });
});

describe("describeFailure", () => {
  it("prefers stderr, then stdout, then the exit code", () => {
    expect(describeFailure({ stdout: "out", stderr: " err \n", code: 1, success: false })).toBe("err");
    expect(describeFailure({ stdout: "out\n", stderr: "", code: 1, success: false })).toBe("out");
    expect(describeFailure({ stdout: "", stderr: "", code: 7, success: false })).toBe("exit code 7");
  });
});

describe("Deployer", () => {
  let tempDir: string;
  let executor: FakeCommandExecutor;
  let deployer: Deployer;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "service-wizard-deploy-"));
    executor = new FakeCommandExecutor();
    deployer = new Deployer("demo", { executor, systemUnitDir: "/units" });
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("writes the unit file, creating the output directory", async () => {
    const outputDir = path.join(tempDir, "out", "units");
    const result = await deployer.writeUnitFile(outputDir, "[Unit]\n");

    const expectedPath = path.join(outputDir, "demo.service");
    expect(result).toEqual({ success: true, message: `Service file created at: ${expectedPath}`, path: expectedPath });
    expect(await ServiceFileManager.readServiceFile(expectedPath)).toBe("[Unit]\n");
  });

  it("copies the unit into place and reloads systemd", async () => {
    const result = await deployer.install("/tmp/out/demo.service");

    expect(result).toEqual({ success: true, message: "Service demo deployed successfully" });
    expect(executor.calls).toEqual(["sudo cp /tmp/out/demo.service /units/demo.service", "sudo systemctl daemon-reload"]);
  });

  it("stops when the copy fails", async () => {
    executor.respond("sudo cp /tmp/out/demo.service /units/demo.service", {
      code: 1,
      stderr: "cp: cannot create regular file: Permission denied\n",
    });

    const result = await deployer.install("/tmp/out/demo.service");

    expect(result).toEqual({
      success: false,
      message: "Failed to deploy service: cp: cannot create regular file: Permission denied",
    });
    expect(executor.calls).toHaveLength(1);
  });

  it("reports a failed reload", async () => {
    executor.respond("sudo systemctl daemon-reload", { code: 1, stderr: "Access denied" });

    const result = await deployer.install("/tmp/out/demo.service");

    expect(result).toEqual({
      success: false,
      message: "Failed to reload systemd: Access denied",
    });
  });

  it("installs into /etc/systemd/system by default", () => {
    expect(ServiceFileManager.systemUnitPath("demo")).toBe("/etc/systemd/system/demo.service");
  });
});
