import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { locateDrivers } from "./locate.js";
import { initContext, resetContext } from "../lib/cli-context.js";
import { resolveConfig } from "../lib/config.js";
import { createNoopLogger } from "../lib/logger.js";
import { createServices, type Services } from "../lib/services.js";

describe("locate command", () => {
  let workDir: string;
  let consoleLogSpy: MockInstance;
  let consoleErrorSpy: MockInstance;
  let services: Services;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), "jdbc-locate-cmd-"));
    await writeFile(join(workDir, "snowflake-jdbc-3.13.22.jar"), "");
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    process.exitCode = undefined;
    initContext(["node", "jdbc-drivers"], {});
    services = createServices({
      loadConfig: (_path, cliOptions) => ({ config: resolveConfig(cliOptions, undefined, undefined, {}), sources: [] }),
      createLogger: () => createNoopLogger(),
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    resetContext();
    process.exitCode = undefined;
    await rm(workDir, { recursive: true, force: true });
  });

  it("prints each matching file", async () => {
    const files = await locateDrivers(services, "snowflake", { path: workDir });

    expect(files).toEqual([join(workDir, "snowflake-jdbc-3.13.22.jar")]);
    expect(consoleLogSpy).toHaveBeenCalledWith(join(workDir, "snowflake-jdbc-3.13.22.jar"));
  });

  it("prints a JSON result in json mode", async () => {
    initContext(["node", "jdbc-drivers", "--json"], {});

    await locateDrivers(services, "snowflake", { path: workDir });

    expect(JSON.parse(consoleLogSpy.mock.calls[0][0] as string)).toEqual({
      success: true,
      data: { pattern: "snowflake", path: workDir, files: [join(workDir, "snowflake-jdbc-3.13.22.jar")] },
    });
  });

  it("reports a pattern with no matches", async () => {
    const files = await locateDrivers(services, "Nonexistent", { path: workDir });

    expect(files).toEqual([]);
    expect(consoleErrorSpy).toHaveBeenCalledWith(
      expect.stringContaining(`No drivers matching pattern 'Nonexistent' found in folder '${workDir}'`)
    );
    expect(process.exitCode).toBe(1);
  });

  it("reports a missing folder", async () => {
    await locateDrivers(services, "snowflake", { path: join(workDir, "missing") });

    expect(consoleErrorSpy).toHaveBeenCalledWith(
      expect.stringContaining(`The folder '${join(workDir, "missing")}' does not exist`)
    );
    expect(process.exitCode).toBe(1);
  });
});
