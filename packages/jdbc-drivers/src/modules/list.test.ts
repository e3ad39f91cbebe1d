import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { listDrivers } from "./list.js";
import { initContext, resetContext } from "../lib/cli-context.js";
import { resolveConfig } from "../lib/config.js";
import { createNoopLogger, type Logger } from "../lib/logger.js";
import { createServices, type Services } from "../lib/services.js";

describe("list command", () => {
  let workDir: string;
  let consoleLogSpy: MockInstance;
  let logger: Logger;
  let services: Services;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), "jdbc-list-cmd-"));
    await writeFile(join(workDir, "postgresql-42.2.18.jar"), "");
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    process.exitCode = undefined;
    initContext(["node", "jdbc-drivers"], {});
    logger = { ...createNoopLogger(), warn: vi.fn() };
    services = createServices({
      loadConfig: (_path, cliOptions) => ({ config: resolveConfig(cliOptions, undefined, undefined, {}), sources: [] }),
      createLogger: () => logger,
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    resetContext();
    process.exitCode = undefined;
    await rm(workDir, { recursive: true, force: true });
  });

  it("lists every engine with what is installed", async () => {
    const result = await listDrivers(services, { path: workDir });

    expect(result?.path).toBe(workDir);
    expect(result?.engines).toHaveLength(6);
    expect(result?.engines[0]).toEqual({
      dbms: "postgresql",
      version: "42.2.18",
      archive: "postgresqlV42.2.18.zip",
      driverClass: "org.postgresql.Driver",
      installed: [join(workDir, "postgresql-42.2.18.jar")],
    });
    expect(result?.engines[1].installed).toEqual([]);
    expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining("postgresql-42.2.18.jar"));
  });

  it("lists engines without install state when no folder is known", async () => {
    const result = await listDrivers(services, {});

    expect(result?.path).toBeUndefined();
    expect(result?.engines.every((engine) => engine.installed === undefined)).toBe(true);
    expect(consoleLogSpy).toHaveBeenCalledWith(
      expect.stringContaining("Pass --path or set DATABASECONNECTOR_JAR_FOLDER to see installed drivers.")
    );
  });

  it("warns about a missing folder and still lists the engines", async () => {
    const missing = join(workDir, "missing");

    const result = await listDrivers(services, { path: missing });

    expect(logger.warn).toHaveBeenCalledWith(`The folder '${missing}' does not exist`);
    expect(result?.path).toBeUndefined();
    expect(process.exitCode).toBeUndefined();
  });

  it("prints a JSON result in json mode", async () => {
    initContext(["node", "jdbc-drivers", "--json"], {});

    await listDrivers(services, { path: workDir });

    const output = JSON.parse(consoleLogSpy.mock.calls[0][0] as string);
    expect(output.success).toBe(true);
    expect(output.data.engines[5]).toEqual({
      dbms: "snowflake",
      version: "3.13.22",
      archive: "SnowflakeV3.13.22.zip",
      driverClass: "net.snowflake.client.jdbc.SnowflakeDriver",
      installed: [],
    });
  });
});
